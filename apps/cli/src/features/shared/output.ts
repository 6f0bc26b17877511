import { flushLoggers } from '@stocklog/logger';
import pc from 'picocolors';

import { createErrorResponse, createSuccessResponse, exitCodeToErrorCode } from './cli-response.js';
import { ExitCodes, type ExitCode } from './exit-codes.js';

export type OutputFormat = 'json' | 'text';

const ERROR_TIPS: Record<string, string> = {
  INVALID_ARGS: 'Check your command arguments and try again. Run with --help for usage information.',
  NOT_FOUND: 'No item has that id. Run `stocklog list` to see existing ids.',
  VALIDATION_ERROR: 'The input file must use the columns id,description,location,status,remarks.',
};

export interface OutputStreams {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  exit: (code: ExitCode) => never;
}

const processStreams: OutputStreams = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
  exit: (code) => process.exit(code),
};

/**
 * Formats command results as human-readable text or a JSON envelope.
 * Data goes to stdout; diagnostics go to stderr.
 */
export class OutputManager {
  private readonly startTime = Date.now();

  constructor(
    private readonly format: OutputFormat = 'text',
    private readonly streams: OutputStreams = processStreams
  ) {}

  isJsonMode(): boolean {
    return this.format === 'json';
  }

  isTextMode(): boolean {
    return this.format === 'text';
  }

  /**
   * Write the success envelope (JSON mode only).
   */
  json<T>(command: string, data: T, metadata?: Record<string, unknown>): void {
    if (this.format === 'json') {
      const response = createSuccessResponse(command, data, {
        duration_ms: Date.now() - this.startTime,
        ...metadata,
      });
      this.streams.stdout(`${JSON.stringify(response, undefined, 2)}\n`);
    }
  }

  /**
   * Raw text for stdout (text mode only), e.g. exported CSV.
   */
  print(text: string): void {
    if (this.format === 'text') {
      this.streams.stdout(text.endsWith('\n') ? text : `${text}\n`);
    }
  }

  success(message: string): void {
    if (this.format === 'text') {
      this.streams.stdout(`${pc.green('✓')} ${message}\n`);
    }
  }

  warn(message: string): void {
    if (this.format === 'text') {
      this.streams.stderr(`${pc.yellow('!')} ${message}\n`);
    }
  }

  /**
   * Report the error and exit with `exitCode`.
   */
  error(command: string, error: Error, exitCode: ExitCode = ExitCodes.GENERAL_ERROR): never {
    const code = exitCodeToErrorCode(exitCode);

    if (this.format === 'json') {
      // stdout so callers can parse the envelope
      this.streams.stdout(`${JSON.stringify(createErrorResponse(command, error, code), undefined, 2)}\n`);
    } else {
      this.streams.stderr(`${pc.red('✗')} Error: ${error.message}\n`);

      const tip = ERROR_TIPS[code];
      if (tip) {
        this.streams.stderr(`${pc.dim(tip)}\n`);
      }

      if (process.env['NODE_ENV'] === 'development' && error.stack) {
        this.streams.stderr(`\n${pc.dim(error.stack)}\n`);
      }
    }

    flushLoggers();
    return this.streams.exit(exitCode);
  }
}

import { BufferedSink, type BufferedSinkOptions } from '../buffered-sink.js';
import type { LogEntry, LogLevel } from '../logger.js';

export interface ConsoleSinkOptions extends BufferedSinkOptions {
  color?: boolean | undefined;
  /** Receives each formatted line; defaults to stderr so stdout stays free for command output */
  output?: ((line: string, level: LogLevel) => void) | undefined;
}

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: '\x1b[90m',
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

function writeToStderr(line: string): void {
  process.stderr.write(`${line}\n`);
}

/**
 * Human-readable sink.
 *
 * Format: [HH:MM:SS] LEVEL [category] message {key=value, ...}
 */
export class ConsoleSink extends BufferedSink {
  private readonly color: boolean;
  private readonly output: (line: string, level: LogLevel) => void;

  constructor(options?: ConsoleSinkOptions) {
    super(options);
    this.color = options?.color ?? false;
    this.output = options?.output ?? writeToStderr;
  }

  protected writeEntry(entry: LogEntry): void {
    const context = entry.context ? ` ${this.formatContext(entry.context)}` : '';
    const line = `${this.formatTime(entry.timestamp)} ${this.formatLevel(entry.level)} [${entry.category}] ${entry.msg}${context}`;
    this.output(line, entry.level);
  }

  private formatTime(timestamp: Date): string {
    const hours = String(timestamp.getHours()).padStart(2, '0');
    const minutes = String(timestamp.getMinutes()).padStart(2, '0');
    const seconds = String(timestamp.getSeconds()).padStart(2, '0');
    return `[${hours}:${minutes}:${seconds}]`;
  }

  private formatLevel(level: LogLevel): string {
    const upper = level.toUpperCase().padEnd(5);
    return this.color ? `${LEVEL_COLORS[level]}${upper}\x1b[0m` : upper;
  }

  private formatContext(context: Record<string, unknown>): string {
    const pairs = Object.entries(context).map(([key, value]) => `${key}=${JSON.stringify(value)}`);
    return `{${pairs.join(', ')}}`;
  }
}

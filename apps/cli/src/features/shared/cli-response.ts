import type { ExitCode } from './exit-codes.js';

/**
 * Envelope written to stdout in --json mode.
 */
export interface CLIResponse<T = unknown> {
  success: boolean;
  command: string;

  /** ISO 8601 */
  timestamp: string;

  /** Present on success */
  data?: T;

  /** Present on failure */
  error?:
    | {
        /** Machine-readable code, e.g. NOT_FOUND */
        code: string;
        message: string;
        details?: unknown;
        stack?: string | undefined;
      }
    | undefined;

  metadata?:
    | {
        [key: string]: unknown;
        duration_ms?: number | undefined;
      }
    | undefined;
}

export function createSuccessResponse<T>(command: string, data: T, metadata?: CLIResponse['metadata']): CLIResponse<T> {
  const response: CLIResponse<T> = {
    success: true,
    command,
    timestamp: new Date().toISOString(),
    data,
  };

  if (metadata) {
    response.metadata = metadata;
  }

  return response;
}

export function createErrorResponse(
  command: string,
  error: Error,
  code: string,
  details?: unknown
): CLIResponse<never> {
  const errorObj: NonNullable<CLIResponse['error']> = {
    code,
    message: error.message,
  };

  if (details !== undefined) {
    errorObj.details = details;
  }

  if (process.env['NODE_ENV'] === 'development' && error.stack) {
    errorObj.stack = error.stack;
  }

  return {
    success: false,
    command,
    timestamp: new Date().toISOString(),
    error: errorObj,
  };
}

export function exitCodeToErrorCode(exitCode: ExitCode): string {
  const codes: Record<number, string> = {
    1: 'GENERAL_ERROR',
    2: 'INVALID_ARGS',
    4: 'NOT_FOUND',
    7: 'DATABASE_ERROR',
    8: 'VALIDATION_ERROR',
    11: 'CONFIG_ERROR',
  };
  return codes[exitCode] ?? 'UNKNOWN_ERROR';
}

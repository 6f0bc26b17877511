import type { InventoryError } from '@stocklog/core';
import { isInventoryError } from '@stocklog/core';

/**
 * Semantic exit codes for the CLI.
 */
export const ExitCodes = {
  SUCCESS: 0,

  /** Catch-all */
  GENERAL_ERROR: 1,

  /** Invalid command arguments or options */
  INVALID_ARGS: 2,

  /** Item or file not found */
  NOT_FOUND: 4,

  /** Store could not be opened, queried or written */
  DATABASE_ERROR: 7,

  /** Malformed CSV/JSON input */
  VALIDATION_ERROR: 8,

  /** Environment variables failed validation */
  CONFIG_ERROR: 11,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

const EXIT_CODE_BY_ERROR: Record<InventoryError['code'], ExitCode> = {
  BOOTSTRAP_FAILED: ExitCodes.DATABASE_ERROR,
  QUERY_FAILED: ExitCodes.DATABASE_ERROR,
  WRITE_FAILED: ExitCodes.DATABASE_ERROR,
  TRANSACTION_FAILED: ExitCodes.DATABASE_ERROR,
  NOT_FOUND: ExitCodes.NOT_FOUND,
  INTERCHANGE_FAILED: ExitCodes.VALIDATION_ERROR,
};

/**
 * Pick the exit code for a failed store or interchange operation.
 */
export function exitCodeForError(error: Error): ExitCode {
  return isInventoryError(error) ? EXIT_CODE_BY_ERROR[error.code] : ExitCodes.GENERAL_ERROR;
}

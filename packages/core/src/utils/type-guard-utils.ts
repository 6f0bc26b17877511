/**
 * Shared type guards and error-message helpers.
 */

import type { Result } from 'neverthrow';
import { err } from 'neverthrow';

/**
 * Type guard for checking if a value is an Error instance with a message
 */
export function isErrorWithMessage(error: unknown): error is Error & { message: string } {
  return error instanceof Error && typeof error.message === 'string';
}

/**
 * Extract error message from unknown error value
 */
export function getErrorMessage(error: unknown, defaultMessage?: string): string {
  if (isErrorWithMessage(error)) {
    return error.message;
  }
  return defaultMessage || String(error);
}

/**
 * Wrap an unknown error with context message
 */
export function wrapError<T = never>(error: unknown, context: string): Result<T, Error> {
  const message = getErrorMessage(error);
  return err(new Error(`${context}: ${message}`));
}

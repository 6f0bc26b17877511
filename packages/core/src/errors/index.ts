/**
 * Error taxonomy for the inventory store.
 *
 * Every failure carries a machine-readable `code` so callers can branch on
 * "absent" versus "broken" without parsing messages.
 */

export type InventoryErrorCode =
  | 'BOOTSTRAP_FAILED'
  | 'QUERY_FAILED'
  | 'NOT_FOUND'
  | 'WRITE_FAILED'
  | 'TRANSACTION_FAILED'
  | 'INTERCHANGE_FAILED';

export interface ErrorContext {
  [key: string]: unknown;
  operation?: string | undefined;
  id?: number | undefined;
  row?: number | undefined;
}

export abstract class InventoryError extends Error {
  abstract readonly code: InventoryErrorCode;
  readonly context: ErrorContext | undefined;

  constructor(message: string, context?: ErrorContext, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.context = context;
    this.name = this.constructor.name;
  }

  toJSON() {
    return {
      code: this.code,
      context: this.context,
      message: this.message,
      name: this.name,
    };
  }
}

/**
 * The store could not be opened or its schema could not be created.
 */
export class BootstrapError extends InventoryError {
  readonly code = 'BOOTSTRAP_FAILED';
}

export class QueryError extends InventoryError {
  readonly code = 'QUERY_FAILED';
}

export class NotFoundError extends InventoryError {
  readonly code = 'NOT_FOUND';

  constructor(
    public readonly id: number,
    operation: string
  ) {
    super(`item ${String(id)} not found`, { operation, id });
  }
}

export class WriteError extends InventoryError {
  readonly code = 'WRITE_FAILED';
}

export class TransactionError extends InventoryError {
  readonly code = 'TRANSACTION_FAILED';

  constructor(
    public readonly phase: 'begin' | 'commit',
    message: string,
    cause?: unknown
  ) {
    super(message, { operation: `${phase} transaction` }, cause);
  }
}

/**
 * Malformed CSV/JSON input, or an interchange file that could not be read or written.
 */
export class InterchangeError extends InventoryError {
  readonly code = 'INTERCHANGE_FAILED';
}

export function isInventoryError(error: unknown): error is InventoryError {
  return error instanceof InventoryError;
}

export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}

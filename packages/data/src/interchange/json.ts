import {
  InterchangeError,
  ItemListSchema,
  ItemSchema,
  formatZodIssues,
  getErrorMessage,
  type Item,
  type NewItem,
} from '@stocklog/core';
import { err, ok, type Result } from 'neverthrow';

function parseJson(text: string, operation: string): Result<unknown, InterchangeError> {
  try {
    const parsed: unknown = JSON.parse(text);
    return ok(parsed);
  } catch (error) {
    return err(new InterchangeError(`${operation} failed: ${getErrorMessage(error)}`, { operation }, error));
  }
}

/**
 * Two-space-indented JSON array with keys in column order.
 */
export function itemsToJson(items: readonly Item[]): string {
  const ordered = items.map(({ id, description, location, status, remarks }) => ({
    id,
    description,
    location,
    status,
    remarks,
  }));
  return JSON.stringify(ordered, undefined, 2);
}

/**
 * Accepts either an array of items or one item object.
 */
export function parseItemsJson(text: string): Result<NewItem[], InterchangeError> {
  const parsed = parseJson(text, 'parse json');
  if (parsed.isErr()) return err(parsed.error);

  const value = parsed.value;
  const result = Array.isArray(value) ? ItemListSchema.safeParse(value) : ItemSchema.safeParse(value);
  if (!result.success) {
    return err(
      new InterchangeError(`invalid item json: ${formatZodIssues(result.error)}`, { operation: 'parse json' })
    );
  }

  return ok(Array.isArray(result.data) ? result.data : [result.data]);
}

/**
 * Re-indent any JSON document with two spaces.
 */
export function prettyPrintJson(text: string): Result<string, InterchangeError> {
  return parseJson(text, 'view json').map((value) => JSON.stringify(value, undefined, 2));
}

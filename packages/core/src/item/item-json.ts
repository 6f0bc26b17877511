import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { InterchangeError } from '../errors/index.js';
import { getErrorMessage } from '../utils/type-guard-utils.js';
import { formatZodIssues, fromZod } from '../utils/zod-utils.js';

import { ItemSchema, type Item } from './item.js';

/**
 * Serialize one item as an indented JSON object with lowercase keys.
 *
 * @example
 * itemToJson(item)
 * // {
 * //   "id": 1001,
 * //   "description": "UPS",
 * //   ...
 * // }
 */
export function itemToJson(item: Item): string {
  const { id, description, location, status, remarks } = item;
  return JSON.stringify({ id, description, location, status, remarks }, undefined, 2);
}

/**
 * Parse a single JSON object into an Item. Missing text fields default to ''.
 */
export function itemFromJson(text: string): Result<Item, InterchangeError> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    return err(new InterchangeError(`parse item json failed: ${getErrorMessage(error)}`, { operation: 'itemFromJson' }));
  }

  const result = fromZod(ItemSchema, parsed);
  if (result.isErr()) {
    return err(
      new InterchangeError(`invalid item json: ${formatZodIssues(result.error)}`, { operation: 'itemFromJson' })
    );
  }

  return ok(result.value);
}

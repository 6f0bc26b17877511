import type { NewItem } from '@stocklog/core';
import { hasAssignedId } from '@stocklog/core';
import { err, ok, type Result } from 'neverthrow';

import type { ItemQueries } from '../queries/item-queries.js';

/**
 * Write parsed items through `queries`: rows with an id replace (or create)
 * that id, rows without one get a fresh id. Stops at the first failure; run it
 * inside a transaction to make the import all-or-nothing.
 */
export async function importItems(queries: ItemQueries, items: readonly NewItem[]): Promise<Result<number, Error>> {
  for (const item of items) {
    const result = hasAssignedId(item) ? await queries.appendItem(item) : await queries.addItem(item);
    if (result.isErr()) return err(result.error);
  }
  return ok(items.length);
}

import { QueryError, formatZodIssues, type Item } from '@stocklog/core';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import { z } from 'zod';

const ItemRowSchema = z.object({
  id: z.number().int(),
  description: z.string().nullable(),
  location: z.string().nullable(),
  status: z.string().nullable(),
  remarks: z.string().nullable(),
});

/**
 * Decode one `inventory` row. NULL text columns become ''.
 */
export function toItem(row: unknown): Result<Item, QueryError> {
  const parsed = ItemRowSchema.safeParse(row);
  if (!parsed.success) {
    return err(new QueryError(`scan failed: ${formatZodIssues(parsed.error)}`, { operation: 'scan' }));
  }

  const { id, description, location, status, remarks } = parsed.data;
  return ok({
    id,
    description: description ?? '',
    location: location ?? '',
    status: status ?? '',
    remarks: remarks ?? '',
  });
}

export function toItems(rows: unknown[]): Result<Item[], QueryError> {
  const items: Item[] = [];
  for (const row of rows) {
    const result = toItem(row);
    if (result.isErr()) return err(result.error);
    items.push(result.value);
  }
  return ok(items);
}

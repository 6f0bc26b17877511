import { z } from 'zod';

/**
 * One inventory record.
 *
 * `remarks` is an append-only audit log: each logical update adds one
 * `[YYYY-MM-DD HH:MM] message` line.
 */
export interface Item {
  id: number;
  description: string;
  location: string;
  status: string;
  remarks: string;
}

/**
 * Item before insertion. A missing or zero id lets the store assign one.
 */
export type NewItem = Omit<Item, 'id'> & { id?: number | undefined };

/**
 * Column order shared by every interchange format.
 */
export const ITEM_FIELDS = ['id', 'description', 'location', 'status', 'remarks'] as const;
export type ItemField = (typeof ITEM_FIELDS)[number];

export const ItemSchema = z.object({
  id: z.number().int().nonnegative().safe('id is out of range').default(0),
  description: z.string().default(''),
  location: z.string().default(''),
  status: z.string().default(''),
  remarks: z.string().default(''),
});

export const ItemListSchema = z.array(ItemSchema);

export function hasAssignedId(item: NewItem): item is Item {
  return item.id !== undefined && item.id > 0;
}

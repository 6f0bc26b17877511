import type { Generated } from '@stocklog/sqlite';

/**
 * The single inventory table. Text columns are nullable at the SQL level;
 * the query layer reads NULL back as ''.
 */
export interface InventoryTable {
  id: Generated<number>;
  description: string | null;
  location: string | null;
  status: string | null;
  remarks: string | null;
}

/**
 * SQLite's internal AUTOINCREMENT bookkeeping table.
 */
export interface SqliteSequenceTable {
  name: string;
  seq: number;
}

export interface InventorySchema {
  inventory: InventoryTable;
  sqlite_sequence: SqliteSequenceTable;
}

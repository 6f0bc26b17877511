import { BootstrapError, getErrorMessage } from '@stocklog/core';
import { getLogger } from '@stocklog/logger';
import { closeSqliteDatabase, createSqliteDatabase, sql, type Kysely } from '@stocklog/sqlite';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import type { InventorySchema } from '../schema/inventory-schema.js';

const logger = getLogger('inventory-database');

/** Sequence floor: the first auto-assigned id is INDEX_START + 1 */
export const INDEX_START = 1000;

export const INVENTORY_TABLE = 'inventory';

export type InventoryDatabase = Kysely<InventorySchema>;

/**
 * Anything record operations can run against: the connection itself or an
 * open transaction on it.
 */
export type Executor = Kysely<InventorySchema>;

export interface OpenInventoryDatabaseOptions {
  indexStart?: number | undefined;
}

async function ensureInventoryTable(db: InventoryDatabase): Promise<void> {
  await db.schema
    .createTable(INVENTORY_TABLE)
    .ifNotExists()
    .addColumn('id', 'integer', (col) => col.primaryKey().autoIncrement())
    .addColumn('description', 'text')
    .addColumn('location', 'text')
    .addColumn('status', 'text')
    .addColumn('remarks', 'text')
    .execute();
}

/**
 * Seed the AUTOINCREMENT counter, leaving an existing counter alone so a
 * reopened store keeps issuing ids where it left off.
 */
async function ensureSequenceFloor(db: InventoryDatabase, indexStart: number): Promise<void> {
  await sql`
    INSERT INTO sqlite_sequence (name, seq)
    SELECT ${INVENTORY_TABLE}, ${indexStart}
    WHERE NOT EXISTS (SELECT 1 FROM sqlite_sequence WHERE name = ${INVENTORY_TABLE})
  `.execute(db);
}

/**
 * Open (creating if needed) the inventory store at `path`. `:memory:` gives a
 * private store that disappears on close.
 */
export async function openInventoryDatabase(
  path: string,
  options?: OpenInventoryDatabaseOptions
): Promise<Result<InventoryDatabase, BootstrapError>> {
  const indexStart = options?.indexStart ?? INDEX_START;

  const dbResult = createSqliteDatabase<InventorySchema>(path);
  if (dbResult.isErr()) {
    return err(new BootstrapError(dbResult.error.message, { operation: 'open' }, dbResult.error));
  }

  const db = dbResult.value;

  try {
    await ensureInventoryTable(db);
  } catch (error) {
    await closeSqliteDatabase(db);
    return err(
      new BootstrapError(`create table failed: ${getErrorMessage(error)}`, { operation: 'create table' }, error)
    );
  }

  try {
    await ensureSequenceFloor(db, indexStart);
  } catch (error) {
    await closeSqliteDatabase(db);
    return err(
      new BootstrapError(`init sequence failed: ${getErrorMessage(error)}`, { operation: 'init sequence' }, error)
    );
  }

  logger.debug({ path, indexStart }, 'Inventory database ready');
  return ok(db);
}

export async function closeInventoryDatabase(db: InventoryDatabase): Promise<Result<void, Error>> {
  return closeSqliteDatabase(db);
}

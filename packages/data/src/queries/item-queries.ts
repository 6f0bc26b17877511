import {
  NotFoundError,
  QueryError,
  WriteError,
  formatRemarks,
  formatRemarksEntry,
  getErrorMessage,
  systemClock,
  type Clock,
  type Item,
  type NewItem,
} from '@stocklog/core';
import { getLogger } from '@stocklog/logger';
import { sql } from '@stocklog/sqlite';
import { err, ok, type Result } from 'neverthrow';

import { INDEX_START, INVENTORY_TABLE, type Executor } from '../storage/database.js';

import { toItem, toItems } from './item-row.js';

export interface ItemQueryOptions {
  clock?: Clock | undefined;
  /** IANA zone for remarks timestamps; defaults to the process's local zone */
  timeZone?: string | undefined;
  /** Value resetSequence() restores */
  indexStart?: number | undefined;
}

/**
 * `remarks` with `entry` appended on a new line, evaluated inside the UPDATE.
 */
function appendedRemarks(entry: string) {
  return sql<string>`CASE WHEN remarks IS NULL OR remarks = '' THEN ${entry} ELSE remarks || char(10) || ${entry} END`;
}

function writeError(operation: string, error: unknown, id?: number): WriteError {
  return new WriteError(`${operation} failed: ${getErrorMessage(error)}`, { operation, id }, error);
}

function queryError(operation: string, error: unknown): QueryError {
  return new QueryError(`${operation} failed: ${getErrorMessage(error)}`, { operation }, error);
}

export function createItemQueries(db: Executor, options?: ItemQueryOptions) {
  const logger = getLogger('item-queries');
  const remarksOptions = { clock: options?.clock ?? systemClock, timeZone: options?.timeZone };
  const indexStart = options?.indexStart ?? INDEX_START;

  /**
   * Insert a new item and return the id the store assigned. Any id on the
   * input is ignored.
   */
  async function addItem(item: NewItem): Promise<Result<number, WriteError>> {
    try {
      const result = await db
        .insertInto(INVENTORY_TABLE)
        .values({
          description: item.description,
          location: item.location,
          status: item.status,
          remarks: formatRemarks(item.remarks, remarksOptions),
        })
        .executeTakeFirstOrThrow();

      const id = Number(result.insertId);
      logger.debug({ id }, 'Inserted item');
      return ok(id);
    } catch (error) {
      return err(writeError('insert', error));
    }
  }

  /**
   * Insert the item under its own id, replacing any row that already has it.
   */
  async function appendItem(item: Item): Promise<Result<void, WriteError>> {
    try {
      await db
        .insertInto(INVENTORY_TABLE)
        .orReplace()
        .values({
          id: item.id,
          description: item.description,
          location: item.location,
          status: item.status,
          remarks: formatRemarks(item.remarks, remarksOptions),
        })
        .execute();

      logger.debug({ id: item.id }, 'Inserted or replaced item');
      return ok(undefined);
    } catch (error) {
      return err(writeError('insert or replace', error, item.id));
    }
  }

  /**
   * Overwrite description, location and status. Non-blank remarks are appended
   * to the audit log; blank remarks leave it untouched. Returns the number of
   * rows changed, 0 when the id does not exist.
   */
  async function editItem(item: Item): Promise<Result<number, WriteError>> {
    try {
      const hasRemarks = item.remarks.trim() !== '';
      const result = await db
        .updateTable(INVENTORY_TABLE)
        .set({
          description: item.description,
          location: item.location,
          status: item.status,
          ...(hasRemarks ? { remarks: appendedRemarks(formatRemarks(item.remarks, remarksOptions)) } : {}),
        })
        .where('id', '=', item.id)
        .executeTakeFirst();

      const affected = Number(result.numUpdatedRows);
      logger.debug({ id: item.id, affected }, 'Edited item');
      return ok(affected);
    } catch (error) {
      return err(writeError('update', error, item.id));
    }
  }

  async function appendRemarksEntry(id: number, message: string): Promise<Result<void, WriteError | NotFoundError>> {
    let affected: number;
    try {
      const result = await db
        .updateTable(INVENTORY_TABLE)
        .set({ remarks: appendedRemarks(formatRemarksEntry(message, remarksOptions)) })
        .where('id', '=', id)
        .executeTakeFirst();
      affected = Number(result.numUpdatedRows);
    } catch (error) {
      return err(writeError('append remarks', error, id));
    }

    if (affected === 0) {
      return err(new NotFoundError(id, 'append remarks'));
    }

    logger.debug({ id }, 'Appended remarks entry');
    return ok(undefined);
  }

  async function deleteItem(id: number): Promise<Result<number, WriteError>> {
    try {
      const result = await db.deleteFrom(INVENTORY_TABLE).where('id', '=', id).executeTakeFirst();
      const affected = Number(result.numDeletedRows);
      logger.debug({ id, affected }, 'Deleted item');
      return ok(affected);
    } catch (error) {
      return err(writeError('delete', error, id));
    }
  }

  /**
   * Remove every row. The id counter is left as is.
   */
  async function deleteAllItems(): Promise<Result<number, WriteError>> {
    try {
      const result = await db.deleteFrom(INVENTORY_TABLE).executeTakeFirst();
      const affected = Number(result.numDeletedRows);
      logger.debug({ affected }, 'Deleted all items');
      return ok(affected);
    } catch (error) {
      return err(writeError('delete all', error));
    }
  }

  /**
   * Put the id counter back to the configured floor, recreating its row if it
   * was removed. Safe to repeat.
   */
  async function resetSequence(): Promise<Result<void, WriteError>> {
    try {
      const updated = await db
        .updateTable('sqlite_sequence')
        .set({ seq: indexStart })
        .where('name', '=', INVENTORY_TABLE)
        .executeTakeFirst();

      if (Number(updated.numUpdatedRows) === 0) {
        await db.insertInto('sqlite_sequence').values({ name: INVENTORY_TABLE, seq: indexStart }).execute();
      }

      logger.debug({ indexStart }, 'Reset sequence');
      return ok(undefined);
    } catch (error) {
      return err(writeError('reset sequence', error));
    }
  }

  /**
   * Last id handed out (or the floor when nothing was inserted yet);
   * undefined when the counter row is missing.
   */
  async function getSequence(): Promise<Result<number | undefined, QueryError>> {
    try {
      const row = await db
        .selectFrom('sqlite_sequence')
        .select('seq')
        .where('name', '=', INVENTORY_TABLE)
        .executeTakeFirst();
      return ok(row ? Number(row.seq) : undefined);
    } catch (error) {
      return err(queryError('sequence query', error));
    }
  }

  async function getItemById(id: number): Promise<Result<Item, QueryError | NotFoundError>> {
    let row: unknown;
    try {
      row = await db.selectFrom(INVENTORY_TABLE).selectAll().where('id', '=', id).executeTakeFirst();
    } catch (error) {
      return err(queryError('query', error));
    }

    if (row === undefined) {
      return err(new NotFoundError(id, 'get item'));
    }

    return toItem(row);
  }

  async function listAll(): Promise<Result<Item[], QueryError>> {
    try {
      const rows = await db.selectFrom(INVENTORY_TABLE).selectAll().orderBy('id', 'asc').execute();
      return toItems(rows);
    } catch (error) {
      return err(queryError('query', error));
    }
  }

  /**
   * Keyset page: up to `limit` items with id greater than `afterId`. A limit
   * of 0 yields an empty page.
   */
  async function listPaged(afterId: number, limit: number): Promise<Result<Item[], QueryError>> {
    if (!Number.isInteger(limit) || limit < 0) {
      return err(new QueryError(`invalid page limit ${String(limit)}`, { operation: 'paged query' }));
    }
    if (limit === 0) return ok([]);

    try {
      const rows = await db
        .selectFrom(INVENTORY_TABLE)
        .selectAll()
        .where('id', '>', afterId)
        .orderBy('id', 'asc')
        .limit(limit)
        .execute();
      return toItems(rows);
    } catch (error) {
      return err(queryError('paged query', error));
    }
  }

  async function countItems(): Promise<Result<number, QueryError>> {
    try {
      const row = await db
        .selectFrom(INVENTORY_TABLE)
        .select((eb) => eb.fn.countAll<number>().as('count'))
        .executeTakeFirstOrThrow();
      return ok(Number(row.count));
    } catch (error) {
      return err(queryError('count', error));
    }
  }

  return {
    addItem,
    appendItem,
    appendRemarksEntry,
    countItems,
    deleteAllItems,
    deleteItem,
    editItem,
    getItemById,
    getSequence,
    listAll,
    listPaged,
    resetSequence,
  };
}

export type ItemQueries = ReturnType<typeof createItemQueries>;

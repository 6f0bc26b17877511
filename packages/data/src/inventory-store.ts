import type { BootstrapError, Item, NewItem, NotFoundError, QueryError, WriteError } from '@stocklog/core';
import { itemToJson } from '@stocklog/core';
import { getLogger } from '@stocklog/logger';
import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';

import { itemsToCsv, parseItemsCsv } from './interchange/csv.js';
import { readTextFile, writeTextFile } from './interchange/files.js';
import { importItems } from './interchange/import.js';
import { itemsToJson, parseItemsJson } from './interchange/json.js';
import {
  createItemIterator,
  type ItemFilter,
  type ItemIterator,
  type ItemIteratorOptions,
} from './queries/item-iterator.js';
import { createItemQueries, type ItemQueries, type ItemQueryOptions } from './queries/item-queries.js';
import {
  closeInventoryDatabase,
  openInventoryDatabase,
  type InventoryDatabase,
  type OpenInventoryDatabaseOptions,
} from './storage/database.js';
import { executeInTransaction } from './storage/transaction.js';

const logger = getLogger('inventory-store');

export type InventoryStoreOptions = OpenInventoryDatabaseOptions & ItemQueryOptions;

/**
 * Owns one store connection. Every write runs in its own transaction; reads
 * go straight to the connection.
 */
export class InventoryStore {
  static async open(path: string, options?: InventoryStoreOptions): Promise<Result<InventoryStore, BootstrapError>> {
    const dbResult = await openInventoryDatabase(path, options);
    if (dbResult.isErr()) return err(dbResult.error);
    return ok(new InventoryStore(dbResult.value, options));
  }

  private readonly queries: ItemQueries;
  private closed = false;

  constructor(
    private readonly db: InventoryDatabase,
    private readonly options?: ItemQueryOptions
  ) {
    this.queries = createItemQueries(db, options);
  }

  /**
   * Run `fn` with queries bound to one transaction. Commits on ok, rolls back
   * on err or throw.
   */
  async executeInTransaction<T>(fn: (queries: ItemQueries) => Promise<Result<T, Error>>): Promise<Result<T, Error>> {
    return executeInTransaction(this.db, (trx) => fn(createItemQueries(trx, this.options)));
  }

  addItem(item: NewItem): Promise<Result<number, Error>> {
    return this.executeInTransaction((q) => q.addItem(item));
  }

  appendItem(item: Item): Promise<Result<void, Error>> {
    return this.executeInTransaction((q) => q.appendItem(item));
  }

  editItem(item: Item): Promise<Result<number, Error>> {
    return this.executeInTransaction((q) => q.editItem(item));
  }

  appendRemarksEntry(id: number, message: string): Promise<Result<void, Error>> {
    return this.executeInTransaction((q) => q.appendRemarksEntry(id, message));
  }

  deleteItem(id: number): Promise<Result<number, Error>> {
    return this.executeInTransaction((q) => q.deleteItem(id));
  }

  deleteAllItems(): Promise<Result<number, Error>> {
    return this.executeInTransaction((q) => q.deleteAllItems());
  }

  resetSequence(): Promise<Result<void, Error>> {
    return this.executeInTransaction((q) => q.resetSequence());
  }

  getItemById(id: number): Promise<Result<Item, QueryError | NotFoundError>> {
    return this.queries.getItemById(id);
  }

  listAll(): Promise<Result<Item[], QueryError>> {
    return this.queries.listAll();
  }

  listPaged(afterId: number, limit: number): Promise<Result<Item[], QueryError>> {
    return this.queries.listPaged(afterId, limit);
  }

  countItems(): Promise<Result<number, QueryError>> {
    return this.queries.countItems();
  }

  getSequence(): Promise<Result<number | undefined, QueryError>> {
    return this.queries.getSequence();
  }

  /**
   * The iterator reads in batches, so other calls on this store may run while
   * it is open.
   */
  createIterator(filter?: ItemFilter, options?: ItemIteratorOptions): Promise<Result<ItemIterator, QueryError>> {
    return createItemIterator(this.db, filter, options);
  }

  /**
   * CSV of every item, streamed through an iterator.
   */
  async exportCsv(): Promise<Result<string, QueryError>> {
    const iteratorResult = await this.createIterator();
    if (iteratorResult.isErr()) return err(iteratorResult.error);

    const items: Item[] = [];
    for await (const item of iteratorResult.value) {
      if (item.isErr()) return err(item.error);
      items.push(item.value);
    }

    return ok(itemsToCsv(items));
  }

  async exportJson(): Promise<Result<string, QueryError>> {
    return (await this.listAll()).map(itemsToJson);
  }

  async exportItemJson(id: number): Promise<Result<string, QueryError | NotFoundError>> {
    return (await this.getItemById(id)).map(itemToJson);
  }

  /**
   * Import CSV in one transaction; nothing is written when any row fails.
   */
  async importCsv(text: string): Promise<Result<number, Error>> {
    const parsed = parseItemsCsv(text);
    if (parsed.isErr()) return err(parsed.error);
    return this.importParsed(parsed.value, 'csv');
  }

  async importJson(text: string): Promise<Result<number, Error>> {
    const parsed = parseItemsJson(text);
    if (parsed.isErr()) return err(parsed.error);
    return this.importParsed(parsed.value, 'json');
  }

  async exportCsvFile(path: string): Promise<Result<void, Error>> {
    const csv = await this.exportCsv();
    if (csv.isErr()) return err(csv.error);
    return writeTextFile(path, csv.value);
  }

  async exportJsonFile(path: string): Promise<Result<void, Error>> {
    const json = await this.exportJson();
    if (json.isErr()) return err(json.error);
    return writeTextFile(path, json.value);
  }

  async importCsvFile(path: string): Promise<Result<number, Error>> {
    const content = await readTextFile(path);
    if (content.isErr()) return err(content.error);
    return this.importCsv(content.value);
  }

  async importJsonFile(path: string): Promise<Result<number, Error>> {
    const content = await readTextFile(path);
    if (content.isErr()) return err(content.error);
    return this.importJson(content.value);
  }

  /** Safe to call more than once. A failed close can be retried. */
  async close(): Promise<Result<void, Error>> {
    if (this.closed) return ok(undefined);

    const result = await closeInventoryDatabase(this.db);
    if (result.isOk()) {
      this.closed = true;
    }
    return result;
  }

  private async importParsed(items: NewItem[], format: string): Promise<Result<number, Error>> {
    const result = await this.executeInTransaction((q) => importItems(q, items));
    if (result.isOk()) {
      logger.info({ count: result.value, format }, 'Imported items');
    }
    return result;
  }
}

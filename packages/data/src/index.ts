export { InventoryStore, type InventoryStoreOptions } from './inventory-store.js';

export {
  INDEX_START,
  INVENTORY_TABLE,
  closeInventoryDatabase,
  openInventoryDatabase,
  type Executor,
  type InventoryDatabase,
  type OpenInventoryDatabaseOptions,
} from './storage/database.js';
export { executeInTransaction } from './storage/transaction.js';

export { createItemQueries, type ItemQueries, type ItemQueryOptions } from './queries/item-queries.js';
export {
  DEFAULT_ITERATOR_BATCH_SIZE,
  createItemIterator,
  type ItemFilter,
  type ItemIterator,
  type ItemIteratorOptions,
  type ItemIteratorStep,
} from './queries/item-iterator.js';

export type { InventorySchema, InventoryTable, SqliteSequenceTable } from './schema/inventory-schema.js';

export {
  CSV_HEADER,
  importItems,
  itemsToCsv,
  itemsToJson,
  parseItemsCsv,
  parseItemsJson,
  prettyPrintJson,
  readTextFile,
  writeTextFile,
} from './interchange/index.js';

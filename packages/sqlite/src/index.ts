export { IN_MEMORY_PATH, createSqliteDatabase } from './database.js';
export { closeSqliteDatabase } from './close.js';

// Re-export the Kysely surface the data layer needs so it shares one kysely instance
export {
  Kysely,
  sql,
  type ControlledTransaction,
  type Generated,
  type RawBuilder,
  type Selectable,
  type SqlBool,
} from 'kysely';

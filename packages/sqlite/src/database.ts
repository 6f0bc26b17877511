import * as fs from 'node:fs';
import * as path from 'node:path';

import { wrapError } from '@stocklog/core';
import { getLogger } from '@stocklog/logger';
import Database from 'better-sqlite3';
import { Kysely, SqliteDialect } from 'kysely';
import type { Result } from 'neverthrow';
import { ok } from 'neverthrow';

const logger = getLogger('sqlite');

/** Reserved path for a private, non-persistent database */
export const IN_MEMORY_PATH = ':memory:';

/**
 * Open a better-sqlite3 database (creating parent directories for file paths)
 * and wrap it in Kysely.
 */
export function createSqliteDatabase<T>(dbPath: string): Result<Kysely<T>, Error> {
  try {
    if (dbPath !== IN_MEMORY_PATH) {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }

    const sqliteDb = new Database(dbPath);

    // WAL is ignored for :memory:, which stays in 'memory' journal mode
    sqliteDb.pragma('journal_mode = WAL');
    sqliteDb.pragma('synchronous = NORMAL');

    logger.debug(`Connected to SQLite database: ${dbPath}`);

    return ok(
      new Kysely<T>({
        dialect: new SqliteDialect({ database: sqliteDb }),
      })
    );
  } catch (error) {
    logger.error({ error }, `Error opening SQLite database: ${dbPath}`);
    return wrapError(error, `open database ${dbPath} failed`);
  }
}

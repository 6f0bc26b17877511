import { wrapError } from '@stocklog/core';
import { getLogger } from '@stocklog/logger';
import type { Kysely } from 'kysely';
import type { Result } from 'neverthrow';
import { ok } from 'neverthrow';

const logger = getLogger('sqlite');

export async function closeSqliteDatabase<T>(db: Kysely<T>): Promise<Result<void, Error>> {
  try {
    await db.destroy();
    logger.debug('Database connection closed');
    return ok(undefined);
  } catch (error) {
    logger.error({ error }, 'Error closing database');
    return wrapError(error, 'close database failed');
  }
}

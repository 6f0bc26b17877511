import { TransactionError, getErrorMessage, wrapError } from '@stocklog/core';
import { getLogger } from '@stocklog/logger';
import type { ControlledTransaction } from '@stocklog/sqlite';
import type { Result } from 'neverthrow';
import { err } from 'neverthrow';

import type { InventorySchema } from '../schema/inventory-schema.js';

import type { InventoryDatabase } from './database.js';

const logger = getLogger('transaction');

async function rollback(trx: ControlledTransaction<InventorySchema>): Promise<void> {
  try {
    await trx.rollback().execute();
  } catch (rollbackError) {
    logger.error({ rollbackError }, 'Failed to rollback transaction');
  }
}

/**
 * Run `fn` inside one transaction. Commits when it returns ok, rolls back when
 * it returns err or throws. A failed BEGIN or COMMIT surfaces as a
 * TransactionError tagged with the phase.
 */
export async function executeInTransaction<T>(
  db: InventoryDatabase,
  fn: (trx: ControlledTransaction<InventorySchema>) => Promise<Result<T, Error>>
): Promise<Result<T, Error>> {
  let trx: ControlledTransaction<InventorySchema>;
  try {
    trx = await db.startTransaction().execute();
  } catch (error) {
    return err(new TransactionError('begin', `begin tx failed: ${getErrorMessage(error)}`, error));
  }

  let result: Result<T, Error>;
  try {
    result = await fn(trx);
  } catch (error) {
    await rollback(trx);
    return wrapError(error, 'transaction failed');
  }

  if (result.isErr()) {
    logger.debug({ error: result.error }, 'Rolling back transaction');
    await rollback(trx);
    return result;
  }

  try {
    await trx.commit().execute();
  } catch (error) {
    await rollback(trx);
    return err(new TransactionError('commit', `commit tx failed: ${getErrorMessage(error)}`, error));
  }

  return result;
}

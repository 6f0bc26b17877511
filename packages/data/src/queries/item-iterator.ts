import { QueryError, getErrorMessage, type Item } from '@stocklog/core';
import { getLogger } from '@stocklog/logger';
import { sql, type RawBuilder, type Selectable, type SqlBool } from '@stocklog/sqlite';
import { err, ok, type Result } from 'neverthrow';

import type { InventoryTable } from '../schema/inventory-schema.js';
import { INVENTORY_TABLE, type Executor } from '../storage/database.js';

import { toItem } from './item-row.js';

const logger = getLogger('item-iterator');

/**
 * SQL predicate with `?` placeholders, e.g. `{ where: 'status = ?', args: ['active'] }`.
 * A leading WHERE keyword is optional. The clause is trusted SQL; only `args`
 * are bound as parameters. Every `?` counts as a placeholder, including one
 * inside a string literal.
 */
export interface ItemFilter {
  where: string;
  args?: readonly unknown[] | undefined;
}

export type ItemIteratorStep = { done: false; item: Item } | { done: true };

export interface ItemIterator extends AsyncIterable<Result<Item, QueryError>> {
  next(): Promise<Result<ItemIteratorStep, QueryError>>;
  close(): Promise<void>;
}

export interface ItemIteratorOptions {
  /** Rows fetched per query; default 256 */
  batchSize?: number | undefined;
}

export const DEFAULT_ITERATOR_BATCH_SIZE = 256;

const LEADING_WHERE = /^\s*where\s+/i;

function buildPredicate(filter: ItemFilter): Result<RawBuilder<SqlBool> | undefined, QueryError> {
  const clause = filter.where.replace(LEADING_WHERE, '').trim();
  const args = filter.args ?? [];

  if (clause === '') {
    return args.length === 0
      ? ok(undefined)
      : err(new QueryError('iterator query failed: arguments given without a predicate', { operation: 'iterate' }));
  }

  const parts = clause.split('?');
  const placeholders = parts.length - 1;
  if (placeholders !== args.length) {
    return err(
      new QueryError(
        `iterator query failed: predicate has ${String(placeholders)} placeholders but ${String(args.length)} arguments were given`,
        { operation: 'iterate' }
      )
    );
  }

  const fragments: RawBuilder<unknown>[] = [];
  parts.forEach((part, index) => {
    fragments.push(sql.raw(part));
    if (index < args.length) {
      fragments.push(sql`${args[index]}`);
    }
  });

  return ok(sql<SqlBool>`(${sql.join(fragments, sql``)})`);
}

type InventoryRow = Selectable<InventoryTable>;

type FetchPage = (afterId: number | undefined) => Promise<InventoryRow[]>;

/**
 * Reads `batchSize` rows per query, resuming after the last id seen. No
 * statement stays open between calls, so the connection is free for other
 * work while the iterator is live. Rows inserted past the cursor during
 * iteration are visited; rows already passed are not.
 */
class PagedItemIterator implements ItemIterator {
  private closed = false;
  private index = 0;

  constructor(
    private readonly fetchPage: FetchPage,
    private readonly batchSize: number,
    private page: InventoryRow[]
  ) {}

  async next(): Promise<Result<ItemIteratorStep, QueryError>> {
    if (this.closed) return ok({ done: true });

    if (this.index >= this.page.length) {
      const last = this.page.at(-1);
      if (last === undefined || this.page.length < this.batchSize) {
        await this.close();
        return ok({ done: true });
      }

      try {
        this.page = await this.fetchPage(last.id);
        this.index = 0;
      } catch (error) {
        await this.close();
        return err(
          new QueryError(`iterator scan failed: ${getErrorMessage(error)}`, { operation: 'iterate' }, error)
        );
      }

      if (this.page.length === 0) {
        await this.close();
        return ok({ done: true });
      }
    }

    const row = this.page[this.index];
    this.index += 1;

    const item = toItem(row);
    if (item.isErr()) return err(item.error);
    return ok({ done: false, item: item.value });
  }

  close(): Promise<void> {
    this.closed = true;
    this.page = [];
    this.index = 0;
    return Promise.resolve();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<Result<Item, QueryError>, void, undefined> {
    try {
      for (;;) {
        const step = await this.next();
        if (step.isErr()) {
          yield err(step.error);
          continue;
        }
        if (step.value.done) return;
        yield ok(step.value.item);
      }
    } finally {
      await this.close();
    }
  }
}

/**
 * Open a forward-only cursor over items matching `filter`, ordered by id.
 *
 * The first batch is fetched before returning so a malformed predicate fails
 * here rather than on the first `next()`.
 */
export async function createItemIterator(
  db: Executor,
  filter?: ItemFilter,
  options?: ItemIteratorOptions
): Promise<Result<ItemIterator, QueryError>> {
  const batchSize = options?.batchSize ?? DEFAULT_ITERATOR_BATCH_SIZE;
  if (!Number.isInteger(batchSize) || batchSize <= 0) {
    return err(
      new QueryError(`iterator query failed: invalid batch size ${String(batchSize)}`, { operation: 'iterate' })
    );
  }

  const predicate: Result<RawBuilder<SqlBool> | undefined, QueryError> = filter ? buildPredicate(filter) : ok(undefined);
  if (predicate.isErr()) return err(predicate.error);
  const where = predicate.value;

  const fetchPage: FetchPage = (afterId) => {
    let query = db.selectFrom(INVENTORY_TABLE).selectAll();
    if (where) {
      query = query.where(where);
    }
    if (afterId !== undefined) {
      query = query.where('id', '>', afterId);
    }
    return query.orderBy('id', 'asc').limit(batchSize).execute();
  };

  let first: InventoryRow[];
  try {
    first = await fetchPage(undefined);
  } catch (error) {
    return err(new QueryError(`iterator query failed: ${getErrorMessage(error)}`, { operation: 'iterate' }, error));
  }

  logger.debug({ where: filter?.where, batchSize }, 'Opened item iterator');
  return ok(new PagedItemIterator(fetchPage, batchSize, first));
}

import { NotFoundError, QueryError, fixedClock, isNotFoundError, type NewItem } from '@stocklog/core';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { TEST_STAMP, createTestDatabase, createTestQueries } from '../../__tests__/test-utils.js';
import type { InventoryDatabase } from '../../storage/database.js';
import { createItemQueries, type ItemQueries } from '../item-queries.js';

function ups(overrides: Partial<NewItem> = {}): NewItem {
  return { description: 'UPS', location: 'Rack 1', status: 'Operational', remarks: 'installed', ...overrides };
}

describe('ItemQueries', () => {
  let db: InventoryDatabase;
  let queries: ItemQueries;

  beforeEach(async () => {
    db = await createTestDatabase();
    queries = createTestQueries(db);
  });

  afterEach(async () => {
    await db.destroy();
  });

  describe('addItem', () => {
    it('assigns the first id above the floor and timestamps the remarks', async () => {
      const id = (await queries.addItem(ups()))._unsafeUnwrap();
      const items = (await queries.listAll())._unsafeUnwrap();

      expect(id).toBe(1001);
      expect(items).toEqual([
        {
          id: 1001,
          description: 'UPS',
          location: 'Rack 1',
          status: 'Operational',
          remarks: `${TEST_STAMP} installed`,
        },
      ]);
    });

    it('ignores any id on the input', async () => {
      expect((await queries.addItem(ups({ id: 42 })))._unsafeUnwrap()).toBe(1001);
      expect((await queries.addItem(ups({ id: 42 })))._unsafeUnwrap()).toBe(1002);
    });

    it('stores a bare timestamp for blank remarks', async () => {
      const id = (await queries.addItem(ups({ remarks: '  ' })))._unsafeUnwrap();

      expect((await queries.getItemById(id))._unsafeUnwrap().remarks).toBe(`${TEST_STAMP} `);
    });

    it('keeps remarks that already start with a timestamp', async () => {
      const remarks = '[2024-01-02 08:15] moved from storage';
      const id = (await queries.addItem(ups({ remarks })))._unsafeUnwrap();

      expect((await queries.getItemById(id))._unsafeUnwrap().remarks).toBe(remarks);
    });
  });

  describe('appendItem', () => {
    it('inserts under the given id', async () => {
      await queries.appendItem({ ...ups(), id: 77 });

      expect((await queries.getItemById(77))._unsafeUnwrap().remarks).toBe(`${TEST_STAMP} installed`);
    });

    it('replaces an existing row, remarks included', async () => {
      const id = (await queries.addItem(ups()))._unsafeUnwrap();
      await queries.appendRemarksEntry(id, 'checked');

      await queries.appendItem({ id, description: 'UPS v2', location: 'Rack 3', status: 'Spare', remarks: 'swapped' });

      expect((await queries.countItems())._unsafeUnwrap()).toBe(1);
      expect((await queries.getItemById(id))._unsafeUnwrap()).toEqual({
        id,
        description: 'UPS v2',
        location: 'Rack 3',
        status: 'Spare',
        remarks: `${TEST_STAMP} swapped`,
      });
    });

    it('moves the counter past an explicit id above it', async () => {
      await queries.appendItem({ ...ups(), id: 2000 });

      expect((await queries.addItem(ups()))._unsafeUnwrap()).toBe(2001);
    });
  });

  describe('editItem', () => {
    it('overwrites the fields and appends a new audit line', async () => {
      const id = (await queries.addItem(ups()))._unsafeUnwrap();
      const nextDay = createItemQueries(db, { clock: fixedClock('2025-06-22T09:05:00Z'), timeZone: 'UTC' });

      const affected = (
        await nextDay.editItem({ id, description: 'UPS', location: 'Rack 4', status: 'Standby', remarks: 'moved' })
      )._unsafeUnwrap();

      expect(affected).toBe(1);
      expect((await queries.getItemById(id))._unsafeUnwrap()).toEqual({
        id,
        description: 'UPS',
        location: 'Rack 4',
        status: 'Standby',
        remarks: `${TEST_STAMP} installed\n[2025-06-22 09:05] moved`,
      });
    });

    it('leaves remarks untouched when the new remarks are blank', async () => {
      const id = (await queries.addItem(ups()))._unsafeUnwrap();

      await queries.editItem({ id, description: 'UPS', location: 'Rack 1', status: 'Faulty', remarks: ' ' });

      const item = (await queries.getItemById(id))._unsafeUnwrap();
      expect(item.status).toBe('Faulty');
      expect(item.remarks).toBe(`${TEST_STAMP} installed`);
    });

    it('does not start with a newline when the stored remarks are NULL', async () => {
      await db.insertInto('inventory').values({ description: 'legacy' }).execute();

      await queries.editItem({ id: 1001, description: 'legacy', location: '', status: '', remarks: 'first note' });

      expect((await queries.getItemById(1001))._unsafeUnwrap().remarks).toBe(`${TEST_STAMP} first note`);
    });

    it('is a no-op for an unknown id', async () => {
      await queries.addItem(ups());

      const affected = (await queries.editItem({ ...ups(), id: 9999 }))._unsafeUnwrap();

      expect(affected).toBe(0);
      expect((await queries.countItems())._unsafeUnwrap()).toBe(1);
    });
  });

  describe('appendRemarksEntry', () => {
    it('adds one line below the existing log', async () => {
      const id = (await queries.addItem(ups()))._unsafeUnwrap();

      (await queries.appendRemarksEntry(id, ' replaced battery '))._unsafeUnwrap();

      expect((await queries.getItemById(id))._unsafeUnwrap().remarks).toBe(
        `${TEST_STAMP} installed\n${TEST_STAMP} replaced battery`
      );
    });

    it('only ever grows the log', async () => {
      const id = (await queries.addItem(ups()))._unsafeUnwrap();
      const before = (await queries.getItemById(id))._unsafeUnwrap().remarks;

      await queries.appendRemarksEntry(id, 'a');
      await queries.appendRemarksEntry(id, 'b');

      const after = (await queries.getItemById(id))._unsafeUnwrap().remarks;
      expect(after.startsWith(before)).toBe(true);
      expect(after.split('\n')).toHaveLength(3);
    });

    it('returns NotFoundError for an unknown id', async () => {
      const error = (await queries.appendRemarksEntry(9999, 'lost'))._unsafeUnwrapErr();

      expect(error).toBeInstanceOf(NotFoundError);
      expect(error.message).toBe('item 9999 not found');
    });
  });

  describe('deleteItem', () => {
    it('removes the row', async () => {
      const id = (await queries.addItem(ups()))._unsafeUnwrap();

      expect((await queries.deleteItem(id))._unsafeUnwrap()).toBe(1);
      expect(isNotFoundError((await queries.getItemById(id))._unsafeUnwrapErr())).toBe(true);
    });

    it('is a no-op for an unknown id', async () => {
      expect((await queries.deleteItem(9999))._unsafeUnwrap()).toBe(0);
    });
  });

  describe('deleteAllItems', () => {
    it('empties the table but keeps the counter', async () => {
      await queries.addItem(ups());
      await queries.addItem(ups());
      await queries.addItem(ups());

      expect((await queries.deleteAllItems())._unsafeUnwrap()).toBe(3);
      expect((await queries.getSequence())._unsafeUnwrap()).toBe(1003);
      expect((await queries.addItem(ups()))._unsafeUnwrap()).toBe(1004);
    });
  });

  describe('resetSequence', () => {
    it('restores the floor and can be repeated', async () => {
      await queries.addItem(ups());
      await queries.addItem(ups());
      await queries.deleteAllItems();

      (await queries.resetSequence())._unsafeUnwrap();
      (await queries.resetSequence())._unsafeUnwrap();

      expect((await queries.getSequence())._unsafeUnwrap()).toBe(1000);
      expect((await queries.addItem(ups()))._unsafeUnwrap()).toBe(1001);
    });

    it('recreates a missing counter row', async () => {
      await db.deleteFrom('sqlite_sequence').execute();
      expect((await queries.getSequence())._unsafeUnwrap()).toBeUndefined();

      (await queries.resetSequence())._unsafeUnwrap();

      expect((await queries.getSequence())._unsafeUnwrap()).toBe(1000);
    });

    it('uses the configured floor', async () => {
      const custom = createItemQueries(db, { indexStart: 300 });

      (await custom.resetSequence())._unsafeUnwrap();

      expect((await queries.getSequence())._unsafeUnwrap()).toBe(300);
    });
  });

  describe('getItemById', () => {
    it('reads NULL text columns as empty strings', async () => {
      await db.insertInto('inventory').values({ id: 5, description: 'bare' }).execute();

      expect((await queries.getItemById(5))._unsafeUnwrap()).toEqual({
        id: 5,
        description: 'bare',
        location: '',
        status: '',
        remarks: '',
      });
    });

    it('distinguishes a missing item from a failed query', async () => {
      const missing = (await queries.getItemById(1234))._unsafeUnwrapErr();
      expect(missing).toBeInstanceOf(NotFoundError);
      expect(missing.code).toBe('NOT_FOUND');

      const closed = await createTestDatabase();
      await closed.destroy();
      const broken = (await createTestQueries(closed).getItemById(1234))._unsafeUnwrapErr();
      expect(broken).toBeInstanceOf(QueryError);
      expect(broken.code).toBe('QUERY_FAILED');
    });
  });

  describe('listAll', () => {
    it('returns an empty list for an empty store', async () => {
      expect((await queries.listAll())._unsafeUnwrap()).toEqual([]);
    });

    it('orders by id ascending', async () => {
      await queries.appendItem({ ...ups(), id: 30 });
      await queries.appendItem({ ...ups(), id: 10 });
      await queries.appendItem({ ...ups(), id: 20 });

      expect((await queries.listAll())._unsafeUnwrap().map((item) => item.id)).toEqual([10, 20, 30]);
    });
  });

  describe('listPaged', () => {
    beforeEach(async () => {
      for (let i = 0; i < 5; i++) {
        await queries.addItem(ups({ description: `item ${String(i)}` }));
      }
    });

    it('returns at most limit items in id order', async () => {
      const page = (await queries.listPaged(0, 3))._unsafeUnwrap();

      expect(page.map((item) => item.id)).toEqual([1001, 1002, 1003]);
    });

    it('continues after the given id', async () => {
      const page = (await queries.listPaged(1003, 3))._unsafeUnwrap();

      expect(page.map((item) => item.id)).toEqual([1004, 1005]);
    });

    it('returns an empty page past the end', async () => {
      expect((await queries.listPaged(9999, 5))._unsafeUnwrap()).toEqual([]);
    });

    it('returns an empty page for a zero limit', async () => {
      await queries.addItem({ description: 'UPS', location: 'Rack 1', status: 'active', remarks: '' });

      expect((await queries.listPaged(0, 0))._unsafeUnwrap()).toEqual([]);
    });

    it('rejects a negative or fractional limit', async () => {
      expect((await queries.listPaged(0, -1))._unsafeUnwrapErr().message).toBe('invalid page limit -1');
      expect((await queries.listPaged(0, 2.5))._unsafeUnwrapErr().message).toBe('invalid page limit 2.5');
    });
  });
});

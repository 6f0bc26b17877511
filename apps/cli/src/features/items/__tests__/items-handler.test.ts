import { NotFoundError, fixedClock } from '@stocklog/core';
import { InventoryStore } from '@stocklog/data';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ItemsHandler } from '../items-handler.js';

const STAMP = '[2025-06-21 14:30]';

describe('ItemsHandler', () => {
  let store: InventoryStore;
  let handler: ItemsHandler;

  beforeEach(async () => {
    store = (
      await InventoryStore.open(':memory:', { clock: fixedClock('2025-06-21T14:30:00Z'), timeZone: 'UTC' })
    )._unsafeUnwrap();
    handler = new ItemsHandler(store);
  });

  afterEach(async () => {
    await store.close();
  });

  async function addUps() {
    return (
      await handler.add({ description: 'UPS', location: 'Rack 1', status: 'Operational', remarks: 'installed' })
    )._unsafeUnwrap();
  }

  it('returns the stored item after adding it', async () => {
    expect(await addUps()).toEqual({
      id: 1001,
      description: 'UPS',
      location: 'Rack 1',
      status: 'Operational',
      remarks: `${STAMP} installed`,
    });
  });

  describe('edit', () => {
    it('keeps fields that were not given', async () => {
      await addUps();

      const item = (await handler.edit({ id: 1001, status: 'Faulty' }))._unsafeUnwrap();

      expect(item).toEqual({
        id: 1001,
        description: 'UPS',
        location: 'Rack 1',
        status: 'Faulty',
        remarks: `${STAMP} installed`,
      });
    });

    it('appends remarks', async () => {
      await addUps();

      const item = (await handler.edit({ id: 1001, remarks: 'fan noisy' }))._unsafeUnwrap();

      expect(item.remarks).toBe(`${STAMP} installed\n${STAMP} fan noisy`);
    });

    it('reports an unknown id as not found', async () => {
      const error = (await handler.edit({ id: 4242, status: 'x' }))._unsafeUnwrapErr();

      expect(error).toBeInstanceOf(NotFoundError);
    });
  });

  it('logs an entry and returns the updated item', async () => {
    await addUps();

    const item = (await handler.log(1001, 'replaced battery'))._unsafeUnwrap();

    expect(item.remarks).toBe(`${STAMP} installed\n${STAMP} replaced battery`);
    expect((await handler.log(9999, 'nope'))._unsafeUnwrapErr().message).toBe('item 9999 not found');
  });

  it('tells whether remove deleted anything', async () => {
    await addUps();

    expect((await handler.remove(1001))._unsafeUnwrap()).toEqual({ id: 1001, removed: true });
    expect((await handler.remove(1001))._unsafeUnwrap()).toEqual({ id: 1001, removed: false });
  });

  describe('list', () => {
    beforeEach(async () => {
      for (const description of ['a', 'b', 'c', 'd']) {
        await handler.add({ description, location: '', status: '', remarks: '' });
      }
    });

    it('returns everything without paging options', async () => {
      expect((await handler.list({}))._unsafeUnwrap().map((item) => item.id)).toEqual([1001, 1002, 1003, 1004]);
    });

    it('pages with --after and --limit', async () => {
      expect((await handler.list({ after: 1001, limit: 2 }))._unsafeUnwrap().map((item) => item.id)).toEqual([
        1002, 1003,
      ]);
    });

    it('filters by --after alone', async () => {
      expect((await handler.list({ after: 1002 }))._unsafeUnwrap().map((item) => item.id)).toEqual([1003, 1004]);
    });
  });

  it('finds items with a predicate', async () => {
    await handler.add({ description: 'UPS', location: 'Rack 1', status: 'active', remarks: '' });
    await handler.add({ description: 'Switch', location: 'Rack 2', status: 'retired', remarks: '' });

    const found = (await handler.find({ where: 'status = ?', args: ['retired'] }))._unsafeUnwrap();

    expect(found.map((item) => item.description)).toEqual(['Switch']);
    expect((await handler.find({ where: 'bogus(' }))._unsafeUnwrapErr().code).toBe('QUERY_FAILED');
  });

  it('reports the sequence after a reset', async () => {
    await addUps();
    await handler.remove(1001);

    expect((await handler.resetSequence())._unsafeUnwrap()).toEqual({ sequence: 1000 });
  });
});

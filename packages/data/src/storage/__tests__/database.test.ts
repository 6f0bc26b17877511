import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createTestQueries } from '../../__tests__/test-utils.js';
import { closeInventoryDatabase, openInventoryDatabase } from '../database.js';

const newItem = { description: 'UPS', location: 'Rack 1', status: 'Operational', remarks: '' };

describe('openInventoryDatabase', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'stocklog-store-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('starts auto-assigned ids just above the default floor', async () => {
    const db = (await openInventoryDatabase(':memory:'))._unsafeUnwrap();
    const queries = createTestQueries(db);

    expect((await queries.getSequence())._unsafeUnwrap()).toBe(1000);
    expect((await queries.addItem(newItem))._unsafeUnwrap()).toBe(1001);

    await closeInventoryDatabase(db);
  });

  it('honours a custom floor', async () => {
    const db = (await openInventoryDatabase(':memory:', { indexStart: 5000 }))._unsafeUnwrap();

    expect((await createTestQueries(db).addItem(newItem))._unsafeUnwrap()).toBe(5001);

    await closeInventoryDatabase(db);
  });

  it('keeps the existing counter when a file store is reopened', async () => {
    const path = join(dir, 'inventory.db');

    const first = (await openInventoryDatabase(path))._unsafeUnwrap();
    const firstQueries = createTestQueries(first);
    await firstQueries.addItem(newItem);
    await firstQueries.addItem(newItem);
    await closeInventoryDatabase(first);

    const second = (await openInventoryDatabase(path, { indexStart: 1 }))._unsafeUnwrap();
    const secondQueries = createTestQueries(second);

    expect((await secondQueries.countItems())._unsafeUnwrap()).toBe(2);
    expect((await secondQueries.addItem(newItem))._unsafeUnwrap()).toBe(1003);

    await closeInventoryDatabase(second);
  });

  it('returns a BootstrapError when the path cannot be opened', async () => {
    const result = await openInventoryDatabase(dir);

    expect(result.isErr()).toBe(true);
    expect(result._unsafeUnwrapErr().code).toBe('BOOTSTRAP_FAILED');
  });
});

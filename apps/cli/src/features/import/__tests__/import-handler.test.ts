import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { fixedClock } from '@stocklog/core';
import { InventoryStore } from '@stocklog/data';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ImportHandler, formatFromPath } from '../import-handler.js';

describe('formatFromPath', () => {
  it('reads the extension case-insensitively', () => {
    expect(formatFromPath('/tmp/items.CSV')).toBe('csv');
    expect(formatFromPath('items.json')).toBe('json');
    expect(formatFromPath('items.txt')).toBeUndefined();
  });
});

describe('ImportHandler', () => {
  let dir: string;
  let store: InventoryStore;
  let handler: ImportHandler;

  beforeEach(async () => {
    dir = mkdtempSync(join(tmpdir(), 'stocklog-import-'));
    store = (
      await InventoryStore.open(':memory:', { clock: fixedClock('2025-06-21T14:30:00Z'), timeZone: 'UTC' })
    )._unsafeUnwrap();
    handler = new ImportHandler(store);
  });

  afterEach(async () => {
    await store.close();
    rmSync(dir, { recursive: true, force: true });
  });

  it('imports a CSV file chosen by extension', async () => {
    const inputPath = join(dir, 'items.csv');
    writeFileSync(inputPath, 'id,description,location,status,remarks\n5,Fan,Shelf,ok,\n,Cable,Shelf,new,\n');

    const result = (await handler.execute({ inputPath }))._unsafeUnwrap();

    expect(result).toEqual({ format: 'csv', inputPath, imported: 2 });
    expect((await store.listAll())._unsafeUnwrap().map((item) => item.id)).toEqual([5, 1001]);
  });

  it('honours an explicit format', async () => {
    const inputPath = join(dir, 'items.txt');
    writeFileSync(inputPath, '[{"description":"Fan"}]');

    expect((await handler.execute({ inputPath, format: 'json' }))._unsafeUnwrap().imported).toBe(1);
  });

  it('asks for a format it cannot infer', async () => {
    const inputPath = join(dir, 'items.txt');

    expect((await handler.execute({ inputPath }))._unsafeUnwrapErr().message).toBe(
      `Cannot tell the format of ${inputPath}; pass --format csv or --format json`
    );
  });

  it('imports nothing when the file is invalid', async () => {
    const inputPath = join(dir, 'items.json');
    writeFileSync(inputPath, '[{"description":"ok"},{"id":"seven"}]');

    const error = (await handler.execute({ inputPath }))._unsafeUnwrapErr();

    expect(error.message).toMatch(/^invalid item json: 1\.id: /);
    expect((await store.countItems())._unsafeUnwrap()).toBe(0);
  });
});

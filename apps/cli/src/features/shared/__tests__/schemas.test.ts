import { describe, expect, it } from 'vitest';

import {
  AddCommandOptionsSchema,
  ExportCommandOptionsSchema,
  ImportCommandOptionsSchema,
  ItemIdSchema,
  ListCommandOptionsSchema,
} from '../schemas.js';

describe('ItemIdSchema', () => {
  it('coerces numeric strings', () => {
    expect(ItemIdSchema.parse('1001')).toBe(1001);
  });

  it('rejects non-positive and fractional ids', () => {
    expect(ItemIdSchema.safeParse('0').error?.issues[0]?.message).toBe('Item id must be positive');
    expect(ItemIdSchema.safeParse('1.5').error?.issues[0]?.message).toBe('Item id must be an integer');
    expect(ItemIdSchema.safeParse('abc').success).toBe(false);
  });
});

describe('AddCommandOptionsSchema', () => {
  it('defaults remarks to empty', () => {
    expect(AddCommandOptionsSchema.parse({ description: 'UPS', location: 'Rack 1', status: 'ok' })).toEqual({
      description: 'UPS',
      location: 'Rack 1',
      status: 'ok',
      remarks: '',
    });
  });

  it('requires the descriptive fields', () => {
    expect(AddCommandOptionsSchema.safeParse({ location: 'Rack 1', status: 'ok' }).error?.issues[0]?.message).toBe(
      '--description is required'
    );
  });
});

describe('ListCommandOptionsSchema', () => {
  it('coerces paging options and leaves absent ones out', () => {
    expect(ListCommandOptionsSchema.parse({ after: '1001', limit: '3' })).toEqual({ after: 1001, limit: 3 });
    expect(ListCommandOptionsSchema.parse({})).toEqual({});
  });

  it('rejects a zero limit', () => {
    expect(ListCommandOptionsSchema.safeParse({ limit: '0' }).error?.issues[0]?.message).toBe(
      '--limit must be positive'
    );
  });
});

describe('interchange options', () => {
  it('defaults export to csv', () => {
    expect(ExportCommandOptionsSchema.parse({})).toEqual({ format: 'csv' });
  });

  it('rejects unknown formats', () => {
    expect(ImportCommandOptionsSchema.safeParse({ format: 'xml' }).error?.issues[0]?.message).toBe(
      '--format must be csv or json'
    );
  });
});

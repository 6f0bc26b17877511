import { ITEM_FIELDS, InterchangeError, getErrorMessage, type Item, type NewItem } from '@stocklog/core';
import { parse } from 'csv-parse/sync';
import { err, ok, type Result } from 'neverthrow';

export const CSV_HEADER = ITEM_FIELDS.join(',');

const NEEDS_QUOTING = /[",\r\n]/;
const ID_PATTERN = /^\d+$/;

function escapeCsvField(value: string): string {
  return NEEDS_QUOTING.test(value) ? `"${value.replaceAll('"', '""')}"` : value;
}

/**
 * Render items as CSV with a header row. Every line ends in `\n`.
 */
export function itemsToCsv(items: Iterable<Item>): string {
  const lines = [CSV_HEADER];
  for (const item of items) {
    lines.push(
      [String(item.id), item.description, item.location, item.status, item.remarks].map(escapeCsvField).join(',')
    );
  }
  return `${lines.join('\n')}\n`;
}

function isStringRow(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((field) => typeof field === 'string');
}

/**
 * Parse CSV produced by itemsToCsv (or a spreadsheet saving the same columns).
 *
 * Row numbers in errors count the header as row 1. An empty id means "let the
 * store assign one" and is returned as id 0.
 */
export function parseItemsCsv(text: string): Result<NewItem[], InterchangeError> {
  let records: unknown;
  try {
    records = parse(text, {
      bom: true,
      relax_column_count: true,
      skip_empty_lines: true,
    });
  } catch (error) {
    return err(new InterchangeError(`parse csv failed: ${getErrorMessage(error)}`, { operation: 'parse csv' }, error));
  }

  if (!Array.isArray(records) || records.length === 0) {
    return err(new InterchangeError('parse csv failed: missing header row', { operation: 'parse csv', row: 1 }));
  }

  const list: unknown[] = records;
  const [header, ...rows] = list;
  if (!isStringRow(header) || header.join(',') !== CSV_HEADER) {
    return err(
      new InterchangeError(`parse csv failed: header must be ${CSV_HEADER}`, { operation: 'parse csv', row: 1 })
    );
  }

  const items: NewItem[] = [];
  for (const [index, record] of rows.entries()) {
    const row = index + 2;

    if (!isStringRow(record) || record.length !== ITEM_FIELDS.length) {
      const got = Array.isArray(record) ? record.length : 0;
      return err(
        new InterchangeError(
          `csv row ${String(row)}: expected ${String(ITEM_FIELDS.length)} columns, got ${String(got)}`,
          { operation: 'parse csv', row }
        )
      );
    }

    const [rawId = '', description = '', location = '', status = '', remarks = ''] = record;
    const trimmedId = rawId.trim();
    if (trimmedId !== '' && !ID_PATTERN.test(trimmedId)) {
      return err(new InterchangeError(`csv row ${String(row)}: invalid id "${rawId}"`, { operation: 'parse csv', row }));
    }

    const id = trimmedId === '' ? 0 : Number(trimmedId);
    if (!Number.isSafeInteger(id)) {
      return err(
        new InterchangeError(`csv row ${String(row)}: id "${rawId}" is out of range`, { operation: 'parse csv', row })
      );
    }

    items.push({
      id,
      description,
      location,
      status,
      remarks,
    });
  }

  return ok(items);
}

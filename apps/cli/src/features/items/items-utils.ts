import { parseRemarksEntries, type Item } from '@stocklog/core';

const COLUMNS = ['ID', 'DESCRIPTION', 'LOCATION', 'STATUS'] as const;

function row(item: Item): string[] {
  return [String(item.id), item.description, item.location, item.status];
}

/**
 * Left-aligned table with a header, two spaces between columns.
 */
export function formatItemTable(items: readonly Item[]): string {
  const rows = [[...COLUMNS], ...items.map(row)];
  const widths = COLUMNS.map((_, column) => Math.max(...rows.map((cells) => (cells[column] ?? '').length)));

  return rows
    .map((cells) =>
      cells
        .map((cell, column) => cell.padEnd(widths[column] ?? 0))
        .join('  ')
        .trimEnd()
    )
    .join('\n');
}

/**
 * One item with its remarks log, one entry per line.
 */
export function formatItemDetails(item: Item): string {
  const lines = [
    `ID:          ${String(item.id)}`,
    `Description: ${item.description}`,
    `Location:    ${item.location}`,
    `Status:      ${item.status}`,
    'Remarks:',
  ];

  for (const entry of parseRemarksEntries(item.remarks)) {
    lines.push(entry.timestamp ? `  ${entry.timestamp}  ${entry.message}` : `  ${entry.message}`);
  }

  return lines.join('\n');
}

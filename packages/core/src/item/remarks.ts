import { formatTimestamp, type Clock } from '../clock.js';

/**
 * Matches a remarks value that already opens with an audit timestamp.
 */
export const REMARKS_PREFIX_PATTERN = /^\[\d{4}-\d{2}-\d{2} \d{2}:\d{2}\]/;

const ENTRY_PATTERN = /^\[(\d{4}-\d{2}-\d{2} \d{2}:\d{2})\] ?(.*)$/;

export interface RemarksFormatOptions {
  clock: Clock;
  /** IANA zone for the timestamp; local zone when omitted */
  timeZone?: string | undefined;
}

export interface RemarksEntry {
  timestamp?: string | undefined;
  message: string;
}

/**
 * Normalize remarks text into audit format.
 *
 * - blank text becomes `"[<now>] "`
 * - text that already starts with a timestamp is returned as given
 * - anything else is trimmed and prefixed with `"[<now>] "`
 *
 * Every write path that stores audit-formatted remarks goes through here.
 */
export function formatRemarks(currentText: string, options: RemarksFormatOptions): string {
  const trimmed = currentText.trim();
  const timestamp = formatTimestamp(options.clock.now(), options.timeZone);

  if (trimmed === '') {
    return `[${timestamp}] `;
  }

  if (REMARKS_PREFIX_PATTERN.test(trimmed)) {
    return currentText;
  }

  return `[${timestamp}] ${trimmed}`;
}

/**
 * Build one new audit line for `message`.
 */
export function formatRemarksEntry(message: string, options: RemarksFormatOptions): string {
  const timestamp = formatTimestamp(options.clock.now(), options.timeZone);
  return `[${timestamp}] ${message.trim()}`;
}

/**
 * Split a remarks field into its audit lines. Lines without a timestamp
 * (legacy free text) come back with `timestamp` unset.
 */
export function parseRemarksEntries(remarks: string): RemarksEntry[] {
  const entries: RemarksEntry[] = [];

  for (const line of remarks.split(/\r?\n/)) {
    if (line.trim() === '') continue;

    const match = ENTRY_PATTERN.exec(line);
    if (match) {
      entries.push({ timestamp: match[1], message: (match[2] ?? '').trimEnd() });
    } else {
      entries.push({ message: line.trim() });
    }
  }

  return entries;
}

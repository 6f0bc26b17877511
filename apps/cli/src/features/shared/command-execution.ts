import { InventoryStore } from '@stocklog/data';
import { getDatabasePath, getIndexStart, getTimeZone } from '@stocklog/env';
import { flushLoggers, getLogger } from '@stocklog/logger';
import type { Result } from 'neverthrow';
import type { ZodType, ZodTypeDef } from 'zod';

import { ExitCodes, exitCodeForError } from './exit-codes.js';
import { OutputManager } from './output.js';
import { GlobalOptionsSchema, type GlobalOptions } from './schemas.js';

const logger = getLogger('command');

/**
 * Read the program-level flags. Falls back to text mode when they do not parse,
 * so the error itself can still be reported.
 */
export function resolveGlobalOptions(raw: unknown): { options: GlobalOptions; output: OutputManager } {
  const parsed = GlobalOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    const output = new OutputManager('text');
    const message = parsed.error.issues[0]?.message ?? 'Invalid options';
    return output.error('stocklog', new Error(message), ExitCodes.INVALID_ARGS);
  }
  return { options: parsed.data, output: new OutputManager(parsed.data.json ? 'json' : 'text') };
}

/**
 * Validate command options at the CLI boundary; exits with INVALID_ARGS on failure.
 */
export function parseCommandInput<TOutput, TInput>(
  command: string,
  schema: ZodType<TOutput, ZodTypeDef, TInput>,
  raw: unknown,
  output: OutputManager
): TOutput {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return output.error(command, new Error(issue?.message ?? 'Invalid options'), ExitCodes.INVALID_ARGS);
  }
  return parsed.data;
}

/**
 * Open the store, run `fn`, close the store, and report the result. A store
 * that cannot be opened ends the process with DATABASE_ERROR.
 */
export async function runStoreCommand<T>(config: {
  command: string;
  globals: GlobalOptions;
  output: OutputManager;
  execute: (store: InventoryStore) => Promise<Result<T, Error>>;
  render: (value: T) => void;
}): Promise<void> {
  const { command, globals, output } = config;
  const dbPath = globals.db ?? getDatabasePath();

  const storeResult = await InventoryStore.open(dbPath, { indexStart: getIndexStart(), timeZone: getTimeZone() });
  if (storeResult.isErr()) {
    logger.error({ error: storeResult.error, dbPath }, 'Failed to open store');
    return output.error(command, storeResult.error, ExitCodes.DATABASE_ERROR);
  }

  const store = storeResult.value;
  let result: Result<T, Error>;
  try {
    result = await config.execute(store);
  } finally {
    const closeResult = await store.close();
    if (closeResult.isErr()) {
      logger.warn({ error: closeResult.error }, 'Failed to close store');
    }
  }

  if (result.isErr()) {
    return output.error(command, result.error, exitCodeForError(result.error));
  }

  config.render(result.value);
  output.json(command, result.value);
  flushLoggers();
}

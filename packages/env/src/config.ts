import path from 'node:path';

import { isValidTimeZone } from '@stocklog/core';
import { z } from 'zod';

export const DEFAULT_INDEX_START = 1000;
export const DATABASE_FILENAME = 'inventory.db';

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error'] as const;

const timeZoneSchema = z.string().refine(isValidTimeZone, { message: 'Unknown IANA time zone' });

const envSchema = z.object({
  STOCKLOG_DATA_DIR: z.string().min(1).optional(),
  STOCKLOG_INDEX_START: z.coerce.number().int().nonnegative().default(DEFAULT_INDEX_START),
  STOCKLOG_TIMEZONE: timeZoneSchema.optional(),
  STOCKLOG_LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
  STOCKLOG_LOG_FILE: z.string().min(1).optional(),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

type ValidatedEnv = z.infer<typeof envSchema>;

let validatedEnv: ValidatedEnv | undefined;

/**
 * Validates environment variables on first access.
 * Caches the result for subsequent calls.
 * @throws Error if validation fails
 */
function validateEnv(): ValidatedEnv {
  if (!validatedEnv) {
    const result = envSchema.safeParse(process.env);
    if (!result.success) {
      const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
      throw new Error(`Environment validation failed:\n${errors}`);
    }
    validatedEnv = result.data;
  }
  return validatedEnv;
}

/**
 * Forget the cached environment so the next accessor re-reads process.env.
 */
export function resetEnvCache(): void {
  validatedEnv = undefined;
}

/**
 * Directory holding the inventory database.
 *
 * STOCKLOG_DATA_DIR when set, otherwise `<cwd>/data`.
 */
export function getDataDirectory(): string {
  const env = validateEnv();
  return env.STOCKLOG_DATA_DIR ?? path.join(process.cwd(), 'data');
}

export function getDatabasePath(): string {
  return path.join(getDataDirectory(), DATABASE_FILENAME);
}

/** Sequence floor applied when a store is first created */
export function getIndexStart(): number {
  return validateEnv().STOCKLOG_INDEX_START;
}

/**
 * IANA zone for remarks timestamps; undefined means the process's local zone.
 */
export function getTimeZone(): string | undefined {
  return validateEnv().STOCKLOG_TIMEZONE;
}

export function getLogLevel(): ValidatedEnv['STOCKLOG_LOG_LEVEL'] {
  return validateEnv().STOCKLOG_LOG_LEVEL;
}

/** JSON-lines log file, in addition to stderr; unset means no file */
export function getLogFile(): string | undefined {
  return validateEnv().STOCKLOG_LOG_FILE;
}

export function getNodeEnv(): ValidatedEnv['NODE_ENV'] {
  return validateEnv().NODE_ENV;
}

export function isTest(): boolean {
  return getNodeEnv() === 'test';
}

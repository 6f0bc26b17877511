import { getErrorMessage } from '@stocklog/core';
import { getLogFile, getLogLevel } from '@stocklog/env';
import { ConsoleSink, FileSink, type LoggerConfig, type Sink } from '@stocklog/logger';
import { err, ok, type Result } from 'neverthrow';

/**
 * Logger setup for one CLI run. The environment is validated even when
 * `--verbose` overrides the level, so a bad variable is always a config error.
 */
export function buildLoggerConfig(verbose: boolean, options?: { color?: boolean }): Result<LoggerConfig, Error> {
  let envLevel: ReturnType<typeof getLogLevel>;
  let logFile: string | undefined;
  try {
    envLevel = getLogLevel();
    logFile = getLogFile();
  } catch (error) {
    return err(new Error(getErrorMessage(error)));
  }

  const sinks: Sink[] = [new ConsoleSink({ color: options?.color ?? false })];
  if (logFile) {
    sinks.push(new FileSink({ path: logFile }));
  }

  return ok({ level: verbose ? 'debug' : envLevel, sinks });
}

#!/usr/bin/env node
import { getErrorMessage } from '@stocklog/core';
import { flushLoggers, getLogger, initLogger } from '@stocklog/logger';
import { Command } from 'commander';

import { registerExportCommand } from './features/export/export.js';
import { registerImportCommand } from './features/import/import.js';
import { registerItemCommands } from './features/items/items.js';
import { ExitCodes } from './features/shared/exit-codes.js';
import { buildLoggerConfig } from './features/shared/logging.js';
import { registerViewJsonCommand } from './features/view-json/view-json.js';

const logger = getLogger('CLI');

function configureLogging(verbose: boolean): void {
  const config = buildLoggerConfig(verbose, { color: process.stderr.isTTY });
  if (config.isErr()) {
    process.stderr.write(`${config.error.message}\n`);
    process.exit(ExitCodes.CONFIG_ERROR);
  }

  initLogger(config.value);
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('stocklog')
    .description('Track inventory items with an append-only remarks log')
    .version('0.1.0')
    .option('--db <path>', 'Path to the inventory database (default: $STOCKLOG_DATA_DIR/inventory.db)')
    .option('--json', 'Output results as JSON')
    .option('--verbose', 'Log debug output to stderr')
    .hook('preAction', (_program, actionCommand) => {
      configureLogging(actionCommand.optsWithGlobals()['verbose'] === true);
    });

  registerItemCommands(program);
  registerExportCommand(program);
  registerImportCommand(program);
  registerViewJsonCommand(program);

  return program;
}

async function main(): Promise<void> {
  await createProgram().parseAsync();
}

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled rejection');
  flushLoggers();
  process.exit(ExitCodes.GENERAL_ERROR);
});

main().catch((error: unknown) => {
  process.stderr.write(`Fatal error: ${getErrorMessage(error)}\n`);
  flushLoggers();
  process.exit(ExitCodes.GENERAL_ERROR);
});

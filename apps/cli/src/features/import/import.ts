import type { Command } from 'commander';

import { parseCommandInput, resolveGlobalOptions, runStoreCommand } from '../shared/command-execution.js';
import { ImportCommandOptionsSchema } from '../shared/schemas.js';

import { ImportHandler } from './import-handler.js';

export function registerImportCommand(program: Command): void {
  program
    .command('import')
    .description('Import items from a CSV or JSON file; all rows or none')
    .argument('<file>', 'File to import')
    .option('--format <type>', 'Input format (csv|json); defaults to the file extension')
    .action(async (file: string, rawOptions: unknown, command: Command) => {
      const { options: globals, output } = resolveGlobalOptions(command.optsWithGlobals());
      const options = parseCommandInput('import', ImportCommandOptionsSchema, rawOptions, output);

      await runStoreCommand({
        command: 'import',
        globals,
        output,
        execute: (store) => new ImportHandler(store).execute({ inputPath: file, format: options.format }),
        render: (result) => output.success(`Imported ${String(result.imported)} items from ${result.inputPath}`),
      });
    });
}

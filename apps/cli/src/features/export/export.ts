import type { Command } from 'commander';

import { parseCommandInput, resolveGlobalOptions, runStoreCommand } from '../shared/command-execution.js';
import { ExportCommandOptionsSchema } from '../shared/schemas.js';

import { ExportHandler } from './export-handler.js';

export function registerExportCommand(program: Command): void {
  program
    .command('export')
    .description('Export every item as CSV or JSON')
    .option('--format <type>', 'Export format (csv|json)', 'csv')
    .option('--output <file>', 'Output file path (stdout when omitted)')
    .action(async (rawOptions: unknown, command: Command) => {
      const { options: globals, output } = resolveGlobalOptions(command.optsWithGlobals());
      const options = parseCommandInput('export', ExportCommandOptionsSchema, rawOptions, output);

      await runStoreCommand({
        command: 'export',
        globals,
        output,
        execute: (store) => new ExportHandler(store).execute({ format: options.format, outputPath: options.output }),
        render: (result) => {
          if (result.content !== undefined) {
            output.print(result.content);
          } else {
            output.success(`Exported ${String(result.itemCount)} items to ${result.outputPath ?? ''}`);
          }
        },
      });
    });
}

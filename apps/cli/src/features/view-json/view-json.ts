import { flushLoggers } from '@stocklog/logger';
import type { Command } from 'commander';

import { resolveGlobalOptions } from '../shared/command-execution.js';
import { exitCodeForError } from '../shared/exit-codes.js';

import { viewJsonFile } from './view-json-handler.js';

/**
 * Pretty-print a JSON file. Does not open the store.
 */
export function registerViewJsonCommand(program: Command): void {
  program
    .command('view-json')
    .description('Pretty-print a JSON file')
    .argument('<file>', 'JSON file')
    .action(async (file: string, _rawOptions: unknown, command: Command) => {
      const { output } = resolveGlobalOptions(command.optsWithGlobals());

      const result = await viewJsonFile(file);
      if (result.isErr()) {
        return output.error('view-json', result.error, exitCodeForError(result.error));
      }

      output.print(result.value);
      output.json('view-json', { content: result.value });
      flushLoggers();
    });
}

import type { Item } from '@stocklog/core';
import type { Command } from 'commander';
import pc from 'picocolors';

import { parseCommandInput, resolveGlobalOptions, runStoreCommand } from '../shared/command-execution.js';
import {
  AddCommandOptionsSchema,
  EditCommandOptionsSchema,
  ItemIdSchema,
  ListCommandOptionsSchema,
} from '../shared/schemas.js';

import { ItemsHandler } from './items-handler.js';
import { formatItemDetails, formatItemTable } from './items-utils.js';

/**
 * Register add, edit, log, remove, show, list, find and reset-sequence.
 */
export function registerItemCommands(program: Command): void {
  program
    .command('add')
    .description('Add an item; the store assigns its id')
    .requiredOption('--description <text>', 'Item description')
    .requiredOption('--location <text>', 'Where the item is')
    .requiredOption('--status <text>', 'Current status')
    .option('--remarks <text>', 'First remarks entry', '')
    .action(async (rawOptions: unknown, command: Command) => {
      const { options: globals, output } = resolveGlobalOptions(command.optsWithGlobals());
      const params = parseCommandInput('add', AddCommandOptionsSchema, rawOptions, output);

      await runStoreCommand({
        command: 'add',
        globals,
        output,
        execute: (store) => new ItemsHandler(store).add(params),
        render: (item) => output.success(`Added item ${pc.bold(String(item.id))}`),
      });
    });

  program
    .command('edit')
    .description('Change fields of an item; --remarks appends to its log')
    .argument('<id>', 'Item id')
    .option('--description <text>', 'New description')
    .option('--location <text>', 'New location')
    .option('--status <text>', 'New status')
    .option('--remarks <text>', 'Remarks entry to append')
    .action(async (rawId: string, rawOptions: unknown, command: Command) => {
      const { options: globals, output } = resolveGlobalOptions(command.optsWithGlobals());
      const id = parseCommandInput('edit', ItemIdSchema, rawId, output);
      const options = parseCommandInput('edit', EditCommandOptionsSchema, rawOptions, output);

      await runStoreCommand({
        command: 'edit',
        globals,
        output,
        execute: (store) => new ItemsHandler(store).edit({ id, ...options }),
        render: (item) => output.success(`Updated item ${pc.bold(String(item.id))}`),
      });
    });

  program
    .command('log')
    .description('Append a timestamped entry to an item\'s remarks')
    .argument('<id>', 'Item id')
    .argument('<message>', 'Entry text')
    .action(async (rawId: string, message: string, _rawOptions: unknown, command: Command) => {
      const { options: globals, output } = resolveGlobalOptions(command.optsWithGlobals());
      const id = parseCommandInput('log', ItemIdSchema, rawId, output);

      await runStoreCommand({
        command: 'log',
        globals,
        output,
        execute: (store) => new ItemsHandler(store).log(id, message),
        render: (item) => output.print(formatItemDetails(item)),
      });
    });

  program
    .command('remove')
    .description('Delete an item')
    .argument('<id>', 'Item id')
    .action(async (rawId: string, _rawOptions: unknown, command: Command) => {
      const { options: globals, output } = resolveGlobalOptions(command.optsWithGlobals());
      const id = parseCommandInput('remove', ItemIdSchema, rawId, output);

      await runStoreCommand({
        command: 'remove',
        globals,
        output,
        execute: (store) => new ItemsHandler(store).remove(id),
        render: (result) => {
          if (result.removed) {
            output.success(`Removed item ${String(result.id)}`);
          } else {
            output.warn(`No item with id ${String(result.id)}; nothing removed`);
          }
        },
      });
    });

  program
    .command('show')
    .description('Show one item and its remarks log')
    .argument('<id>', 'Item id')
    .action(async (rawId: string, _rawOptions: unknown, command: Command) => {
      const { options: globals, output } = resolveGlobalOptions(command.optsWithGlobals());
      const id = parseCommandInput('show', ItemIdSchema, rawId, output);

      await runStoreCommand({
        command: 'show',
        globals,
        output,
        execute: (store) => new ItemsHandler(store).show(id),
        render: (item) => output.print(formatItemDetails(item)),
      });
    });

  program
    .command('list')
    .description('List items in id order')
    .option('--after <id>', 'Only items with a greater id')
    .option('--limit <n>', 'At most this many items')
    .action(async (rawOptions: unknown, command: Command) => {
      const { options: globals, output } = resolveGlobalOptions(command.optsWithGlobals());
      const params = parseCommandInput('list', ListCommandOptionsSchema, rawOptions, output);

      await runStoreCommand({
        command: 'list',
        globals,
        output,
        execute: (store) => new ItemsHandler(store).list(params),
        render: (items) => renderItems(items, (text) => output.print(text), (text) => output.warn(text)),
      });
    });

  program
    .command('find')
    .description('List items matching a SQL predicate, e.g. find "status = ?" active')
    .argument('<where>', 'Predicate with ? placeholders')
    .argument('[args...]', 'Values bound to the placeholders')
    .action(async (where: string, args: string[], _rawOptions: unknown, command: Command) => {
      const { options: globals, output } = resolveGlobalOptions(command.optsWithGlobals());

      await runStoreCommand({
        command: 'find',
        globals,
        output,
        execute: (store) => new ItemsHandler(store).find({ where, args }),
        render: (items) => renderItems(items, (text) => output.print(text), (text) => output.warn(text)),
      });
    });

  program
    .command('reset-sequence')
    .description('Restart automatic ids at the configured floor')
    .action(async (_rawOptions: unknown, command: Command) => {
      const { options: globals, output } = resolveGlobalOptions(command.optsWithGlobals());

      await runStoreCommand({
        command: 'reset-sequence',
        globals,
        output,
        execute: (store) => new ItemsHandler(store).resetSequence(),
        render: (result) => output.success(`Sequence reset to ${String(result.sequence ?? 0)}`),
      });
    });
}

function renderItems(items: Item[], print: (text: string) => void, warn: (text: string) => void): void {
  if (items.length === 0) {
    warn('No items found');
    return;
  }
  print(formatItemTable(items));
}

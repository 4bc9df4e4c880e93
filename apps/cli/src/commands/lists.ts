import { Command } from 'commander';
import chalk from 'chalk';
import type { TreeDb } from '@tasktree/core';
import {
  createList, renameList, deleteList, withRetry,
  getListSummaries, getDefaultListId, setDefaultListId,
} from '@tasktree/core';
import * as out from '../output.js';
import { actingUser, resolveOwnedList, $try } from '../helpers.js';

export function createListsCommand(db: TreeDb): Command {
  const listsCommand = new Command('lists')
    .description('Manage task lists')
    .action((_opts: unknown, cmd: Command) => $try(() => {
      const userId = actingUser(db, cmd);
      const summaries = getListSummaries(db, userId);
      const defaultId = getDefaultListId(db, userId);

      if (summaries.length === 0) {
        out.info('No lists found. Create one with: tasktree lists create <name>');
        return;
      }

      out.info(chalk.bold.underline(`Lists of ${userId}`));
      for (const list of summaries) {
        out.info(`  ${out.formatListSummary(list, list.id === defaultId)}`);
      }
    }));

  listsCommand.addCommand(
    new Command('create')
      .description('Create a new empty list')
      .argument('<name>', 'The name of the list to create')
      .option('--use', 'Also make it the default list')
      .action((name: string, opts: { use?: boolean }, cmd: Command) => $try(async () => {
        const userId = actingUser(db, cmd);
        const result = await withRetry(() => createList(db, userId, name));
        out.printResult(result);
        if (result.type === 'success') {
          out.info(chalk.dim(`id: ${result.data.id}`));
          if (opts.use) setDefaultListId(db, userId, result.data.id);
        }
      })),
  );

  listsCommand.addCommand(
    new Command('rename')
      .description('Rename a list')
      .argument('<list>', 'The id or current name of the list')
      .argument('<newName>', 'The new name for the list')
      .action((ref: string, newName: string, _opts: unknown, cmd: Command) => $try(async () => {
        const list = resolveOwnedList(db, actingUser(db, cmd), ref);
        out.printResult(await withRetry(() => renameList(db, list.id, newName)));
      })),
  );

  listsCommand.addCommand(
    new Command('delete')
      .description('Delete a list and all its tasks')
      .argument('<list>', 'The id or name of the list to delete')
      .action((ref: string, _opts: unknown, cmd: Command) => $try(async () => {
        const list = resolveOwnedList(db, actingUser(db, cmd), ref);
        out.printResult(await withRetry(() => deleteList(db, list.id)));
      })),
  );

  listsCommand.addCommand(
    new Command('use')
      .description('Set the default list for new tasks')
      .argument('<list>', 'The id or name of the list')
      .action((ref: string, _opts: unknown, cmd: Command) => $try(() => {
        const userId = actingUser(db, cmd);
        const list = resolveOwnedList(db, userId, ref);
        setDefaultListId(db, userId, list.id);
        out.success(`Default list set to '${list.name}'`);
      })),
  );

  return listsCommand;
}

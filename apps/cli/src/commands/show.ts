import { Command } from 'commander';
import chalk from 'chalk';
import type { TreeDb, ListTree } from '@tasktree/core';
import { getListTree, getListsForUser } from '@tasktree/core';
import * as out from '../output.js';
import { actingUser, getOwnedDefaultList, resolveOwnedList, $try } from '../helpers.js';

function printList(tree: ListTree): void {
  out.info(`${chalk.bold.underline(tree.name)} ${chalk.dim(`${tree.completedCount}/${tree.taskCount} done`)}`);
  if (tree.tasks.length === 0) {
    out.info(chalk.dim('  No tasks yet... use the add command to create one'));
    return;
  }
  for (const line of out.renderTree(tree.tasks)) out.info(line);
}

export function createShowCommand(db: TreeDb): Command {
  return new Command('show')
    .description('Show a list as a tree (all lists when there is no default)')
    .argument('[list]', 'List id or name')
    .option('-a, --all', 'Show every list')
    .action((ref: string | undefined, opts: { all?: boolean }, cmd: Command) => $try(() => {
      const userId = actingUser(db, cmd);

      const showAll = opts.all === true || (ref === undefined && getOwnedDefaultList(db, userId) === null);
      const lists = showAll ? getListsForUser(db, userId) : [resolveOwnedList(db, userId, ref)];

      if (lists.length === 0) {
        out.info('No lists found. Create one with: tasktree lists create <name>');
        return;
      }

      lists.forEach((list, i) => {
        const tree = getListTree(db, list.id);
        if (!tree) return;
        if (i > 0) out.info('');
        printList(tree);
      });
    }));
}

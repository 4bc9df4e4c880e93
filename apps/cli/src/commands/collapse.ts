import { Command } from 'commander';
import type { TreeDb } from '@tasktree/core';
import { setCollapsed, withRetry } from '@tasktree/core';
import * as out from '../output.js';
import { actingUser, resolveOwnedTask, CliError, $try } from '../helpers.js';

export function createCollapseCommand(db: TreeDb): Command {
  return new Command('collapse')
    .description('Hide or show the subtasks of a task in the tree view')
    .argument('<taskId>', 'The task to collapse or expand')
    .option('--on', 'Collapse')
    .option('--off', 'Expand')
    .action((taskId: string, opts: { on?: boolean; off?: boolean }, cmd: Command) => $try(async () => {
      if (opts.on && opts.off) throw new CliError('Cannot use both --on and --off at the same time');

      const task = resolveOwnedTask(db, actingUser(db, cmd), taskId);
      const collapsed = opts.on ? true : opts.off ? false : undefined;
      out.printResult(await withRetry(() => setCollapsed(db, task.id, collapsed)));
    }));
}

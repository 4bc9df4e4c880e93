import { Command } from 'commander';
import type { TreeDb, TaskUpdate } from '@tasktree/core';
import { updateTask, withRetry } from '@tasktree/core';
import * as out from '../output.js';
import { actingUser, resolveOwnedTask, parsePriorityArg, CliError, $try } from '../helpers.js';

interface EditOpts {
  title?: string;
  description?: string;
  priority?: string;
}

export function createEditCommand(db: TreeDb): Command {
  return new Command('edit')
    .description('Change the title, description or priority of a task')
    .argument('<taskId>', 'The task to edit')
    .option('-t, --title <title>', 'New title')
    .option('-d, --description <text>', 'New description')
    .option('--priority <level>', 'low, medium or high')
    .action((taskId: string, opts: EditOpts, cmd: Command) => $try(async () => {
      const task = resolveOwnedTask(db, actingUser(db, cmd), taskId);

      if (opts.title === undefined && opts.description === undefined && opts.priority === undefined) {
        throw new CliError('Nothing to change. Pass --title, --description or --priority');
      }

      const fields: TaskUpdate = {
        title: opts.title,
        description: opts.description,
        priority: opts.priority !== undefined ? parsePriorityArg(opts.priority) ?? opts.priority : undefined,
      };
      out.printResult(await withRetry(() => updateTask(db, task.id, fields)));
    }));
}

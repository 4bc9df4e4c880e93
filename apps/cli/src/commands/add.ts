import { Command } from 'commander';
import type { TreeDb } from '@tasktree/core';
import { createTask, withRetry } from '@tasktree/core';
import * as out from '../output.js';
import { actingUser, resolveOwnedList, resolveOwnedTask, parsePriorityArg, $try } from '../helpers.js';

interface AddOpts {
  list?: string;
  parent?: string;
  description?: string;
  priority?: string;
}

export function createAddCommand(db: TreeDb): Command {
  return new Command('add')
    .description('Add a new task')
    .argument('<title>', 'Task title')
    .option('-l, --list <list>', 'List id or name (default: the default list)')
    .option('-p, --parent <taskId>', 'Create as a subtask of this task')
    .option('-d, --description <text>', 'Longer description')
    .option('--priority <level>', 'low, medium or high')
    .action((title: string, opts: AddOpts, cmd: Command) => $try(async () => {
      const userId = actingUser(db, cmd);
      const parent = opts.parent !== undefined ? resolveOwnedTask(db, userId, opts.parent) : null;
      const listId = parent && opts.list === undefined
        ? parent.listId
        : resolveOwnedList(db, userId, opts.list).id;
      const priority = opts.priority !== undefined ? parsePriorityArg(opts.priority) ?? opts.priority : undefined;

      const result = await withRetry(() => createTask(db, {
        listId,
        title,
        description: opts.description,
        priority,
        parentId: parent?.id ?? null,
      }));
      out.printResult(result);
      if (result.type === 'success') out.info(out.formatTaskLine(result.data));
    }));
}

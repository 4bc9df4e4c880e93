import { Command } from 'commander';
import type { TreeDb } from '@tasktree/core';
import { deleteTask, withRetry } from '@tasktree/core';
import * as out from '../output.js';
import { actingUser, resolveOwnedTask, $try } from '../helpers.js';

export function createDeleteCommand(db: TreeDb): Command {
  return new Command('delete')
    .description('Delete one or more tasks with all their subtasks')
    .argument('<taskIds...>', 'The id(s) of the task(s) to delete')
    .action((taskIds: string[], _opts: unknown, cmd: Command) => $try(async () => {
      const userId = actingUser(db, cmd);
      for (const taskId of taskIds) {
        await $try(async () => {
          const task = resolveOwnedTask(db, userId, taskId);
          out.printResult(await withRetry(() => deleteTask(db, task.id)));
        });
      }
    }));
}

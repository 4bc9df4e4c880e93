import { Command } from 'commander';
import type { TreeDb } from '@tasktree/core';
import { moveTask, withRetry } from '@tasktree/core';
import * as out from '../output.js';
import { actingUser, resolveOwnedList, resolveOwnedTask, $try } from '../helpers.js';

export function createMoveCommand(db: TreeDb): Command {
  return new Command('move')
    .description('Move a top-level task and its subtasks to a different list')
    .argument('<taskId>', 'The task ID to move')
    .argument('<targetList>', 'The id or name of the list to move the task to')
    .action((taskId: string, targetList: string, _opts: unknown, cmd: Command) => $try(async () => {
      const userId = actingUser(db, cmd);
      const task = resolveOwnedTask(db, userId, taskId);
      const list = resolveOwnedList(db, userId, targetList);
      out.printResult(await withRetry(() => moveTask(db, task.id, list.id)));
    }));
}

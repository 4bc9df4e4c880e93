import { Command } from 'commander';
import type { TreeDb } from '@tasktree/core';
import { setParent, withRetry } from '@tasktree/core';
import * as out from '../output.js';
import { actingUser, resolveOwnedTask, $try } from '../helpers.js';

export function createNestCommand(db: TreeDb): Command {
  return new Command('nest')
    .description('Make a task a subtask of another task in the same list, or top-level without a parent')
    .argument('<taskId>', 'The task to re-parent')
    .argument('[parentId]', 'The new parent (omit to make the task top-level)')
    .action((taskId: string, parentId: string | undefined, _opts: unknown, cmd: Command) => $try(async () => {
      const userId = actingUser(db, cmd);
      const task = resolveOwnedTask(db, userId, taskId);
      const parent = parentId !== undefined ? resolveOwnedTask(db, userId, parentId) : null;
      out.printResult(await withRetry(() => setParent(db, task.id, parent?.id ?? null)));
    }));
}

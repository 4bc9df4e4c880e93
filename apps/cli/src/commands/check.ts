import { Command } from 'commander';
import chalk from 'chalk';
import type { TreeDb, MutationResult, CompletionResult } from '@tasktree/core';
import { setCompletion, toggleCompletion, withRetry } from '@tasktree/core';
import * as out from '../output.js';
import { actingUser, resolveOwnedTask, $try } from '../helpers.js';

type CompletionTarget = boolean | 'toggle';

function printCompletion(result: MutationResult<CompletionResult>): void {
  out.printResult(result);
  if (result.type !== 'success') return;

  for (const task of result.data.updated.slice(1)) {
    const state = task.completed ? 'complete' : 'incomplete';
    out.info(chalk.dim(`  ↳ (${task.id}) ${task.title} is now ${state}`));
  }
}

function createCompletionCommand(db: TreeDb, name: string, description: string, target: CompletionTarget): Command {
  return new Command(name)
    .description(description)
    .argument('<taskIds...>', 'The id(s) of the task(s)')
    .action((taskIds: string[], _opts: unknown, cmd: Command) => $try(async () => {
      const userId = actingUser(db, cmd);
      for (const taskId of taskIds) {
        await $try(async () => {
          const task = resolveOwnedTask(db, userId, taskId);
          const result = await withRetry(() => target === 'toggle'
            ? toggleCompletion(db, task.id)
            : setCompletion(db, task.id, target));
          printCompletion(result);
        });
      }
    }));
}

export function createToggleCommand(db: TreeDb): Command {
  return createCompletionCommand(db, 'toggle', 'Flip the completion of one or more tasks', 'toggle');
}

export function createCheckCommand(db: TreeDb): Command {
  return createCompletionCommand(db, 'check', 'Mark one or more tasks complete', true);
}

export function createUncheckCommand(db: TreeDb): Command {
  return createCompletionCommand(db, 'uncheck', 'Mark one or more tasks incomplete', false);
}

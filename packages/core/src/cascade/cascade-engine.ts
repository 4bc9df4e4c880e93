/**
 * Completion cascade.
 *
 * Planning only reads; applying only writes. The façade runs both inside one
 * transaction, so a cascade is either fully committed or not at all.
 *
 * Rules, given a task T moving to state S:
 *   S = complete   -> every descendant of T becomes complete; then walk up from T:
 *                     while all siblings of the current node are complete, the
 *                     parent becomes complete and the walk continues from it.
 *   S = incomplete -> every ancestor of T becomes incomplete; descendants untouched.
 * The upward walk starts from T only, never from nodes reached by the downward pass.
 */

import type { TreeDb } from '../db.js';
import type { Task, TaskId } from '../types/task.js';
import { MAX_DEPTH } from '../types/task.js';
import { TreeIntegrityError } from '../types/errors.js';
import { getAncestors, getChildren, getSiblings, getTaskById, setTaskFields } from '../queries/task-queries.js';
import { withCompleted } from '../queries/task-helpers.js';
import { getLogger } from '../logger.js';

export type CompletionCause = 'direct' | 'descendant' | 'ancestor';

export interface CompletionChange {
  readonly taskId: TaskId;
  readonly completed: boolean;
  readonly cause: CompletionCause;
}

export interface CascadePlan {
  readonly taskId: TaskId;
  readonly completed: boolean;
  /** State flips in write order: the task itself, then descendants, then ancestors */
  readonly changes: readonly CompletionChange[];
}

/** Descendants not already complete, walked with an explicit stack */
function planDownward(db: TreeDb, root: Task): CompletionChange[] {
  const changes: CompletionChange[] = [];
  const seen = new Set<TaskId>([root.id]);
  const stack: Array<{ task: Task; level: number }> = getChildren(db, root.id).map(task => ({ task, level: 1 }));

  for (let entry = stack.pop(); entry; entry = stack.pop()) {
    const { task, level } = entry;
    if (seen.has(task.id) || level > MAX_DEPTH * 4) {
      throw new TreeIntegrityError(`Child cycle detected below task (${root.id})`);
    }
    seen.add(task.id);

    if (!task.completed) changes.push({ taskId: task.id, completed: true, cause: 'descendant' });
    for (const child of getChildren(db, task.id)) stack.push({ task: child, level: level + 1 });
  }

  return changes;
}

/** Parents completed because every sibling at their level is complete */
function planUpwardComplete(db: TreeDb, task: Task): CompletionChange[] {
  const changes: CompletionChange[] = [];
  let current = task;

  for (const parent of getAncestors(db, task.id)) {
    const siblings = getSiblings(db, current.id);
    if (!siblings.every(s => s.completed)) break;

    if (!parent.completed) changes.push({ taskId: parent.id, completed: true, cause: 'ancestor' });
    current = parent;
  }

  return changes;
}

/** Every ancestor up to the root that is currently complete */
function planUpwardIncomplete(db: TreeDb, task: Task): CompletionChange[] {
  return getAncestors(db, task.id)
    .filter(a => a.completed)
    .map(a => ({ taskId: a.id, completed: false, cause: 'ancestor' as const }));
}

/**
 * Compute every completion flip caused by moving task to the target state.
 * The task's own flip is always first. Reads only.
 */
export function planCascade(db: TreeDb, task: Task, completed: boolean): CascadePlan {
  const changes: CompletionChange[] = [{ taskId: task.id, completed, cause: 'direct' }];

  if (completed) {
    changes.push(...planDownward(db, task));
    changes.push(...planUpwardComplete(db, task));
  } else {
    changes.push(...planUpwardIncomplete(db, task));
  }

  return { taskId: task.id, completed, changes };
}

/**
 * Write a plan. Returns the tasks as they are after the write, in plan order.
 * Must run inside the caller's transaction.
 */
export function applyCascade(db: TreeDb, plan: CascadePlan, now?: Date): Task[] {
  const stamp = now ?? new Date();
  const updated: Task[] = [];

  for (const change of plan.changes) {
    const task = getTaskById(db, change.taskId);
    if (!task) throw new TreeIntegrityError(`Task (${change.taskId}) vanished during cascade`);

    const next = withCompleted(task, change.completed, stamp);
    setTaskFields(db, task.id, { completed: next.completed, completedAt: next.completedAt });
    updated.push(next);
  }

  getLogger('cascade').debug(
    {
      taskId: plan.taskId,
      completed: plan.completed,
      descendants: plan.changes.filter(c => c.cause === 'descendant').length,
      ancestors: plan.changes.filter(c => c.cause === 'ancestor').length,
    },
    'cascade applied',
  );

  return updated;
}

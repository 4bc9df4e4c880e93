/**
 * Depth rules. Depth is always computed by walking parent links, never stored.
 */

import type { TreeDb } from '../db.js';
import type { Task, TaskId } from '../types/task.js';
import type { TreeError } from '../types/errors.js';
import { MAX_DEPTH } from '../types/task.js';
import { cyclicReparent, depthLimitExceeded, TreeIntegrityError } from '../types/errors.js';
import { getAncestors, getChildrenOfMany } from '../queries/task-queries.js';

/** 1 for a top-level task, parent's depth + 1 otherwise */
export function depthOf(db: TreeDb, taskId: TaskId): number {
  return getAncestors(db, taskId).length + 1;
}

/** True iff a new child under parentId would sit at depth MAX_DEPTH or less */
export function canAddChildUnder(db: TreeDb, parentId: TaskId): boolean {
  return depthOf(db, parentId) < MAX_DEPTH;
}

/** Number of levels in the subtree rooted at taskId (1 for a leaf) */
export function subtreeHeight(db: TreeDb, taskId: TaskId): number {
  let height = 0;
  let frontier: TaskId[] = [taskId];

  while (frontier.length > 0) {
    height++;
    if (height > MAX_DEPTH * 4) {
      throw new TreeIntegrityError(`Child cycle detected below task (${taskId})`);
    }
    frontier = getChildrenOfMany(db, frontier).map(t => t.id);
  }

  return height;
}

/** Whether candidateId is taskId itself or sits anywhere below it */
export function isSelfOrDescendant(db: TreeDb, taskId: TaskId, candidateId: TaskId): boolean {
  if (candidateId === taskId) return true;
  return getAncestors(db, candidateId).some(a => a.id === taskId);
}

/**
 * Validate placing task (with its whole subtree) under newParent.
 * Returns the failure, or null if the placement is legal.
 */
export function checkReparent(db: TreeDb, task: Task, newParent: Task): TreeError | null {
  if (isSelfOrDescendant(db, task.id, newParent.id)) {
    return cyclicReparent(task.id, newParent.id);
  }
  if (depthOf(db, newParent.id) + subtreeHeight(db, task.id) > MAX_DEPTH) {
    return depthLimitExceeded(newParent.id);
  }
  return null;
}

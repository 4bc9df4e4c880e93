/**
 * Read models: tasks and lists assembled into nested trees with computed depth.
 */

import { inArray, asc } from 'drizzle-orm';
import type { TreeDb } from '../db.js';
import type { TaskId, ListId, UserId, TaskNode } from '../types/task.js';
import type { ListSummary, ListTree } from '../types/list.js';
import { tasks } from '../schema/tasks.js';
import { depthOf } from '../validators/depth.js';
import { getTaskById, getAllDescendantIds, getTasksInList } from './task-queries.js';
import { getListById, getListsForUser, getListCounts } from './list-queries.js';
import { buildTaskForest, countNodes } from './task-helpers.js';

/** A task with its full subtree, or null if it does not exist */
export function getTaskNode(db: TreeDb, taskId: TaskId): TaskNode | null {
  const task = getTaskById(db, taskId);
  if (!task) return null;

  const descendantIds = getAllDescendantIds(db, taskId);
  const descendants = descendantIds.length > 0
    ? db.select().from(tasks).where(inArray(tasks.id, descendantIds)).orderBy(asc(tasks.sortOrder)).all()
    : [];

  const [node] = buildTaskForest([task, ...descendants], depthOf(db, taskId));
  return node ?? null;
}

/** A list with counts and every task nested under its top-level tasks */
export function getListTree(db: TreeDb, listId: ListId): ListTree | null {
  const list = getListById(db, listId);
  if (!list) return null;

  const forest = buildTaskForest(getTasksInList(db, listId));
  const { total, completed } = countNodes(forest);
  return { ...list, taskCount: total, completedCount: completed, tasks: forest };
}

/** Every list a user owns, with task counts */
export function getListSummaries(db: TreeDb, userId: UserId): ListSummary[] {
  return getListsForUser(db, userId).map(list => ({ ...list, ...getListCounts(db, list.id) }));
}

/**
 * Name uniqueness among siblings and among a user's lists.
 * Comparison is exact and case-sensitive on the trimmed value.
 */

import { eq, and, ne, isNull } from 'drizzle-orm';
import type { TreeDb } from '../db.js';
import type { TaskId, ListId, UserId } from '../types/task.js';
import type { TreeError } from '../types/errors.js';
import { duplicateTaskName, duplicateListName } from '../types/errors.js';
import { tasks } from '../schema/tasks.js';
import { findListByName } from '../queries/list-queries.js';
import { normalizeName } from '../queries/task-helpers.js';

/**
 * Fail with DuplicateName if another task under the same parent (or, with no
 * parent, another top-level task of the same list) already has this title.
 * excludeTaskId skips the task being renamed.
 */
export function checkUniqueSibling(
  db: TreeDb,
  title: string,
  parentId: TaskId | null,
  listId: ListId,
  excludeTaskId?: TaskId,
): TreeError | null {
  const trimmed = normalizeName(title);
  const conditions = [
    eq(tasks.title, trimmed),
    parentId === null
      ? and(isNull(tasks.parentId), eq(tasks.listId, listId))
      : eq(tasks.parentId, parentId),
  ];
  if (excludeTaskId !== undefined) conditions.push(ne(tasks.id, excludeTaskId));

  const clash = db.select({ id: tasks.id }).from(tasks).where(and(...conditions)).get();
  return clash ? duplicateTaskName(trimmed, parentId !== null) : null;
}

/** Fail with DuplicateName if the user already owns another list with this name */
export function checkUniqueListName(db: TreeDb, name: string, userId: UserId, excludeListId?: ListId): TreeError | null {
  const trimmed = normalizeName(name);
  return findListByName(db, userId, trimmed, excludeListId) ? duplicateListName(trimmed) : null;
}

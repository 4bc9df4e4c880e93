/**
 * List reads and primitive writes.
 */

import { eq, and, ne, asc, max, count, sql } from 'drizzle-orm';
import type { TreeDb } from '../db.js';
import type { ListId, UserId } from '../types/task.js';
import type { TodoList } from '../types/list.js';
import { lists } from '../schema/lists.js';
import { tasks } from '../schema/tasks.js';
import { generateId } from './task-helpers.js';

function toList(row: typeof lists.$inferSelect): TodoList {
  return { ...row };
}

/** Get a list by id */
export function getListById(db: TreeDb, listId: ListId): TodoList | null {
  const row = db.select().from(lists).where(eq(lists.id, listId)).get();
  return row ? toList(row) : null;
}

/** Check if a list exists */
export function listExists(db: TreeDb, listId: ListId): boolean {
  return db.select({ id: lists.id }).from(lists).where(eq(lists.id, listId)).get() !== undefined;
}

/** All lists owned by a user, oldest first */
export function getListsForUser(db: TreeDb, userId: UserId): TodoList[] {
  return db.select().from(lists).where(eq(lists.userId, userId)).orderBy(asc(lists.sortOrder)).all().map(toList);
}

/** Find a user's list by exact (trimmed) name, optionally ignoring one list */
export function findListByName(db: TreeDb, userId: UserId, name: string, excludeListId?: ListId): TodoList | null {
  const conditions = [eq(lists.userId, userId), eq(lists.name, name)];
  if (excludeListId !== undefined) conditions.push(ne(lists.id, excludeListId));
  const row = db.select().from(lists).where(and(...conditions)).get();
  return row ? toList(row) : null;
}

/** Task and completed counts for a list */
export function getListCounts(db: TreeDb, listId: ListId): { taskCount: number; completedCount: number } {
  const row = db.select({
    taskCount: count(),
    completedCount: sql<number>`COALESCE(SUM(${tasks.completed}), 0)`,
  }).from(tasks).where(eq(tasks.listId, listId)).get();
  return { taskCount: row?.taskCount ?? 0, completedCount: Number(row?.completedCount ?? 0) };
}

/** Generate a list id not yet present in the store */
export function generateListId(db: TreeDb): ListId {
  let id = generateId();
  while (listExists(db, id)) id = generateId();
  return id;
}

/** Insert a new list at the end of the user's order */
export function insertList(db: TreeDb, userId: UserId, name: string, now?: Date): TodoList {
  const row = db.select({ maxOrder: max(lists.sortOrder) }).from(lists).get();
  const list: TodoList = {
    id: generateListId(db),
    name,
    userId,
    createdAt: (now ?? new Date()).toISOString(),
    sortOrder: (row?.maxOrder ?? -1) + 1,
  };
  db.insert(lists).values(list).run();
  return list;
}

/** Rename a list in place */
export function setListName(db: TreeDb, listId: ListId, name: string): void {
  db.update(lists).set({ name }).where(eq(lists.id, listId)).run();
}

/**
 * Delete a list and every task in it. Does not depend on the foreign_keys pragma.
 * Returns the number of tasks removed.
 */
export function deleteListRow(db: TreeDb, listId: ListId): number {
  // Rows removed through parent_id cascades do not show up in `changes`
  const { taskCount } = getListCounts(db, listId);
  db.delete(tasks).where(eq(tasks.listId, listId)).run();
  db.delete(lists).where(eq(lists.id, listId)).run();
  return taskCount;
}

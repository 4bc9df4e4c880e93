/**
 * Tree Store: task reads and primitive writes using Drizzle ORM.
 *
 * Children are never stored on the parent; they are derived from parent_id
 * through idx_tasks_parent_id. Every read goes straight to the connection,
 * so writes made earlier in the same transaction are always visible.
 */

import { eq, and, ne, asc, max, isNull, inArray, sql } from 'drizzle-orm';
import type { TreeDb } from '../db.js';
import type { Task, TaskId, ListId } from '../types/task.js';
import { MAX_DEPTH } from '../types/task.js';
import { TreeIntegrityError } from '../types/errors.js';
import { tasks } from '../schema/tasks.js';
import { generateId } from './task-helpers.js';

/** Fields that may be written in place through setTaskFields */
export interface TaskFields {
  title: string;
  description: string;
  priority: Task['priority'];
  completed: boolean;
  completedAt: string | null;
  collapsed: boolean;
}

// Any longer ancestor chain means the stored parent links form a cycle
const MAX_WALK = MAX_DEPTH * 4;

// ---------------------------------------------------------------------------
// Row mapper
// ---------------------------------------------------------------------------

function toTask(row: typeof tasks.$inferSelect): Task {
  return { ...row };
}

// ---------------------------------------------------------------------------
// Read queries
// ---------------------------------------------------------------------------

/** Get a single task by ID */
export function getTaskById(db: TreeDb, taskId: TaskId): Task | null {
  const row = db.select().from(tasks).where(eq(tasks.id, taskId)).get();
  return row ? toTask(row) : null;
}

/** Get a task only if it belongs to the given list */
export function getTaskInList(db: TreeDb, taskId: TaskId, listId: ListId): Task | null {
  const row = db.select().from(tasks).where(and(eq(tasks.id, taskId), eq(tasks.listId, listId))).get();
  return row ? toTask(row) : null;
}

/** Direct children of a task, in creation order */
export function getChildren(db: TreeDb, taskId: TaskId): Task[] {
  return db.select().from(tasks).where(eq(tasks.parentId, taskId)).orderBy(asc(tasks.sortOrder)).all().map(toTask);
}

/** Direct children of several tasks at once, in creation order */
export function getChildrenOfMany(db: TreeDb, taskIds: readonly TaskId[]): Task[] {
  if (taskIds.length === 0) return [];
  return db.select().from(tasks).where(inArray(tasks.parentId, [...taskIds])).orderBy(asc(tasks.sortOrder)).all().map(toTask);
}

/** Parent of a task, or null for a top-level (or missing) task */
export function getParent(db: TreeDb, taskId: TaskId): Task | null {
  const task = getTaskById(db, taskId);
  if (!task || task.parentId === null) return null;
  return getTaskById(db, task.parentId);
}

/**
 * Siblings of a task, excluding the task itself: same parent,
 * or, for a top-level task, every other top-level task in its list.
 */
export function getSiblings(db: TreeDb, taskId: TaskId): Task[] {
  const task = getTaskById(db, taskId);
  if (!task) return [];

  const sameParent = task.parentId === null
    ? and(isNull(tasks.parentId), eq(tasks.listId, task.listId))
    : eq(tasks.parentId, task.parentId);

  return db.select().from(tasks)
    .where(and(sameParent, ne(tasks.id, taskId)))
    .orderBy(asc(tasks.sortOrder))
    .all()
    .map(toTask);
}

/** Top-level tasks of a list, in creation order */
export function getTopLevelTasks(db: TreeDb, listId: ListId): Task[] {
  return db.select().from(tasks)
    .where(and(eq(tasks.listId, listId), isNull(tasks.parentId)))
    .orderBy(asc(tasks.sortOrder))
    .all()
    .map(toTask);
}

/** Every task of a list at any depth, in creation order */
export function getTasksInList(db: TreeDb, listId: ListId): Task[] {
  return db.select().from(tasks).where(eq(tasks.listId, listId)).orderBy(asc(tasks.sortOrder)).all().map(toTask);
}

/**
 * Ancestors of a task, nearest first (parent, grandparent, ... root).
 * Throws TreeIntegrityError if the parent links loop.
 */
export function getAncestors(db: TreeDb, taskId: TaskId): Task[] {
  const ancestors: Task[] = [];
  const seen = new Set<TaskId>([taskId]);
  let current = getTaskById(db, taskId);

  while (current && current.parentId !== null) {
    if (seen.has(current.parentId) || ancestors.length >= MAX_WALK) {
      throw new TreeIntegrityError(`Parent cycle detected above task (${taskId})`);
    }
    seen.add(current.parentId);
    const parent = getTaskById(db, current.parentId);
    if (!parent) throw new TreeIntegrityError(`Task (${current.id}) points at missing parent (${current.parentId})`);
    ancestors.push(parent);
    current = parent;
  }

  return ancestors;
}

/** Get all descendant IDs of a task (recursive), nearest levels first */
export function getAllDescendantIds(db: TreeDb, parentId: TaskId): string[] {
  // Recursive CTE — Drizzle doesn't support WITH RECURSIVE
  const rows = db.all<{ id: string }>(sql`
    WITH RECURSIVE descendants(id) AS (
      SELECT id FROM tasks WHERE parent_id = ${parentId}
      UNION
      SELECT t.id FROM tasks t JOIN descendants d ON t.parent_id = d.id
    )
    SELECT id FROM descendants
  `);
  return rows.map(r => r.id);
}

/** Check whether an id is already taken */
export function taskIdExists(db: TreeDb, taskId: TaskId): boolean {
  return db.select({ id: tasks.id }).from(tasks).where(eq(tasks.id, taskId)).get() !== undefined;
}

/** Generate a task id not yet present in the store */
export function generateTaskId(db: TreeDb): TaskId {
  let id = generateId();
  while (taskIdExists(db, id)) id = generateId();
  return id;
}

/** Next creation counter value */
export function nextSortOrder(db: TreeDb): number {
  const row = db.select({ maxOrder: max(tasks.sortOrder) }).from(tasks).get();
  return (row?.maxOrder ?? -1) + 1;
}

// ---------------------------------------------------------------------------
// Write operations
// ---------------------------------------------------------------------------

/** Insert a task into the database */
export function insertTask(db: TreeDb, task: Task): void {
  db.insert(tasks).values({
    id: task.id,
    title: task.title,
    description: task.description,
    completed: task.completed,
    completedAt: task.completedAt,
    priority: task.priority,
    collapsed: task.collapsed,
    createdAt: task.createdAt,
    listId: task.listId,
    parentId: task.parentId,
    sortOrder: task.sortOrder,
  }).run();
}

/** Write a subset of a task's in-place fields */
export function setTaskFields(db: TreeDb, taskId: TaskId, patch: Partial<TaskFields>): void {
  if (Object.keys(patch).length === 0) return;
  db.update(tasks).set(patch).where(eq(tasks.id, taskId)).run();
}

/**
 * Re-point a task at a new parent (or none) and list. Descendants follow
 * the task into the new list so every node's list matches its root's.
 * Callers validate cycles and depth before calling.
 */
export function reparentTask(db: TreeDb, taskId: TaskId, newParentId: TaskId | null, newListId: ListId): void {
  const descendantIds = getAllDescendantIds(db, taskId);

  db.update(tasks).set({ parentId: newParentId, listId: newListId }).where(eq(tasks.id, taskId)).run();
  if (descendantIds.length > 0) {
    db.update(tasks).set({ listId: newListId }).where(inArray(tasks.id, descendantIds)).run();
  }
}

/** Remove a task and every descendant. Returns the removed ids, the task itself first. */
export function deleteSubtree(db: TreeDb, taskId: TaskId): string[] {
  if (!taskIdExists(db, taskId)) return [];

  const removed = [taskId, ...getAllDescendantIds(db, taskId)];
  db.delete(tasks).where(inArray(tasks.id, removed)).run();
  return removed;
}

/**
 * Task mutations: the contract the service layer calls.
 *
 * Each call is one unit of work inside a single IMMEDIATE transaction.
 * Validation failures are returned as typed errors before anything is
 * written; a thrown error rolls back every write of the call.
 * Callers are assumed to have checked ownership already.
 */

import type { TreeDb } from '../db.js';
import { inTransaction } from '../db.js';
import type { Task, TaskId, ListId, TaskNode, TaskUpdate, CreateTaskInput } from '../types/task.js';
import type { MutationResult } from '../types/results.js';
import type { TaskFields } from '../queries/task-queries.js';
import { success, noChange, failure, describeResult } from '../types/results.js';
import { parsePriority, DEFAULT_PRIORITY } from '../types/priority.js';
import {
  taskNotFound, listNotFound, parentNotFound, depthLimitExceeded,
  invalidPriority, invalidMove, invalidName, TreeIntegrityError,
} from '../types/errors.js';
import {
  getTaskById, getTaskInList, insertTask, setTaskFields, reparentTask,
  deleteSubtree, generateTaskId, nextSortOrder,
} from '../queries/task-queries.js';
import { listExists } from '../queries/list-queries.js';
import { getTaskNode } from '../queries/tree-queries.js';
import { createTask as buildTask, normalizeName } from '../queries/task-helpers.js';
import { canAddChildUnder, checkReparent } from '../validators/depth.js';
import { checkUniqueSibling } from '../validators/naming.js';
import { planCascade, applyCascade } from '../cascade/cascade-engine.js';
import { getLogger } from '../logger.js';

export interface CompletionResult {
  /** The toggled task with its refreshed subtree */
  readonly task: TaskNode;
  /** Every task whose completion flipped, the toggled task first */
  readonly updated: readonly Task[];
}

export interface DeleteResult {
  readonly removedIds: readonly TaskId[];
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

/** Read back a node the current transaction just wrote */
function requireNode(db: TreeDb, taskId: TaskId): TaskNode {
  const node = getTaskNode(db, taskId);
  if (!node) throw new TreeIntegrityError(`Task (${taskId}) missing after write`);
  return node;
}

/** Run a mutation in a transaction and log its outcome */
function mutate<T>(db: TreeDb, op: string, fn: () => MutationResult<T>): MutationResult<T> {
  const log = getLogger('mutations');
  try {
    const result = inTransaction(db, fn);
    log.debug({ op, result: result.type }, describeResult(result));
    return result;
  } catch (err: unknown) {
    log.error({ op, err }, 'mutation rolled back');
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Operations
// ---------------------------------------------------------------------------

/** Create a task at the top of a list or under a parent in the same list */
export function createTask(db: TreeDb, input: CreateTaskInput, now?: Date): MutationResult<TaskNode> {
  return mutate(db, 'createTask', () => {
    const title = normalizeName(input.title);
    if (title.length === 0) return failure(invalidName('Task title'));

    const priorityValue = input.priority ?? DEFAULT_PRIORITY;
    const priority = parsePriority(priorityValue);
    if (!priority) return failure(invalidPriority(priorityValue));

    if (!listExists(db, input.listId)) return failure(listNotFound(input.listId));

    const parentId = input.parentId ?? null;
    if (parentId !== null) {
      const parent = getTaskInList(db, parentId, input.listId);
      if (!parent) return failure(parentNotFound(parentId, input.listId));
      if (!canAddChildUnder(db, parentId)) return failure(depthLimitExceeded(parentId));
    }

    const duplicate = checkUniqueSibling(db, title, parentId, input.listId);
    if (duplicate) return failure(duplicate);

    const task = buildTask({
      id: generateTaskId(db),
      title,
      description: input.description ?? '',
      priority,
      listId: input.listId,
      parentId,
      sortOrder: nextSortOrder(db),
    }, now);
    insertTask(db, task);

    const msg = parentId ? `Created subtask (${task.id}) under (${parentId})` : `Created task (${task.id})`;
    return success(requireNode(db, task.id), msg);
  });
}

/** Change any of title, description and priority */
export function updateTask(db: TreeDb, taskId: TaskId, fields: TaskUpdate): MutationResult<TaskNode> {
  return mutate(db, 'updateTask', () => {
    const task = getTaskById(db, taskId);
    if (!task) return failure(taskNotFound(taskId));

    const patch: Partial<TaskFields> = {};

    if (fields.title !== undefined) {
      const title = normalizeName(fields.title);
      if (title.length === 0) return failure(invalidName('Task title'));
      if (title !== task.title) {
        const duplicate = checkUniqueSibling(db, title, task.parentId, task.listId, task.id);
        if (duplicate) return failure(duplicate);
        patch.title = title;
      }
    }

    if (fields.priority !== undefined) {
      const priority = parsePriority(fields.priority);
      if (!priority) return failure(invalidPriority(fields.priority));
      if (priority !== task.priority) patch.priority = priority;
    }

    if (fields.description !== undefined && fields.description !== task.description) {
      patch.description = fields.description;
    }

    if (Object.keys(patch).length === 0) return noChange(`Task (${taskId}) is unchanged`);

    setTaskFields(db, taskId, patch);
    return success(requireNode(db, taskId), `Updated task (${taskId})`);
  });
}

/** Flip one task to the target state inside the caller's transaction */
function completeTo(db: TreeDb, task: Task, completed: boolean, now?: Date): MutationResult<CompletionResult> {
  if (task.completed === completed) {
    return noChange(`Task (${task.id}) is already ${completed ? 'complete' : 'incomplete'}`);
  }

  const plan = planCascade(db, task, completed);
  const updated = applyCascade(db, plan, now);

  const others = updated.length - 1;
  const label = completed ? 'complete' : 'incomplete';
  const msg = others > 0
    ? `Marked (${task.id}) ${label} and updated ${others} related task(s)`
    : `Marked (${task.id}) ${label}`;
  return success({ task: requireNode(db, task.id), updated }, msg);
}

/** Move a task to an explicit completion state and run the cascade */
export function setCompletion(db: TreeDb, taskId: TaskId, completed: boolean, now?: Date): MutationResult<CompletionResult> {
  return mutate(db, 'setCompletion', () => {
    const task = getTaskById(db, taskId);
    if (!task) return failure(taskNotFound(taskId));
    return completeTo(db, task, completed, now);
  });
}

/** Flip a task's completion state and run the cascade */
export function toggleCompletion(db: TreeDb, taskId: TaskId, now?: Date): MutationResult<CompletionResult> {
  return mutate(db, 'toggleCompletion', () => {
    const task = getTaskById(db, taskId);
    if (!task) return failure(taskNotFound(taskId));
    return completeTo(db, task, !task.completed, now);
  });
}

/** Set the UI collapse flag, or flip it when collapsed is omitted. No cascade. */
export function setCollapsed(db: TreeDb, taskId: TaskId, collapsed?: boolean): MutationResult<Task> {
  return mutate(db, 'setCollapsed', () => {
    const task = getTaskById(db, taskId);
    if (!task) return failure(taskNotFound(taskId));

    const next = collapsed ?? !task.collapsed;
    if (next === task.collapsed) return noChange(`Task (${taskId}) is already ${next ? 'collapsed' : 'expanded'}`);

    setTaskFields(db, taskId, { collapsed: next });
    return success({ ...task, collapsed: next }, `${next ? 'Collapsed' : 'Expanded'} task (${taskId})`);
  });
}

/** Move a top-level task, with its whole subtree, to another list */
export function moveTask(db: TreeDb, taskId: TaskId, newListId: ListId): MutationResult<TaskNode> {
  return mutate(db, 'moveTask', () => {
    const task = getTaskById(db, taskId);
    if (!task) return failure(taskNotFound(taskId));
    if (!listExists(db, newListId)) return failure(listNotFound(newListId));
    if (task.parentId !== null) return failure(invalidMove(taskId));
    if (task.listId === newListId) return noChange(`Task (${taskId}) is already in list ${newListId}`);

    reparentTask(db, taskId, null, newListId);
    const node = requireNode(db, taskId);
    const msg = node.subtaskCount > 0
      ? `Moved (${taskId}) and its subtasks to list ${newListId}`
      : `Moved (${taskId}) to list ${newListId}`;
    return success(node, msg);
  });
}

/**
 * Re-parent a task inside its own list, or make it top-level with null.
 * Name uniqueness and completion are left as they are.
 */
export function setParent(db: TreeDb, taskId: TaskId, parentId: TaskId | null): MutationResult<TaskNode> {
  return mutate(db, 'setParent', () => {
    const task = getTaskById(db, taskId);
    if (!task) return failure(taskNotFound(taskId));
    if (task.parentId === parentId) {
      return noChange(parentId ? `(${taskId}) is already a subtask of (${parentId})` : `(${taskId}) is already top-level`);
    }

    if (parentId !== null) {
      const parent = getTaskInList(db, parentId, task.listId);
      if (!parent) return failure(parentNotFound(parentId, task.listId));
      const invalid = checkReparent(db, task, parent);
      if (invalid) return failure(invalid);
    }

    reparentTask(db, taskId, parentId, task.listId);
    const msg = parentId ? `Set (${taskId}) as subtask of (${parentId})` : `Made (${taskId}) a top-level task`;
    return success(requireNode(db, taskId), msg);
  });
}

/** Delete a task and its whole subtree. Not a completion event: no cascade runs. */
export function deleteTask(db: TreeDb, taskId: TaskId): MutationResult<DeleteResult> {
  return mutate(db, 'deleteTask', () => {
    const removedIds = deleteSubtree(db, taskId);
    if (removedIds.length === 0) return failure(taskNotFound(taskId));

    const msg = removedIds.length > 1
      ? `Deleted task (${taskId}) and ${removedIds.length - 1} subtask(s)`
      : `Deleted task (${taskId})`;
    return success({ removedIds }, msg);
  });
}

import type { TaskId, ListId } from './task.js';
import { MAX_DEPTH } from './task.js';

export const ErrorKind = {
  NotFound: 'NotFound',
  DepthLimitExceeded: 'DepthLimitExceeded',
  DuplicateName: 'DuplicateName',
  InvalidPriority: 'InvalidPriority',
  InvalidMove: 'InvalidMove',
  CyclicReparent: 'CyclicReparent',
  InvalidName: 'InvalidName',
} as const;

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

export type TreeError =
  | { readonly kind: typeof ErrorKind.NotFound; readonly entity: 'task' | 'list'; readonly id: string; readonly message: string }
  | { readonly kind: typeof ErrorKind.DepthLimitExceeded; readonly taskId: TaskId; readonly maxDepth: number; readonly message: string }
  | { readonly kind: typeof ErrorKind.DuplicateName; readonly name: string; readonly message: string }
  | { readonly kind: typeof ErrorKind.InvalidPriority; readonly value: string; readonly message: string }
  | { readonly kind: typeof ErrorKind.InvalidMove; readonly taskId: TaskId; readonly message: string }
  | { readonly kind: typeof ErrorKind.CyclicReparent; readonly taskId: TaskId; readonly parentId: TaskId; readonly message: string }
  | { readonly kind: typeof ErrorKind.InvalidName; readonly message: string };

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

export function taskNotFound(id: TaskId): TreeError {
  return { kind: ErrorKind.NotFound, entity: 'task', id, message: `Task not found: ${id}` };
}

export function listNotFound(id: ListId): TreeError {
  return { kind: ErrorKind.NotFound, entity: 'list', id, message: `List not found: ${id}` };
}

export function parentNotFound(id: TaskId, listId: ListId): TreeError {
  return { kind: ErrorKind.NotFound, entity: 'task', id, message: `Parent task (${id}) not found in list ${listId}` };
}

export function depthLimitExceeded(taskId: TaskId): TreeError {
  return {
    kind: ErrorKind.DepthLimitExceeded,
    taskId,
    maxDepth: MAX_DEPTH,
    message: `Maximum depth of ${MAX_DEPTH} levels reached under (${taskId})`,
  };
}

export function duplicateTaskName(name: string, isSubtask: boolean): TreeError {
  const message = isSubtask
    ? `A subtask named "${name}" already exists here`
    : `A task named "${name}" already exists in this list`;
  return { kind: ErrorKind.DuplicateName, name, message };
}

export function duplicateListName(name: string): TreeError {
  return { kind: ErrorKind.DuplicateName, name, message: `You already have a list named "${name}"` };
}

export function invalidPriority(value: string): TreeError {
  return { kind: ErrorKind.InvalidPriority, value, message: `Invalid priority '${value}'. Use low, medium or high.` };
}

export function invalidMove(taskId: TaskId): TreeError {
  return {
    kind: ErrorKind.InvalidMove,
    taskId,
    message: `Only top-level tasks can be moved between lists. (${taskId}) is a subtask.`,
  };
}

export function cyclicReparent(taskId: TaskId, parentId: TaskId): TreeError {
  const message = taskId === parentId
    ? `A task cannot be its own parent (${taskId})`
    : `Circular reference: (${parentId}) is a descendant of (${taskId})`;
  return { kind: ErrorKind.CyclicReparent, taskId, parentId, message };
}

export function invalidName(what: 'Task title' | 'List name'): TreeError {
  return { kind: ErrorKind.InvalidName, message: `${what} cannot be empty` };
}

/**
 * Thrown when stored data breaks a structural invariant the engine relies on
 * (a parent cycle, a row that vanished mid-transaction). Rolls the enclosing
 * transaction back; never used for request validation.
 */
export class TreeIntegrityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TreeIntegrityError';
  }
}

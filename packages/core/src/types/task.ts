import type { Priority } from './priority.js';

/** Simple aliases for documentation; ids are opaque strings */
export type TaskId = string;
export type ListId = string;
export type UserId = string;

/** Hard cap on nesting. Top-level tasks are depth 1. */
export const MAX_DEPTH = 5;

export interface Task {
  readonly id: TaskId;
  readonly title: string;
  readonly description: string;
  readonly completed: boolean;
  readonly completedAt: string | null; // ISO string
  readonly priority: Priority;
  readonly collapsed: boolean;
  readonly createdAt: string; // ISO string
  readonly listId: ListId;
  readonly parentId: TaskId | null;
  /** Creation counter; siblings are returned in ascending order */
  readonly sortOrder: number;
}

/** A task together with its computed position in the tree */
export interface TaskNode extends Task {
  readonly depth: number;
  readonly subtaskCount: number;
  readonly subtasks: readonly TaskNode[];
}

/** Fields a caller may change through updateTask. Parent and list go through setParent / moveTask. */
export interface TaskUpdate {
  readonly title?: string;
  readonly description?: string;
  readonly priority?: string;
}

export interface CreateTaskInput {
  readonly listId: ListId;
  readonly title: string;
  readonly description?: string;
  /** Validated against the Priority enum; defaults to medium */
  readonly priority?: string;
  readonly parentId?: TaskId | null;
}

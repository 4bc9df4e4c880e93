import type { ListId, UserId, TaskNode } from './task.js';

export interface TodoList {
  readonly id: ListId;
  readonly name: string;
  readonly userId: UserId;
  readonly createdAt: string; // ISO string
  readonly sortOrder: number;
}

export interface ListSummary extends TodoList {
  readonly taskCount: number;
  readonly completedCount: number;
}

export interface ListTree extends ListSummary {
  /** Top-level tasks, each with its nested subtasks */
  readonly tasks: readonly TaskNode[];
}

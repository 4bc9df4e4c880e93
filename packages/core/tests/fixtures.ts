import type { TreeDb } from '../src/db.js';
import type { MutationResult } from '../src/types/results.js';
import type { Task, TaskId, ListId, TaskNode } from '../src/types/task.js';
import type { TodoList } from '../src/types/list.js';
import { describeResult } from '../src/types/results.js';
import { createTask } from '../src/mutations/task-mutations.js';
import { createList } from '../src/mutations/list-mutations.js';
import { getTaskById } from '../src/queries/task-queries.js';

export function unwrap<T>(result: MutationResult<T>): T {
  if (result.type !== 'success') throw new Error(`expected success, got ${describeResult(result)}`);
  return result.data;
}

export function addList(db: TreeDb, name = 'Home', userId = 'alice'): TodoList {
  return unwrap(createList(db, userId, name));
}

export function addTask(db: TreeDb, listId: ListId, title: string, parentId?: TaskId): TaskNode {
  return unwrap(createTask(db, { listId, title, parentId }));
}

/** Nested chain of tasks named L1..Ln, outermost first */
export function addChain(db: TreeDb, listId: ListId, length: number): TaskNode[] {
  const chain: TaskNode[] = [];
  for (let i = 1; i <= length; i++) {
    chain.push(addTask(db, listId, `L${i}`, chain[chain.length - 1]?.id));
  }
  return chain;
}

export function mustGet(db: TreeDb, taskId: TaskId): Task {
  const task = getTaskById(db, taskId);
  if (!task) throw new Error(`task ${taskId} missing`);
  return task;
}

export function isDone(db: TreeDb, taskId: TaskId): boolean {
  return mustGet(db, taskId).completed;
}

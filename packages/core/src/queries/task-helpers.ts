import type { TaskId, ListId, Task, TaskNode } from '../types/task.js';
import type { Priority } from '../types/priority.js';

const ID_CHARS = '0123456789abcdefghijklmnopqrstuvwxyz';
const ID_LENGTH = 8;

/** Generate a random 8-character id (tasks and lists share the format) */
export function generateId(): string {
  let id = '';
  for (let i = 0; i < ID_LENGTH; i++) {
    id += ID_CHARS[Math.floor(Math.random() * ID_CHARS.length)];
  }
  return id;
}

/** Build a new, incomplete Task object. Title and description are expected to be trimmed already. */
export function createTask(
  fields: { id: TaskId; title: string; description: string; priority: Priority; listId: ListId; parentId: TaskId | null; sortOrder: number },
  now?: Date,
): Task {
  return {
    ...fields,
    completed: false,
    completedAt: null,
    collapsed: false,
    createdAt: (now ?? new Date()).toISOString(),
  };
}

/** Return a copy of the task with a new completion state (stamps completedAt on completion) */
export function withCompleted(task: Task, completed: boolean, now?: Date): Task {
  if (task.completed === completed) return task;
  return {
    ...task,
    completed,
    completedAt: completed ? (now ?? new Date()).toISOString() : null,
  };
}

/** Collapse whitespace at both ends; the stored form of every title and list name */
export function normalizeName(name: string): string {
  return name.trim();
}

/**
 * Assemble nested nodes from a flat set of tasks.
 * Tasks whose parent is not in the set become roots at rootDepth.
 * Children keep the order of the input (callers pass tasks sorted by sortOrder).
 */
export function buildTaskForest(flat: readonly Task[], rootDepth = 1): TaskNode[] {
  const ids = new Set(flat.map(t => t.id));
  const childrenOf = new Map<TaskId, Task[]>();
  const roots: Task[] = [];

  for (const task of flat) {
    if (task.parentId !== null && ids.has(task.parentId)) {
      const siblings = childrenOf.get(task.parentId);
      if (siblings) siblings.push(task);
      else childrenOf.set(task.parentId, [task]);
    } else {
      roots.push(task);
    }
  }

  const toNode = (task: Task, depth: number): TaskNode => {
    const children = childrenOf.get(task.id) ?? [];
    return {
      ...task,
      depth,
      subtaskCount: children.length,
      subtasks: children.map(child => toNode(child, depth + 1)),
    };
  };

  return roots.map(root => toNode(root, rootDepth));
}

/** Count every node in a forest, including nested subtasks */
export function countNodes(nodes: readonly TaskNode[]): { total: number; completed: number } {
  let total = 0;
  let completed = 0;
  const stack = [...nodes];
  for (let node = stack.pop(); node; node = stack.pop()) {
    total++;
    if (node.completed) completed++;
    stack.push(...node.subtasks);
  }
  return { total, completed };
}

export { Priority, PriorityName, PRIORITIES, DEFAULT_PRIORITY, parsePriority } from './priority.js';
export { MAX_DEPTH } from './task.js';
export type { TaskId, ListId, UserId, Task, TaskNode, TaskUpdate, CreateTaskInput } from './task.js';
export type { TodoList, ListSummary, ListTree } from './list.js';
export { ErrorKind, TreeIntegrityError } from './errors.js';
export type { TreeError } from './errors.js';
export type { MutationResult } from './results.js';
export { isSuccess, isError, describeResult } from './results.js';

// Task helpers
export {
  generateId,
  createTask as buildTask,
  withCompleted,
  normalizeName,
  buildTaskForest,
  countNodes,
} from './task-helpers.js';

// Task queries
export {
  getTaskById,
  getTaskInList,
  getChildren,
  getChildrenOfMany,
  getParent,
  getSiblings,
  getTopLevelTasks,
  getTasksInList,
  getAncestors,
  getAllDescendantIds,
  taskIdExists,
  generateTaskId,
  nextSortOrder,
  insertTask,
  setTaskFields,
  reparentTask,
  deleteSubtree,
} from './task-queries.js';
export type { TaskFields } from './task-queries.js';

// List queries
export {
  getListById,
  listExists,
  getListsForUser,
  findListByName,
  getListCounts,
  generateListId,
  insertList,
  setListName,
  deleteListRow,
} from './list-queries.js';

// Tree read models
export { getTaskNode, getListTree, getListSummaries } from './tree-queries.js';

// Config queries
export {
  getConfig,
  setConfig,
  unsetConfig,
  getDefaultUser,
  setDefaultUser,
  getDefaultListId,
  setDefaultListId,
  clearDefaultListId,
} from './config-queries.js';

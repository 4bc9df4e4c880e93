// Database
export { createDb, createTestDb, getRawDb, inTransaction, withRetry, getDbPath, CREATE_SCHEMA_SQL } from './db.js';
export type { TreeDb } from './db.js';

// Configuration and logging
export { loadConfig, getDefaultDbPath, isLogLevel, LOG_LEVELS, DEFAULT_LOG_LEVEL } from './config.js';
export type { TreeConfig, LogLevel } from './config.js';
export { initLogger, getLogger, isLoggerInitialized, closeLogger } from './logger.js';
export type { LoggerConfig } from './logger.js';

// Schema
export * as schema from './schema/index.js';

// Types
export * from './types/index.js';

// Queries
export * from './queries/index.js';

// Validators
export { depthOf, canAddChildUnder, subtreeHeight, isSelfOrDescendant, checkReparent } from './validators/depth.js';
export { checkUniqueSibling, checkUniqueListName } from './validators/naming.js';

// Cascade
export { planCascade, applyCascade } from './cascade/cascade-engine.js';
export type { CascadePlan, CompletionChange, CompletionCause } from './cascade/cascade-engine.js';

// Mutations
export {
  createTask,
  updateTask,
  setCompletion,
  toggleCompletion,
  setCollapsed,
  moveTask,
  setParent,
  deleteTask,
} from './mutations/task-mutations.js';
export type { CompletionResult, DeleteResult } from './mutations/task-mutations.js';
export { createList, renameList, deleteList } from './mutations/list-mutations.js';
export type { DeleteListResult } from './mutations/list-mutations.js';

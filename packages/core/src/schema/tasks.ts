import { sqliteTable, text, integer, index, type AnySQLiteColumn } from 'drizzle-orm/sqlite-core';
import { PRIORITIES } from '../types/priority.js';
import { lists } from './lists.js';

export const tasks = sqliteTable('tasks', {
  id: text('id').primaryKey(),
  title: text('title').notNull(),
  description: text('description').notNull().default(''),
  completed: integer('completed', { mode: 'boolean' }).notNull().default(false),
  /** Frozen when the task becomes complete, cleared when it is reopened */
  completedAt: text('completed_at'),
  priority: text('priority', { enum: PRIORITIES }).notNull().default('medium'),
  /** UI-only; no effect on cascades */
  collapsed: integer('collapsed', { mode: 'boolean' }).notNull().default(false),
  createdAt: text('created_at').notNull(),
  listId: text('list_id').notNull().references(() => lists.id, { onDelete: 'cascade' }),
  parentId: text('parent_id').references((): AnySQLiteColumn => tasks.id, { onDelete: 'cascade' }),
  /** Creation counter. Children are derived from parent_id and ordered by this */
  sortOrder: integer('sort_order').notNull().default(0),
}, (table) => [
  index('idx_tasks_list_id').on(table.listId),
  index('idx_tasks_parent_id').on(table.parentId),
  index('idx_tasks_completed').on(table.completed),
]);

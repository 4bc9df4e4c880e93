import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';

export const lists = sqliteTable('lists', {
  id: text('id').primaryKey(),
  name: text('name').notNull(),
  userId: text('user_id').notNull(),
  createdAt: text('created_at').notNull(),
  /** Highest value = most recently created */
  sortOrder: integer('sort_order').notNull().default(0),
}, (table) => [
  index('idx_lists_user_id').on(table.userId),
]);

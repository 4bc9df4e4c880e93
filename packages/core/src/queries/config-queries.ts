/**
 * Key-value config storage operations.
 */

import { eq } from 'drizzle-orm';
import type { TreeDb } from '../db.js';
import type { ListId, UserId } from '../types/task.js';
import { config } from '../schema/config.js';

const DEFAULT_USER_KEY = 'default_user';
const DEFAULT_LIST_PREFIX = 'default_list:';

function defaultListKey(userId: UserId): string {
  return `${DEFAULT_LIST_PREFIX}${userId}`;
}

/** Get a config value by key */
export function getConfig(db: TreeDb, key: string): string | null {
  const row = db.select({ value: config.value }).from(config).where(eq(config.key, key)).get();
  return row?.value ?? null;
}

/** Set a config value */
export function setConfig(db: TreeDb, key: string, value: string): void {
  db.insert(config).values({ key, value })
    .onConflictDoUpdate({ target: config.key, set: { value } })
    .run();
}

/** Remove a config value */
export function unsetConfig(db: TreeDb, key: string): void {
  db.delete(config).where(eq(config.key, key)).run();
}

/** Get the user the CLI acts as, if one was stored */
export function getDefaultUser(db: TreeDb): UserId | null {
  return getConfig(db, DEFAULT_USER_KEY);
}

/** Set the user the CLI acts as */
export function setDefaultUser(db: TreeDb, userId: UserId): void {
  setConfig(db, DEFAULT_USER_KEY, userId);
}

/** Get a user's default list id for new tasks */
export function getDefaultListId(db: TreeDb, userId: UserId): ListId | null {
  return getConfig(db, defaultListKey(userId));
}

/** Set a user's default list id for new tasks */
export function setDefaultListId(db: TreeDb, userId: UserId, listId: ListId): void {
  setConfig(db, defaultListKey(userId), listId);
}

/** Clear a user's default list id */
export function clearDefaultListId(db: TreeDb, userId: UserId): void {
  unsetConfig(db, defaultListKey(userId));
}

import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema/index.js';
import { dirname } from 'node:path';
import { mkdirSync } from 'node:fs';
import { getDefaultDbPath } from './config.js';
import { getLogger } from './logger.js';

export type TreeDb = BetterSQLite3Database<typeof schema> & { $client: Database.Database };

/** The raw SQL to create the schema from scratch (for new databases and tests) */
export const CREATE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS lists (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    user_id TEXT NOT NULL,
    created_at TEXT NOT NULL,
    sort_order INTEGER NOT NULL DEFAULT 0
);

CREATE INDEX IF NOT EXISTS idx_lists_user_id ON lists(user_id);

CREATE TABLE IF NOT EXISTS tasks (
    id TEXT PRIMARY KEY,
    title TEXT NOT NULL,
    description TEXT NOT NULL DEFAULT '',
    completed INTEGER NOT NULL DEFAULT 0,
    completed_at TEXT,
    priority TEXT NOT NULL DEFAULT 'medium' CHECK (priority IN ('low', 'medium', 'high')),
    collapsed INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    list_id TEXT NOT NULL REFERENCES lists(id) ON DELETE CASCADE,
    parent_id TEXT REFERENCES tasks(id) ON DELETE CASCADE,
    sort_order INTEGER NOT NULL DEFAULT 0,
    CHECK (parent_id IS NULL OR parent_id != id)
);

CREATE INDEX IF NOT EXISTS idx_tasks_list_id ON tasks(list_id);
CREATE INDEX IF NOT EXISTS idx_tasks_parent_id ON tasks(parent_id);
CREATE INDEX IF NOT EXISTS idx_tasks_completed ON tasks(completed);

CREATE TABLE IF NOT EXISTS config (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
);
`;

/**
 * Create a Drizzle database connection with proper pragmas.
 * If no path is given, uses the platform default.
 * Pass ':memory:' for in-memory databases (tests).
 */
export function createDb(path?: string): TreeDb {
  const dbPath = path ?? getDefaultDbPath();

  // Ensure directory exists for file-based databases
  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const sqlite = new Database(dbPath);

  // Set pragmas — must happen on every connection
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');
  sqlite.pragma('busy_timeout = 5000');

  // Idempotent, every statement uses IF NOT EXISTS
  sqlite.exec(CREATE_SCHEMA_SQL);

  getLogger('store').debug({ dbPath }, 'database opened');
  return drizzle(sqlite, { schema });
}

/**
 * Create an in-memory database with schema applied. For tests.
 */
export function createTestDb(): TreeDb {
  return createDb(':memory:');
}

/**
 * Get the raw Database instance from a Drizzle instance.
 * Useful for operations not supported by Drizzle (recursive CTEs, transactions, pragmas).
 */
export function getRawDb(db: TreeDb): Database.Database {
  return db.$client;
}

/**
 * Run fn inside a BEGIN IMMEDIATE transaction. The write lock is taken before
 * the first read, so a mutation's reads never interleave with another writer.
 * A throw rolls back every write made by fn and is re-thrown.
 */
export function inTransaction<T>(db: TreeDb, fn: () => T): T {
  const raw = getRawDb(db);
  if (raw.inTransaction) return fn();
  return raw.transaction(fn).immediate();
}

/** Sleep utility for retry logic */
function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function isBusyError(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'SQLITE_BUSY';
}

/**
 * Retry wrapper with exponential backoff for SQLITE_BUSY errors.
 * Wraps write operations that may fail under concurrent access.
 */
export async function withRetry<T>(fn: () => T, maxRetries = 3): Promise<T> {
  for (let i = 0; i < maxRetries; i++) {
    try {
      return fn();
    } catch (err: unknown) {
      if (isBusyError(err) && i < maxRetries - 1) {
        getLogger('store').warn({ attempt: i + 1 }, 'database busy, retrying');
        await sleep(100 * Math.pow(2, i)); // 100ms, 200ms, 400ms
        continue;
      }
      throw err;
    }
  }
  throw new Error('withRetry: max retries exceeded');
}

/**
 * Get the file path of the database.
 * In-memory databases report an empty string.
 */
export function getDbPath(db: TreeDb): string {
  const raw = getRawDb(db);
  const list = raw.pragma('database_list') as Array<{ file: string }>;
  return list[0]?.file ?? '';
}

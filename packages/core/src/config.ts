/**
 * Runtime configuration resolved from the environment.
 *
 * Resolution priority: environment variables > platform defaults.
 * Persisted per-database settings live in the config table (see queries/config-queries.ts).
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

export interface TreeConfig {
  dbPath: string;
  logLevel: LogLevel;
}

/** Returns the platform-appropriate default database path */
export function getDefaultDbPath(env: NodeJS.ProcessEnv = process.env, platform: NodeJS.Platform = process.platform): string {
  let dir: string;

  if (platform === 'darwin') {
    dir = join(homedir(), 'Library', 'Application Support', 'tasktree');
  } else if (platform === 'win32') {
    dir = join(env['APPDATA'] ?? join(homedir(), 'AppData', 'Roaming'), 'tasktree');
  } else {
    // Linux / other
    dir = join(env['XDG_DATA_HOME'] ?? join(homedir(), '.local', 'share'), 'tasktree');
  }

  return join(dir, 'tasktree.db');
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/** Resolve configuration from environment variables, falling back to defaults */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): TreeConfig {
  const dbPath = env['TASKTREE_DB'] || getDefaultDbPath(env);

  const rawLevel = env['TASKTREE_LOG_LEVEL']?.trim().toLowerCase();
  const logLevel = rawLevel && isLogLevel(rawLevel) ? rawLevel : DEFAULT_LOG_LEVEL;

  return { dbPath, logLevel };
}

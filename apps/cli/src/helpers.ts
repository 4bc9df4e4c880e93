import { userInfo } from 'node:os';
import type { Command } from 'commander';
import type { TreeDb, Task, TodoList, UserId } from '@tasktree/core';
import {
  Priority, getDefaultUser, getDefaultListId, getListById,
  findListByName, getTaskById, getLogger,
} from '@tasktree/core';
import * as out from './output.js';

/** Options every command may read through optsWithGlobals */
export type GlobalOpts = {
  user?: string;
};

/** A refusal from the CLI itself: printed without a stack trace */
export class CliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliError';
  }
}

/** --user, then the stored default user, then the OS account name */
export function resolveUser(db: TreeDb, explicit?: string, osUser: () => string = () => userInfo().username): UserId {
  const trimmed = explicit?.trim();
  if (trimmed) return trimmed;
  return getDefaultUser(db) ?? osUser();
}

/** The acting user for a command */
export function actingUser(db: TreeDb, cmd: Command): UserId {
  return resolveUser(db, cmd.optsWithGlobals<GlobalOpts>().user);
}

/** The user's default list, or null when unset, deleted or not theirs */
export function getOwnedDefaultList(db: TreeDb, userId: UserId): TodoList | null {
  const defaultId = getDefaultListId(db, userId);
  const list = defaultId ? getListById(db, defaultId) : null;
  return list && list.userId === userId ? list : null;
}

/**
 * Find a list the user owns, by id or by name.
 * Without a reference, falls back to the default list.
 * Lists owned by someone else are reported as missing.
 */
export function resolveOwnedList(db: TreeDb, userId: UserId, ref?: string): TodoList {
  if (ref === undefined) {
    const fallback = getOwnedDefaultList(db, userId);
    if (!fallback) {
      throw new CliError('No list given and no default list set. Use: tasktree lists use <list>');
    }
    return fallback;
  }

  const byId = getListById(db, ref);
  if (byId && byId.userId === userId) return byId;

  const byName = findListByName(db, userId, ref.trim());
  if (byName) return byName;

  throw new CliError(`List not found: ${ref}`);
}

/** Find a task in one of the user's lists */
export function resolveOwnedTask(db: TreeDb, userId: UserId, taskId: string): Task {
  const task = getTaskById(db, taskId);
  const list = task ? getListById(db, task.listId) : null;
  if (!task || !list || list.userId !== userId) {
    throw new CliError(`Task not found: ${taskId}`);
  }
  return task;
}

/** Parse a priority string (high/h/1/p1, medium/m/2/p2, low/l/3/p3) */
export function parsePriorityArg(value: string): Priority | null {
  switch (value.trim().toLowerCase()) {
    case 'high': case 'h': case '1': case 'p1':
      return Priority.High;
    case 'medium': case 'm': case '2': case 'p2':
      return Priority.Medium;
    case 'low': case 'l': case '3': case 'p3':
      return Priority.Low;
    default:
      return null;
  }
}

/** Run a command body, printing any thrown error and exiting with 1 */
export async function $try(fn: () => void | Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err: unknown) {
    if (err instanceof CliError) {
      out.error(err.message);
    } else {
      getLogger('cli').error({ err }, 'command failed');
      out.error(err instanceof Error ? err.message : String(err));
    }
    process.exitCode = 1;
  }
}

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createTestDb, createList, createTask, setDefaultUser, setDefaultListId, Priority } from '@tasktree/core';
import type { TreeDb, TodoList, TaskNode, MutationResult } from '@tasktree/core';
import {
  resolveUser,
  resolveOwnedList,
  resolveOwnedTask,
  getOwnedDefaultList,
  parsePriorityArg,
  CliError,
  $try,
} from '../src/helpers.js';

function unwrap<T>(result: MutationResult<T>): T {
  if (result.type !== 'success') throw new Error(`expected success, got ${result.type}`);
  return result.data;
}

let db: TreeDb;

beforeEach(() => {
  db = createTestDb();
});

afterEach(() => {
  process.exitCode = undefined;
  vi.restoreAllMocks();
});

describe('resolveUser', () => {
  it('prefers the explicit user', () => {
    setDefaultUser(db, 'bob');
    expect(resolveUser(db, ' alice ', () => 'os-user')).toBe('alice');
  });

  it('falls back to the stored default user', () => {
    setDefaultUser(db, 'bob');
    expect(resolveUser(db, undefined, () => 'os-user')).toBe('bob');
  });

  it('falls back to the OS account name', () => {
    expect(resolveUser(db, '  ', () => 'os-user')).toBe('os-user');
  });
});

describe('resolveOwnedList', () => {
  let home: TodoList;

  beforeEach(() => {
    home = unwrap(createList(db, 'alice', 'Home'));
    unwrap(createList(db, 'bob', 'Garage'));
  });

  it('finds a list by id', () => {
    expect(resolveOwnedList(db, 'alice', home.id).name).toBe('Home');
  });

  it('finds a list by name', () => {
    expect(resolveOwnedList(db, 'alice', 'Home').id).toBe(home.id);
  });

  it('hides lists owned by someone else', () => {
    expect(() => resolveOwnedList(db, 'bob', home.id)).toThrow(new CliError(`List not found: ${home.id}`));
    expect(() => resolveOwnedList(db, 'alice', 'Garage')).toThrow('List not found: Garage');
  });

  it('uses the default list without a reference', () => {
    setDefaultListId(db, 'alice', home.id);
    expect(resolveOwnedList(db, 'alice').id).toBe(home.id);
  });

  it('refuses a missing or foreign default list', () => {
    expect(() => resolveOwnedList(db, 'alice')).toThrow(CliError);
    setDefaultListId(db, 'bob', home.id);
    expect(() => resolveOwnedList(db, 'bob')).toThrow(CliError);
  });
});

describe('getOwnedDefaultList', () => {
  it('ignores a stored default that belongs to someone else', () => {
    const home = unwrap(createList(db, 'alice', 'Home'));
    setDefaultListId(db, 'bob', home.id);

    expect(getOwnedDefaultList(db, 'bob')).toBeNull();
    expect(getOwnedDefaultList(db, 'alice')).toBeNull();

    setDefaultListId(db, 'alice', home.id);
    expect(getOwnedDefaultList(db, 'alice')?.id).toBe(home.id);
  });
});

describe('resolveOwnedTask', () => {
  let task: TaskNode;

  beforeEach(() => {
    const home = unwrap(createList(db, 'alice', 'Home'));
    task = unwrap(createTask(db, { listId: home.id, title: 'Groceries' }));
  });

  it('returns a task in one of the user lists', () => {
    expect(resolveOwnedTask(db, 'alice', task.id).title).toBe('Groceries');
  });

  it('hides tasks of other users', () => {
    expect(() => resolveOwnedTask(db, 'bob', task.id)).toThrow(`Task not found: ${task.id}`);
  });

  it('reports unknown ids', () => {
    expect(() => resolveOwnedTask(db, 'alice', 'nope')).toThrow('Task not found: nope');
  });
});

describe('parsePriorityArg', () => {
  it('parses names, letters and numbers', () => {
    expect(parsePriorityArg('high')).toBe(Priority.High);
    expect(parsePriorityArg('p1')).toBe(Priority.High);
    expect(parsePriorityArg('M')).toBe(Priority.Medium);
    expect(parsePriorityArg('2')).toBe(Priority.Medium);
    expect(parsePriorityArg(' low ')).toBe(Priority.Low);
    expect(parsePriorityArg('3')).toBe(Priority.Low);
  });

  it('returns null for unknown', () => {
    expect(parsePriorityArg('critical')).toBeNull();
  });
});

describe('$try', () => {
  it('calls the wrapped function', async () => {
    const fn = vi.fn();
    await $try(fn);
    expect(fn).toHaveBeenCalledOnce();
    expect(process.exitCode).toBeUndefined();
  });

  it('prints the error and sets the exit code', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    await $try(() => {
      throw new CliError('test error');
    });

    expect(errorSpy).toHaveBeenCalledOnce();
    expect(String(errorSpy.mock.calls[0]?.[0])).toContain('test error');
    expect(process.exitCode).toBe(1);
  });

  it('catches rejected promises', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});

    await $try(async () => {
      throw new Error('async failure');
    });

    expect(process.exitCode).toBe(1);
  });
});

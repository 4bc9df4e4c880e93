import { describe, it, expect, beforeEach } from 'vitest';
import { createTestDb, type TreeDb } from '../../src/db.js';
import { checkUniqueSibling, checkUniqueListName } from '../../src/validators/naming.js';
import { createTask } from '../../src/mutations/task-mutations.js';
import { ErrorKind } from '../../src/types/errors.js';
import { addList, addTask } from '../fixtures.js';

let db: TreeDb;
let listId: string;

beforeEach(() => {
  db = createTestDb();
  listId = addList(db).id;
});

describe('checkUniqueSibling', () => {
  it('reports a top-level clash in the same list', () => {
    addTask(db, listId, 'Groceries');

    const error = checkUniqueSibling(db, 'Groceries', null, listId);
    expect(error).toEqual({
      kind: ErrorKind.DuplicateName,
      name: 'Groceries',
      message: 'A task named "Groceries" already exists in this list',
    });
  });

  it('compares the trimmed title', () => {
    addTask(db, listId, 'Groceries');
    expect(checkUniqueSibling(db, '  Groceries ', null, listId)?.kind).toBe(ErrorKind.DuplicateName);
  });

  it('is case-sensitive', () => {
    addTask(db, listId, 'Groceries');
    expect(checkUniqueSibling(db, 'groceries', null, listId)).toBeNull();
  });

  it('allows the same title in another list', () => {
    addTask(db, listId, 'Groceries');
    const other = addList(db, 'Work');
    expect(checkUniqueSibling(db, 'Groceries', null, other.id)).toBeNull();
  });

  it('scopes subtasks to their parent', () => {
    const a = addTask(db, listId, 'A');
    const b = addTask(db, listId, 'B');
    addTask(db, listId, 'milk', a.id);

    expect(checkUniqueSibling(db, 'milk', a.id, listId)?.message).toBe('A subtask named "milk" already exists here');
    expect(checkUniqueSibling(db, 'milk', b.id, listId)).toBeNull();
    expect(checkUniqueSibling(db, 'milk', null, listId)).toBeNull();
  });

  it('ignores the task being renamed', () => {
    const a = addTask(db, listId, 'Groceries');
    expect(checkUniqueSibling(db, 'Groceries', null, listId, a.id)).toBeNull();
  });

  it('backs createTask with the same rule', () => {
    addTask(db, listId, 'Groceries');
    const other = addList(db, 'Work');

    const second = createTask(db, { listId, title: 'Groceries' });
    const elsewhere = createTask(db, { listId: other.id, title: 'Groceries' });

    expect(second.type).toBe('error');
    if (second.type === 'error') expect(second.error.kind).toBe(ErrorKind.DuplicateName);
    expect(elsewhere.type).toBe('success');
  });
});

describe('checkUniqueListName', () => {
  it('reports a clash among the same user lists', () => {
    expect(checkUniqueListName(db, 'Home', 'alice')?.message).toBe('You already have a list named "Home"');
  });

  it('allows the same name for another user', () => {
    expect(checkUniqueListName(db, 'Home', 'bob')).toBeNull();
  });

  it('ignores the list being renamed', () => {
    expect(checkUniqueListName(db, 'Home', 'alice', listId)).toBeNull();
  });
});

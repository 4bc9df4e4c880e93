import { describe, it, expect, beforeEach } from 'vitest';
import { createTestDb, type TreeDb } from '../../src/db.js';
import { depthOf, canAddChildUnder, subtreeHeight, isSelfOrDescendant, checkReparent } from '../../src/validators/depth.js';
import { createTask } from '../../src/mutations/task-mutations.js';
import { ErrorKind } from '../../src/types/errors.js';
import { addList, addTask, addChain, mustGet } from '../fixtures.js';

let db: TreeDb;
let listId: string;

beforeEach(() => {
  db = createTestDb();
  listId = addList(db).id;
});

describe('depthOf', () => {
  it('is 1 for a top-level task', () => {
    const a = addTask(db, listId, 'A');
    expect(depthOf(db, a.id)).toBe(1);
  });

  it('counts every level of the chain', () => {
    const chain = addChain(db, listId, 5);
    expect(chain.map(t => depthOf(db, t.id))).toEqual([1, 2, 3, 4, 5]);
  });
});

describe('canAddChildUnder', () => {
  it('allows a child under depth 4', () => {
    const chain = addChain(db, listId, 4);
    const last = chain[3];
    if (!last) throw new Error('chain too short');
    expect(canAddChildUnder(db, last.id)).toBe(true);
  });

  it('refuses a child under depth 5', () => {
    const chain = addChain(db, listId, 5);
    const last = chain[4];
    if (!last) throw new Error('chain too short');
    expect(canAddChildUnder(db, last.id)).toBe(false);
  });
});

describe('depth cap on creation', () => {
  it('creates a depth 5 task under a depth 4 task', () => {
    const chain = addChain(db, listId, 4);
    const result = createTask(db, { listId, title: 'deepest', parentId: chain[3]?.id });

    expect(result.type).toBe('success');
    if (result.type === 'success') expect(result.data.depth).toBe(5);
  });

  it('fails with DepthLimitExceeded under a depth 5 task', () => {
    const chain = addChain(db, listId, 5);
    const result = createTask(db, { listId, title: 'too deep', parentId: chain[4]?.id });

    expect(result.type).toBe('error');
    if (result.type === 'error') expect(result.error.kind).toBe(ErrorKind.DepthLimitExceeded);
  });
});

describe('subtreeHeight', () => {
  it('is 1 for a leaf', () => {
    const a = addTask(db, listId, 'A');
    expect(subtreeHeight(db, a.id)).toBe(1);
  });

  it('follows the deepest branch', () => {
    const a = addTask(db, listId, 'A');
    const b = addTask(db, listId, 'B', a.id);
    addTask(db, listId, 'C', a.id);
    addTask(db, listId, 'D', b.id);
    expect(subtreeHeight(db, a.id)).toBe(3);
  });
});

describe('isSelfOrDescendant', () => {
  it('recognises the task itself and anything below it', () => {
    const [a, b, c] = addChain(db, listId, 3);
    if (!a || !b || !c) throw new Error('chain too short');
    const other = addTask(db, listId, 'other');

    expect(isSelfOrDescendant(db, a.id, a.id)).toBe(true);
    expect(isSelfOrDescendant(db, a.id, c.id)).toBe(true);
    expect(isSelfOrDescendant(db, c.id, a.id)).toBe(false);
    expect(isSelfOrDescendant(db, a.id, other.id)).toBe(false);
  });
});

describe('checkReparent', () => {
  it('rejects a descendant as the new parent', () => {
    const [a, , c] = addChain(db, listId, 3);
    if (!a || !c) throw new Error('chain too short');

    const error = checkReparent(db, mustGet(db, a.id), mustGet(db, c.id));
    expect(error?.kind).toBe(ErrorKind.CyclicReparent);
  });

  it('rejects a placement that pushes the subtree past depth 5', () => {
    const chain = addChain(db, listId, 4);
    const x = addTask(db, listId, 'X');
    addTask(db, listId, 'Y', x.id);

    const error = checkReparent(db, mustGet(db, x.id), mustGet(db, chain[3]?.id ?? ''));
    expect(error?.kind).toBe(ErrorKind.DepthLimitExceeded);
  });

  it('accepts a placement that ends exactly at depth 5', () => {
    const chain = addChain(db, listId, 3);
    const x = addTask(db, listId, 'X');
    addTask(db, listId, 'Y', x.id);

    expect(checkReparent(db, mustGet(db, x.id), mustGet(db, chain[2]?.id ?? ''))).toBeNull();
  });
});

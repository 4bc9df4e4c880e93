import { describe, it, expect, beforeEach } from 'vitest';
import { createTestDb, type TreeDb } from '../../src/db.js';
import { getTaskNode, getListTree, getListSummaries } from '../../src/queries/tree-queries.js';
import { setCompletion } from '../../src/mutations/task-mutations.js';
import { addList, addTask, unwrap } from '../fixtures.js';

let db: TreeDb;
let listId: string;

beforeEach(() => {
  db = createTestDb();
  listId = addList(db).id;
});

describe('getTaskNode', () => {
  it('returns null for an unknown task', () => {
    expect(getTaskNode(db, 'nope')).toBeNull();
  });

  it('nests the subtree with computed depth', () => {
    const a = addTask(db, listId, 'A');
    const b = addTask(db, listId, 'B', a.id);
    addTask(db, listId, 'C', b.id);
    addTask(db, listId, 'D', b.id);

    const node = getTaskNode(db, b.id);

    expect(node?.depth).toBe(2);
    expect(node?.subtaskCount).toBe(2);
    expect(node?.subtasks.map(s => [s.title, s.depth])).toEqual([['C', 3], ['D', 3]]);
  });
});

describe('getListTree', () => {
  it('returns null for an unknown list', () => {
    expect(getListTree(db, 'nope')).toBeNull();
  });

  it('groups tasks under their top-level roots with counts', () => {
    const a = addTask(db, listId, 'A');
    addTask(db, listId, 'A1', a.id);
    const b = addTask(db, listId, 'B');
    unwrap(setCompletion(db, b.id, true));

    const tree = getListTree(db, listId);

    expect(tree?.taskCount).toBe(3);
    expect(tree?.completedCount).toBe(1);
    expect(tree?.tasks.map(t => t.title)).toEqual(['A', 'B']);
    expect(tree?.tasks[0]?.subtasks.map(t => t.title)).toEqual(['A1']);
  });
});

describe('getListSummaries', () => {
  it('summarises every list the user owns', () => {
    const work = addList(db, 'Work');
    addList(db, 'Garage', 'bob');
    addTask(db, work.id, 'report');

    const summaries = getListSummaries(db, 'alice');

    expect(summaries.map(s => [s.name, s.taskCount, s.completedCount])).toEqual([
      ['Home', 0, 0],
      ['Work', 1, 0],
    ]);
  });
});

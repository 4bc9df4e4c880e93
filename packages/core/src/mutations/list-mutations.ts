/**
 * List mutations. Same contract as the task mutations: one transaction per
 * call, typed failures before any write.
 */

import type { TreeDb } from '../db.js';
import { inTransaction } from '../db.js';
import type { ListId, UserId } from '../types/task.js';
import type { TodoList } from '../types/list.js';
import type { MutationResult } from '../types/results.js';
import { success, noChange, failure, describeResult } from '../types/results.js';
import { listNotFound, invalidName } from '../types/errors.js';
import { getListById, insertList, setListName, deleteListRow } from '../queries/list-queries.js';
import { getDefaultListId, clearDefaultListId } from '../queries/config-queries.js';
import { normalizeName } from '../queries/task-helpers.js';
import { checkUniqueListName } from '../validators/naming.js';
import { getLogger } from '../logger.js';

export interface DeleteListResult {
  readonly listId: ListId;
  /** Number of tasks removed with the list */
  readonly removedTasks: number;
}

function logged<T>(op: string, result: MutationResult<T>): MutationResult<T> {
  getLogger('lists').debug({ op, result: result.type }, describeResult(result));
  return result;
}

/** Create an empty list owned by userId */
export function createList(db: TreeDb, userId: UserId, name: string, now?: Date): MutationResult<TodoList> {
  return logged('createList', inTransaction(db, () => {
    const trimmed = normalizeName(name);
    if (trimmed.length === 0) return failure(invalidName('List name'));

    const duplicate = checkUniqueListName(db, trimmed, userId);
    if (duplicate) return failure(duplicate);

    const list = insertList(db, userId, trimmed, now);
    return success(list, `Created list '${trimmed}'`);
  }));
}

/** Rename a list, keeping names unique per owner */
export function renameList(db: TreeDb, listId: ListId, name: string): MutationResult<TodoList> {
  return logged('renameList', inTransaction(db, () => {
    const list = getListById(db, listId);
    if (!list) return failure(listNotFound(listId));

    const trimmed = normalizeName(name);
    if (trimmed.length === 0) return failure(invalidName('List name'));
    if (trimmed === list.name) return noChange(`List is already named '${trimmed}'`);

    const duplicate = checkUniqueListName(db, trimmed, list.userId, listId);
    if (duplicate) return failure(duplicate);

    setListName(db, listId, trimmed);
    return success({ ...list, name: trimmed }, `Renamed list '${list.name}' to '${trimmed}'`);
  }));
}

/** Delete a list with every task in it */
export function deleteList(db: TreeDb, listId: ListId): MutationResult<DeleteListResult> {
  return logged('deleteList', inTransaction(db, () => {
    const list = getListById(db, listId);
    if (!list) return failure(listNotFound(listId));

    const removedTasks = deleteListRow(db, listId);
    if (getDefaultListId(db, list.userId) === listId) clearDefaultListId(db, list.userId);

    return success({ listId, removedTasks }, `Deleted list '${list.name}' and ${removedTasks} task(s)`);
  }));
}

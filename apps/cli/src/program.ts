import { Command } from 'commander';
import type { TreeDb } from '@tasktree/core';

import { createAddCommand } from './commands/add.js';
import { createShowCommand } from './commands/show.js';
import { createEditCommand } from './commands/edit.js';
import { createToggleCommand, createCheckCommand, createUncheckCommand } from './commands/check.js';
import { createCollapseCommand } from './commands/collapse.js';
import { createMoveCommand } from './commands/move.js';
import { createNestCommand } from './commands/nest.js';
import { createDeleteCommand } from './commands/delete.js';
import { createListsCommand } from './commands/lists.js';
import { createWhoamiCommand, createLoginCommand } from './commands/user.js';

/** Build the CLI program around an open database */
export function createProgram(db: TreeDb): Command {
  const program = new Command()
    .name('tasktree')
    .description('Nested task lists with completion cascades')
    .version('1.0.0')
    .option('-u, --user <name>', 'Act as this user');

  program.addCommand(createAddCommand(db));
  program.addCommand(createShowCommand(db));
  program.addCommand(createEditCommand(db));
  program.addCommand(createToggleCommand(db));
  program.addCommand(createCheckCommand(db));
  program.addCommand(createUncheckCommand(db));
  program.addCommand(createCollapseCommand(db));
  program.addCommand(createMoveCommand(db));
  program.addCommand(createNestCommand(db));
  program.addCommand(createDeleteCommand(db));
  program.addCommand(createListsCommand(db));
  program.addCommand(createWhoamiCommand(db));
  program.addCommand(createLoginCommand(db));

  return program;
}

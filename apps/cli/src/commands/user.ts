import { Command } from 'commander';
import type { TreeDb } from '@tasktree/core';
import { setDefaultUser } from '@tasktree/core';
import * as out from '../output.js';
import { actingUser, CliError, $try } from '../helpers.js';

export function createWhoamiCommand(db: TreeDb): Command {
  return new Command('whoami')
    .description('Show the user commands act as')
    .action((_opts: unknown, cmd: Command) => $try(() => {
      out.info(actingUser(db, cmd));
    }));
}

export function createLoginCommand(db: TreeDb): Command {
  return new Command('login')
    .description('Store the user commands act as by default')
    .argument('<name>', 'User name')
    .action((name: string) => $try(() => {
      const userId = name.trim();
      if (userId.length === 0) throw new CliError('User name cannot be empty');
      setDefaultUser(db, userId);
      out.success(`Now acting as '${userId}'`);
    }));
}

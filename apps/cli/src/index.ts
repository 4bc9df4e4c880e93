#!/usr/bin/env node

import { loadConfig, initLogger, closeLogger, createDb, getRawDb } from '@tasktree/core';
import { createProgram } from './program.js';

const config = loadConfig();
initLogger({ level: config.logLevel });
const db = createDb(config.dbPath);

const program = createProgram(db);

// No command: show the default list (or every list)
program.action(async () => {
  await program.commands.find(c => c.name() === 'show')?.parseAsync([], { from: 'user' });
});

try {
  await program.parseAsync();
} finally {
  getRawDb(db).close();
  closeLogger();
}

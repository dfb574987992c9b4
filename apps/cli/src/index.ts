#!/usr/bin/env tsx

import { Command } from 'commander';
import {
  createDb, closeDb, loadTasks, saveTasks, getAssistantName,
} from '@taskmate/core';

import { createConsoleSink } from './output.js';
import { resolveDbPath, renameAssistant, $try } from './helpers.js';
import { runRepl } from './repl.js';

const program = new Command()
  .name('taskmate')
  .description('Personal task-tracking assistant. Type commands, one per line; "bye" to quit.')
  .version('1.0.0')
  .option('--db <path>', 'Database file (default: $TASKMATE_DB or the platform data directory)')
  .option('--name <name>', 'Set the name the assistant greets you with');

program.action(() => $try(async () => {
  const opts = program.opts<{ db?: string; name?: string }>();
  const db = createDb(resolveDbPath(opts.db));
  const tasks = loadTasks(db);

  // Ctrl+C ends the session like end of input, so the list is still saved
  const controller = new AbortController();
  const onSigint = (): void => controller.abort();
  process.once('SIGINT', onSigint);

  try {
    if (opts.name) renameAssistant(db, opts.name);
    await runRepl(process.stdin, tasks, createConsoleSink(), getAssistantName(db), controller.signal);
  } finally {
    process.off('SIGINT', onSigint);
    saveTasks(db, tasks);
    closeDb(db);
  }
}));

await program.parseAsync();

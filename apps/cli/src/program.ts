import { Command } from 'commander';
import { resolveDbPath } from './helpers.js';
import type { Session } from './session.js';

import { createAddCommand } from './commands/add.js';
import { createListCommand } from './commands/list.js';
import { createShowCommand } from './commands/show.js';
import { createCompleteCommand } from './commands/complete.js';
import { createUpdateCommand } from './commands/update.js';
import { createDeleteCommand } from './commands/delete.js';

export const VERSION = '1.0.0';

interface GlobalOptions {
  db?: string;
}

/** Build the CLI program around a session */
export function createProgram(session: Session, env: NodeJS.ProcessEnv = process.env): Command {
  const program = new Command()
    .name('todo')
    .description('A simple todo CLI tool with SQLite storage')
    .version(VERSION)
    .option('--db <path>', 'Task database file (default: $TODO_DB_PATH or ~/.todo.db)');

  // The store path is only known once the global options are parsed
  program.hook('preAction', (root: Command) => {
    session.useDbPath(resolveDbPath({ flag: root.opts<GlobalOptions>().db, env }));
  });

  program.addCommand(createAddCommand(session));
  program.addCommand(createListCommand(session));
  program.addCommand(createShowCommand(session));
  program.addCommand(createCompleteCommand(session));
  program.addCommand(createUpdateCommand(session));
  program.addCommand(createDeleteCommand(session));

  return program;
}

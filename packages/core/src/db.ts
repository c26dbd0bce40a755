import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema/index.js';
import { dirname, join } from 'node:path';
import { homedir } from 'node:os';
import { mkdirSync } from 'node:fs';

export type TodoDb = BetterSQLite3Database<typeof schema> & { $client: Database.Database };

export const DB_FILE_NAME = '.todo.db';

/** Default store location: a dotfile in the user's home directory */
export function getDefaultDbPath(home: string = homedir()): string {
  return join(home, DB_FILE_NAME);
}

/** The raw SQL to create the schema from scratch */
export const CREATE_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS tasks (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    title TEXT NOT NULL,
    description TEXT,
    due_date TEXT,
    priority INTEGER NOT NULL DEFAULT 1,
    completed INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_tasks_listing ON tasks(completed, priority, created_at);
`;

/** Ensure the schema exists. Safe to call on every startup. */
export function initialize(db: TodoDb): void {
  getRawDb(db).exec(CREATE_SCHEMA_SQL);
}

/**
 * Open the store and make sure its schema exists.
 * Pass ':memory:' for an in-memory database (tests).
 */
export function createDb(path: string): TodoDb {
  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true });
  }

  const sqlite = new Database(path);

  // Pragmas are per connection
  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('foreign_keys = ON');

  const db = drizzle(sqlite, { schema });
  initialize(db);
  return db;
}

/**
 * Create an in-memory database with schema applied. For tests.
 */
export function createTestDb(): TodoDb {
  return createDb(':memory:');
}

/**
 * Get the raw Database instance from a Drizzle instance.
 * Useful for operations not supported by Drizzle (pragmas, raw exec).
 */
export function getRawDb(db: TodoDb): Database.Database {
  return db.$client;
}

/** Release the connection. Calling it on a closed store does nothing. */
export function closeDb(db: TodoDb): void {
  const raw = getRawDb(db);
  if (raw.open) raw.close();
}

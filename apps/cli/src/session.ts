import type { Clock, TodoDb } from '@todo/core';
import { closeDb, createDb, getDefaultDbPath, systemClock } from '@todo/core';
import { ExitCode } from './exit-codes.js';

/**
 * One CLI invocation: the store connection (opened on first use),
 * the clock, and the exit code of the command that ran.
 */
export class Session {
  readonly clock: Clock;
  exitCode: ExitCode = ExitCode.Ok;
  private db: TodoDb | null;
  private dbPath: string | null = null;

  constructor(clock: Clock = systemClock, db: TodoDb | null = null) {
    this.clock = clock;
    this.db = db;
  }

  /** Choose the store file. Ignored once a connection is open. */
  useDbPath(path: string): void {
    if (!this.db) this.dbPath = path;
  }

  get store(): TodoDb {
    if (!this.db) {
      this.db = createDb(this.dbPath ?? getDefaultDbPath());
    }
    return this.db;
  }

  finish(code: ExitCode): void {
    this.exitCode = code;
  }

  close(): void {
    if (this.db) closeDb(this.db);
    this.db = null;
  }
}

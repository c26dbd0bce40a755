/**
 * CLI helpers: store path resolution, argument parsing, error handling.
 */

import type { DataResult, Priority } from '@todo/core';
import { getDefaultDbPath, parsePriorityName, validationError } from '@todo/core';
import { ExitCode } from './exit-codes.js';
import * as out from './output.js';

export const DB_PATH_ENV = 'TODO_DB_PATH';

export const PRIORITY_CHOICES = ['low', 'medium', 'high'] as const;
export type PriorityChoice = (typeof PRIORITY_CHOICES)[number];

/** Words accepted by `update --due` to remove a due date */
const CLEAR_WORDS = new Set(['clear', 'none']);

/**
 * Resolve the store file.
 * Priority: --db flag > TODO_DB_PATH > ~/.todo.db
 */
export function resolveDbPath(opts: {
  flag?: string;
  env?: NodeJS.ProcessEnv;
  home?: string;
}): string {
  if (opts.flag) return opts.flag;
  const fromEnv = opts.env?.[DB_PATH_ENV];
  if (fromEnv) return fromEnv;
  return getDefaultDbPath(opts.home);
}

/** Parse a task ID argument; only positive integers are accepted */
export function parseTaskId(raw: string): DataResult<number> {
  const trimmed = raw.trim();
  const id = Number(trimmed);
  if (!/^\d+$/.test(trimmed) || id < 1 || !Number.isSafeInteger(id)) {
    return validationError('invalid-id', `Invalid task ID: ${raw}`);
  }
  return { type: 'success', data: id, message: `Task ${id}` };
}

/** Map a --priority value to a Priority; undefined when the option was not given */
export function parsePriorityArg(level: string | undefined): Priority | undefined {
  if (level === undefined) return undefined;
  return parsePriorityName(level) ?? undefined;
}

/** Map a --due value for update: undefined keeps, null clears */
export function parseDueArg(due: string | undefined): string | null | undefined {
  if (due === undefined) return undefined;
  return CLEAR_WORDS.has(due.trim().toLowerCase()) ? null : due;
}

/**
 * Run a command body, reporting any thrown error.
 * Returns the body's exit code, or Failure if it threw.
 */
export function $try(fn: () => ExitCode): ExitCode {
  try {
    return fn();
  } catch (err: unknown) {
    out.error(err instanceof Error ? err.message : String(err));
    return ExitCode.Failure;
  }
}

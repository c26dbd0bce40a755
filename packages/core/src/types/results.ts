import type { TaskId } from './task.js';

export type ValidationReason =
  | 'empty-title'
  | 'invalid-date-format'
  | 'due-date-not-in-future'
  | 'invalid-id';

export type Failure =
  | { readonly type: 'not-found'; readonly taskId: TaskId }
  | { readonly type: 'validation-error'; readonly reason: ValidationReason; readonly message: string }
  | { readonly type: 'storage-error'; readonly message: string; readonly cause: unknown };

/** Outcome of a single write: it either happened or failed */
export type TaskResult =
  | { readonly type: 'success'; readonly message: string }
  | Failure;

export type DataResult<T> =
  | { readonly type: 'success'; readonly data: T; readonly message: string }
  | Failure;

export function validationError(reason: ValidationReason, message: string): Failure {
  return { type: 'validation-error', reason, message };
}

export function notFound(taskId: TaskId): Failure {
  return { type: 'not-found', taskId };
}

/** Wrap an engine failure without altering it */
export function storageError(cause: unknown): Failure {
  const message = cause instanceof Error ? cause.message : String(cause);
  return { type: 'storage-error', message, cause };
}

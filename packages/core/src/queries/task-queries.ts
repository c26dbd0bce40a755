/**
 * Task store: CRUD, filtered listing and the typed-result boundary the CLI calls.
 *
 * The low-level functions (insertTask, listTasks, updateTask, ...) throw on
 * engine failures. The high-level ones (addTask, getTasks, editTask, ...)
 * return every failure as a result, engine failures as `storage-error`.
 */

import { and, asc, count, desc, eq, sql, type SQL } from 'drizzle-orm';
import type { TodoDb } from '../db.js';
import type { NewTask, Task, TaskId, TaskInput, TaskChanges, ListOptions } from '../types/task.js';
import type { DataResult, Failure, TaskResult } from '../types/results.js';
import { notFound, storageError, validationError } from '../types/results.js';
import type { Clock } from '../types/clock.js';
import { systemClock } from '../types/clock.js';
import { FALLBACK_PRIORITY, priorityFromOrdinal } from '../types/priority.js';
import { tasks, type TaskRow } from '../schema/tasks.js';
import { buildTask, normalizeDescription, EMPTY_TITLE_MESSAGE } from './task-helpers.js';
import { parseDueDate } from '../parsers/date-parser.js';

// ---------------------------------------------------------------------------
// Row mapper
// ---------------------------------------------------------------------------

/** Stored due date, or null when it is not a readable instant */
function readDueDate(stored: string | null): string | null {
  if (stored === null || Number.isNaN(Date.parse(stored))) return null;
  return stored;
}

/** Map a Drizzle row to a Task; unknown priorities read as Medium, unreadable due dates as none */
function toTask(row: TaskRow): Task {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    dueDate: readDueDate(row.dueDate),
    priority: priorityFromOrdinal(row.priority),
    completed: row.completed,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

/** Stored priority with the same Medium fallback as priorityFromOrdinal */
const effectivePriority = sql<number>`CASE WHEN ${tasks.priority} IN (0, 1, 2) THEN ${tasks.priority} ELSE ${FALLBACK_PRIORITY} END`;

/**
 * updated_at for a write at `now`. Always later than the stored value:
 * if the clock has not moved past it, it advances by one millisecond.
 */
function refreshedAt(clock: Clock): SQL<string> {
  const now = clock.now().toISOString();
  return sql<string>`CASE WHEN ${now} > ${tasks.updatedAt} THEN ${now}
    ELSE strftime('%Y-%m-%dT%H:%M:%fZ', ${tasks.updatedAt}, '+0.001 seconds') END`;
}

// ---------------------------------------------------------------------------
// Read queries
// ---------------------------------------------------------------------------

/** Get a single task by ID */
export function getTaskById(db: TodoDb, taskId: TaskId): Task | null {
  const row = db.select().from(tasks).where(eq(tasks.id, taskId)).get();
  return row ? toTask(row) : null;
}

export function taskExists(db: TodoDb, taskId: TaskId): boolean {
  const row = db.select({ n: count() }).from(tasks).where(eq(tasks.id, taskId)).get();
  return (row?.n ?? 0) > 0;
}

/**
 * Tasks matching the filters, highest priority first, then oldest first.
 * Completed tasks are left out unless `includeCompleted` is set.
 */
export function listTasks(db: TodoDb, opts: ListOptions): Task[] {
  const conditions: SQL[] = [];
  if (!opts.includeCompleted) {
    conditions.push(eq(tasks.completed, false));
  }
  if (opts.priority != null) {
    conditions.push(eq(effectivePriority, opts.priority));
  }

  return db.select()
    .from(tasks)
    .where(and(...conditions))
    .orderBy(desc(effectivePriority), asc(tasks.createdAt), asc(tasks.id))
    .all()
    .map(toTask);
}

// ---------------------------------------------------------------------------
// Write operations
// ---------------------------------------------------------------------------

/** Insert a task and return its new ID */
export function insertTask(db: TodoDb, task: NewTask): TaskId {
  const result = db.insert(tasks).values({
    title: task.title,
    description: task.description,
    dueDate: task.dueDate,
    priority: task.priority,
    completed: task.completed,
    createdAt: task.createdAt,
    updatedAt: task.updatedAt,
  }).run();
  return Number(result.lastInsertRowid);
}

/**
 * Overwrite a task's mutable fields. updated_at comes from `clock`,
 * whatever the caller's copy says.
 */
export function updateTask(db: TodoDb, taskId: TaskId, task: NewTask, clock: Clock = systemClock): TaskResult {
  const result = db.update(tasks).set({
    title: task.title,
    description: task.description,
    dueDate: task.dueDate,
    priority: task.priority,
    completed: task.completed,
    updatedAt: refreshedAt(clock),
  }).where(eq(tasks.id, taskId)).run();

  if (result.changes === 0) return notFound(taskId);
  return { type: 'success', message: `Task ${taskId} updated successfully!` };
}

/** Mark a task completed. Other fields are left alone. */
export function completeTask(db: TodoDb, taskId: TaskId, clock: Clock = systemClock): TaskResult {
  const result = db.update(tasks)
    .set({ completed: true, updatedAt: refreshedAt(clock) })
    .where(eq(tasks.id, taskId))
    .run();

  if (result.changes === 0) return notFound(taskId);
  return { type: 'success', message: `Task ${taskId} marked as completed!` };
}

/** Delete a task permanently. A missing ID is reported, not ignored. */
export function deleteTask(db: TodoDb, taskId: TaskId): TaskResult {
  const result = db.delete(tasks).where(eq(tasks.id, taskId)).run();
  if (result.changes === 0) return notFound(taskId);
  return { type: 'success', message: `Task ${taskId} deleted successfully!` };
}

// ---------------------------------------------------------------------------
// High-level operations
// ---------------------------------------------------------------------------

/** Run a store operation, turning engine exceptions into a storage-error result */
export function withStorage<R>(fn: () => R): R | Failure {
  try {
    return fn();
  } catch (err: unknown) {
    return storageError(err);
  }
}

/** Validate the raw due string, if any. Null clears the due date. */
function resolveDue(due: string | null | undefined, clock: Clock): DataResult<Date | null> {
  if (due == null) return { type: 'success', data: null, message: 'No due date' };
  return parseDueDate(due, clock);
}

/** Validate user input, store the task and return it with its new ID */
export function addTask(db: TodoDb, input: TaskInput, clock: Clock = systemClock): DataResult<Task> {
  const due = resolveDue(input.due, clock);
  if (due.type !== 'success') return due;

  const built = buildTask({
    title: input.title,
    description: input.description,
    dueDate: due.data,
    priority: input.priority,
  }, clock);
  if (built.type !== 'success') return built;

  return withStorage((): DataResult<Task> => {
    const id = insertTask(db, built.data);
    return {
      type: 'success',
      data: { ...built.data, id },
      message: `Task added successfully with ID: ${id}`,
    };
  });
}

export function getTasks(db: TodoDb, opts: ListOptions): DataResult<Task[]> {
  return withStorage((): DataResult<Task[]> => {
    const found = listTasks(db, opts);
    return { type: 'success', data: found, message: `Total: ${found.length} tasks` };
  });
}

export function getTask(db: TodoDb, taskId: TaskId): DataResult<Task> {
  return withStorage((): DataResult<Task> => {
    const task = getTaskById(db, taskId);
    if (!task) return notFound(taskId);
    return { type: 'success', data: task, message: `Task ${taskId}` };
  });
}

/**
 * Apply field-level changes to a stored task.
 * `undefined` keeps a field; a null description or due date clears it.
 */
export function editTask(db: TodoDb, taskId: TaskId, changes: TaskChanges, clock: Clock = systemClock): DataResult<Task> {
  return withStorage((): DataResult<Task> => {
    const existing = getTaskById(db, taskId);
    if (!existing) return notFound(taskId);

    let title = existing.title;
    if (changes.title !== undefined) {
      title = changes.title.trim();
      if (!title) return validationError('empty-title', EMPTY_TITLE_MESSAGE);
    }

    let dueDate = existing.dueDate;
    if (changes.due !== undefined) {
      const due = resolveDue(changes.due, clock);
      if (due.type !== 'success') return due;
      dueDate = due.data ? due.data.toISOString() : null;
    }

    const result = updateTask(db, taskId, {
      ...existing,
      title,
      description: changes.description !== undefined ? normalizeDescription(changes.description) : existing.description,
      dueDate,
      priority: changes.priority ?? existing.priority,
    }, clock);
    if (result.type !== 'success') return result;

    const updated = getTaskById(db, taskId);
    if (!updated) return notFound(taskId);
    return { type: 'success', data: updated, message: result.message };
  });
}

/** Complete a task. Completing it again succeeds and refreshes updated_at. */
export function markComplete(db: TodoDb, taskId: TaskId, clock: Clock = systemClock): TaskResult {
  return withStorage(() => completeTask(db, taskId, clock));
}

export function removeTask(db: TodoDb, taskId: TaskId): TaskResult {
  return withStorage(() => deleteTask(db, taskId));
}

import type { Priority } from './priority.js';

export type TaskId = number;

/** A task that has not been stored yet */
export interface NewTask {
  readonly title: string;
  readonly description: string | null;
  readonly dueDate: string | null; // ISO string, UTC
  readonly priority: Priority;
  readonly completed: boolean;
  readonly createdAt: string; // ISO string, UTC
  readonly updatedAt: string; // ISO string, UTC
}

export interface Task extends NewTask {
  readonly id: TaskId;
}

/** Input for creating a task from user-supplied values */
export interface TaskInput {
  title: string;
  description?: string | null;
  /** Raw due date string, validated by parseDueDate */
  due?: string | null;
  priority?: Priority;
}

/** Field-level overrides for an update; absent fields keep their stored value */
export type TaskChanges = Partial<TaskInput>;

export interface ListOptions {
  includeCompleted: boolean;
  priority?: Priority | null;
}

import type { NewTask } from '../types/task.js';
import type { Clock } from '../types/clock.js';
import { systemClock } from '../types/clock.js';
import type { DataResult } from '../types/results.js';
import { validationError } from '../types/results.js';
import { Priority } from '../types/priority.js';

export const EMPTY_TITLE_MESSAGE = 'Task title cannot be empty';

export interface TaskFields {
  title: string;
  description?: string | null;
  dueDate?: Date | null;
  priority?: Priority;
}

/** Trim a description; blank descriptions are stored as null */
export function normalizeDescription(description: string | null | undefined): string | null {
  const trimmed = description?.trim();
  return trimmed ? trimmed : null;
}

/** Create a new, not-yet-stored task. Fails if the title is blank. */
export function buildTask(fields: TaskFields, clock: Clock = systemClock): DataResult<NewTask> {
  const title = fields.title.trim();
  if (!title) return validationError('empty-title', EMPTY_TITLE_MESSAGE);

  const now = clock.now().toISOString();
  return {
    type: 'success',
    data: {
      title,
      description: normalizeDescription(fields.description),
      dueDate: fields.dueDate ? fields.dueDate.toISOString() : null,
      priority: fields.priority ?? Priority.Medium,
      completed: false,
      createdAt: now,
      updatedAt: now,
    },
    message: `Task '${title}' created`,
  };
}

/** Incomplete, has a due date, and that date is strictly before `now` */
export function isOverdue(task: NewTask, now: Date): boolean {
  if (task.completed || !task.dueDate) return false;
  return Date.parse(task.dueDate) < now.getTime();
}

/**
 * Plain-text and JSON renderings of a task, kept apart from the data model.
 * Colour is supplied by the caller through TaskStyles.
 */

import type { Task } from '../types/task.js';
import type { PriorityLabel } from '../types/priority.js';
import { priorityLabel } from '../types/priority.js';
import { isOverdue } from '../queries/task-helpers.js';
import { formatDueDate, formatTimestamp } from '../parsers/date-parser.js';

export const NO_DUE_DATE = 'No due date';

export interface TaskStyles {
  priority(label: PriorityLabel): string;
  status(completed: boolean, text: string): string;
  due(overdue: boolean, text: string): string;
}

export const plainStyles: TaskStyles = {
  priority: label => label,
  status: (_completed, text) => text,
  due: (_overdue, text) => text,
};

export function statusText(task: Task): string {
  return task.completed ? '✓ COMPLETED' : '○ PENDING';
}

export function dueDateText(task: Task): string {
  return task.dueDate ? formatDueDate(task.dueDate) : NO_DUE_DATE;
}

/** `[id] title PRIORITY STATUS due` */
export function summaryLine(task: Task, now: Date, styles: TaskStyles = plainStyles): string {
  const priority = styles.priority(priorityLabel(task.priority));
  const status = styles.status(task.completed, statusText(task));
  const due = styles.due(isOverdue(task, now), dueDateText(task));
  return `[${task.id}] ${task.title} ${priority} ${status} ${due}`;
}

/** Multi-line view used by `show` */
export function detailView(task: Task, now: Date, styles: TaskStyles = plainStyles): string {
  const lines = [
    `Task #${task.id}: ${task.title}`,
    `Priority: ${styles.priority(priorityLabel(task.priority))}`,
    `Status: ${styles.status(task.completed, statusText(task))}`,
    `Due: ${styles.due(isOverdue(task, now), dueDateText(task))}`,
  ];
  if (task.description) {
    lines.push(`Description: ${task.description}`);
  }
  lines.push(`Created: ${formatTimestamp(task.createdAt)}`);
  lines.push(`Updated: ${formatTimestamp(task.updatedAt)}`);
  return lines.join('\n');
}

export interface TaskJson {
  id: number;
  title: string;
  description: string | null;
  dueDate: string | null;
  priority: string;
  completed: boolean;
  overdue: boolean;
  createdAt: string;
  updatedAt: string;
}

export function toJson(task: Task, now: Date): TaskJson {
  return {
    id: task.id,
    title: task.title,
    description: task.description,
    dueDate: task.dueDate,
    priority: priorityLabel(task.priority).toLowerCase(),
    completed: task.completed,
    overdue: isOverdue(task, now),
    createdAt: task.createdAt,
    updatedAt: task.updatedAt,
  };
}

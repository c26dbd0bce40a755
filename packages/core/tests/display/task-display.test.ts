import { describe, it, expect } from 'vitest';
import {
  summaryLine, detailView, toJson, statusText, dueDateText, plainStyles, type TaskStyles,
} from '../../src/display/task-display.js';
import { Priority } from '../../src/types/priority.js';
import type { Task } from '../../src/types/task.js';

const NOW = new Date('2026-10-19T12:00:00.000Z');

function makeTask(overrides: Partial<Task> = {}): Task {
  return {
    id: 3,
    title: 'Write report',
    description: null,
    dueDate: null,
    priority: Priority.High,
    completed: false,
    createdAt: '2026-10-01T08:05:00.000Z',
    updatedAt: '2026-10-02T17:45:30.000Z',
    ...overrides,
  };
}

/** Marks each styled fragment so tests can see which style was applied */
const markedStyles: TaskStyles = {
  priority: label => `<${label}>`,
  status: (completed, text) => `<${completed ? 'done' : 'open'}:${text}>`,
  due: (overdue, text) => (overdue ? `<late:${text}>` : text),
};

describe('statusText / dueDateText', () => {
  it('describes completion', () => {
    expect(statusText(makeTask())).toBe('○ PENDING');
    expect(statusText(makeTask({ completed: true }))).toBe('✓ COMPLETED');
  });

  it('formats the due date or says there is none', () => {
    expect(dueDateText(makeTask())).toBe('No due date');
    expect(dueDateText(makeTask({ dueDate: '2030-01-01T00:00:00.000Z' }))).toBe('2030-01-01');
  });
});

describe('summaryLine', () => {
  it('renders id, title, priority, status and due date', () => {
    expect(summaryLine(makeTask({ dueDate: '2030-01-01T00:00:00.000Z' }), NOW))
      .toBe('[3] Write report HIGH ○ PENDING 2030-01-01');
  });

  it('renders a task without a due date', () => {
    expect(summaryLine(makeTask({ priority: Priority.Low, completed: true }), NOW))
      .toBe('[3] Write report LOW ✓ COMPLETED No due date');
  });

  it('passes overdue state to the due style', () => {
    const task = makeTask({ dueDate: '2026-10-10T00:00:00.000Z' });
    expect(summaryLine(task, NOW, markedStyles)).toBe('[3] Write report <HIGH> <open:○ PENDING> <late:2026-10-10>');
  });

  it('does not style a completed task as overdue', () => {
    const task = makeTask({ dueDate: '2026-10-10T00:00:00.000Z', completed: true });
    expect(summaryLine(task, NOW, markedStyles)).toBe('[3] Write report <HIGH> <done:✓ COMPLETED> 2026-10-10');
  });
});

describe('detailView', () => {
  it('renders every field, with the description when present', () => {
    const task = makeTask({ description: 'Quarterly numbers', dueDate: '2030-01-01T00:00:00.000Z' });
    expect(detailView(task, NOW).split('\n')).toEqual([
      'Task #3: Write report',
      'Priority: HIGH',
      'Status: ○ PENDING',
      'Due: 2030-01-01',
      'Description: Quarterly numbers',
      'Created: 2026-10-01 08:05',
      'Updated: 2026-10-02 17:45',
    ]);
  });

  it('omits the description line when there is none', () => {
    expect(detailView(makeTask(), NOW, plainStyles).split('\n')).toEqual([
      'Task #3: Write report',
      'Priority: HIGH',
      'Status: ○ PENDING',
      'Due: No due date',
      'Created: 2026-10-01 08:05',
      'Updated: 2026-10-02 17:45',
    ]);
  });
});

describe('toJson', () => {
  it('exposes the priority label and overdue flag', () => {
    const task = makeTask({ priority: Priority.Medium, dueDate: '2026-10-10T00:00:00.000Z' });
    expect(toJson(task, NOW)).toEqual({
      id: 3,
      title: 'Write report',
      description: null,
      dueDate: '2026-10-10T00:00:00.000Z',
      priority: 'medium',
      completed: false,
      overdue: true,
      createdAt: '2026-10-01T08:05:00.000Z',
      updatedAt: '2026-10-02T17:45:30.000Z',
    });
  });
});

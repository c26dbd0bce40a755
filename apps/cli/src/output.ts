/**
 * chalk-based terminal output.
 */

import chalk from 'chalk';
import type { DataResult, Task, TaskResult, TaskStyles } from '@todo/core';
import { summaryLine, detailView } from '@todo/core';
import type { ExitCode } from './exit-codes.js';
import { exitCodeFor } from './exit-codes.js';

const RULE_WIDTH = 80;

export const taskStyles: TaskStyles = {
  priority: (label) => {
    switch (label) {
      case 'HIGH': return chalk.red(label);
      case 'LOW': return chalk.blue(label);
      default: return chalk.yellow(label);
    }
  },
  status: (completed, text) => (completed ? chalk.green(text) : chalk.white(text)),
  due: (overdue, text) => (overdue ? chalk.red(text) : chalk.white(text)),
};

export function rule(): string {
  return '─'.repeat(RULE_WIDTH);
}

// --- Task output ---

export function printTaskList(tasks: readonly Task[], now: Date): void {
  if (tasks.length === 0) {
    info('📝 No tasks found.');
    return;
  }

  info('📋 Your tasks:');
  info(rule());
  for (const task of tasks) {
    info(summaryLine(task, now, taskStyles));
  }
  info(rule());
  info(`Total: ${tasks.length} tasks`);
}

export function printTaskDetail(task: Task, now: Date): void {
  info('📋 Task Details:');
  info(rule());
  info(detailView(task, now, taskStyles));
  info(rule());
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

// --- Result output ---

/** Print a result and return the exit code it maps to */
export function printResult(result: TaskResult | DataResult<unknown>, icon = '✅'): ExitCode {
  switch (result.type) {
    case 'success': success(`${icon} ${result.message}`); break;
    case 'not-found': error(`Task with ID ${result.taskId} not found`); break;
    case 'validation-error': error(result.message); break;
    case 'storage-error': error(`Storage error: ${result.message}`); break;
  }
  return exitCodeFor(result);
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.error(chalk.red(message));
}

export function info(message: string): void {
  console.log(message);
}

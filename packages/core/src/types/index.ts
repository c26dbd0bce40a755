export {
  Priority, FALLBACK_PRIORITY,
  priorityToOrdinal, priorityFromOrdinal, priorityLabel, parsePriorityName,
} from './priority.js';
export type { PriorityLabel } from './priority.js';
export type { TaskId, NewTask, Task, TaskInput, TaskChanges, ListOptions } from './task.js';
export type { TaskResult, DataResult, Failure, ValidationReason } from './results.js';
export { validationError, notFound, storageError } from './results.js';
export { systemClock, createManualClock } from './clock.js';
export type { Clock, ManualClock } from './clock.js';

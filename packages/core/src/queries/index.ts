// Task helpers
export {
  buildTask,
  isOverdue,
  normalizeDescription,
  EMPTY_TITLE_MESSAGE,
} from './task-helpers.js';
export type { TaskFields } from './task-helpers.js';

// Task queries
export {
  getTaskById,
  taskExists,
  listTasks,
  insertTask,
  updateTask,
  completeTask,
  deleteTask,
  withStorage,
  addTask,
  getTasks,
  getTask,
  editTask,
  markComplete,
  removeTask,
} from './task-queries.js';

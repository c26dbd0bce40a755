export { tasks } from './tasks.js';
export type { TaskRow, TaskInsert } from './tasks.js';

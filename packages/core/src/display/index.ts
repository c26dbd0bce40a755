export {
  summaryLine, detailView, toJson, statusText, dueDateText,
  plainStyles, NO_DUE_DATE,
} from './task-display.js';
export type { TaskStyles, TaskJson } from './task-display.js';

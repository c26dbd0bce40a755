export {
  parseDueDate, parseDateInput, formatDueDate, formatTimestamp,
  INVALID_DATE_FORMAT_MESSAGE, NOT_IN_FUTURE_MESSAGE,
} from './date-parser.js';

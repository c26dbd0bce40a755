// Types
export * from './types/index.js';

// Schema
export * from './schema/index.js';

// Database
export {
  createDb, createTestDb, closeDb, initialize, getRawDb,
  getDefaultDbPath, CREATE_SCHEMA_SQL, DB_FILE_NAME,
} from './db.js';
export type { TodoDb } from './db.js';

// Parsers
export * from './parsers/index.js';

// Queries
export * from './queries/index.js';

// Display
export * from './display/index.js';

import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';

export const tasks = sqliteTable('tasks', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  title: text('title').notNull(),
  description: text('description'),
  /** ISO-8601 UTC instant */
  dueDate: text('due_date'),
  /** 0=Low, 1=Medium, 2=High. Read through priorityFromOrdinal. */
  priority: integer('priority').notNull().default(1),
  completed: integer('completed', { mode: 'boolean' }).notNull().default(false),
  createdAt: text('created_at').notNull(),
  updatedAt: text('updated_at').notNull(),
}, (table) => [
  index('idx_tasks_listing').on(table.completed, table.priority, table.createdAt),
]);

export type TaskRow = typeof tasks.$inferSelect;
export type TaskInsert = typeof tasks.$inferInsert;

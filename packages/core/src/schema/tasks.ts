import { sql } from 'drizzle-orm';
import { sqliteTable, text, integer, index } from 'drizzle-orm/sqlite-core';
import type { TaskStatus } from '../types/task-status.js';
import type { Priority } from '../types/priority.js';

/** SQLite expression for the current UTC time as an ISO string with milliseconds */
export const NOW = sql`(strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))`;

export const tasks = sqliteTable('tasks', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  title: text('title').notNull(),
  description: text('description'),
  status: text('status').$type<TaskStatus>().notNull(),
  priority: text('priority').$type<Priority>().notNull(),
  category: text('category').notNull(),
  /** yyyy-MM-dd, so lexical order is chronological order */
  dueDate: text('due_date').notNull(),
  createdAt: text('created_at').notNull().default(NOW),
  /** Also refreshed by the tasks_touch_updated_at trigger */
  updatedAt: text('updated_at').notNull().default(NOW),
}, (table) => [
  index('idx_tasks_status').on(table.status),
  index('idx_tasks_priority').on(table.priority),
  index('idx_tasks_category').on(table.category),
  index('idx_tasks_due_date').on(table.dueDate),
]);

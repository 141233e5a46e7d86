// Types
export { TaskStatus, TaskStatusName, TASK_STATUSES } from './types/task-status.js';
export { Priority, PriorityName, PRIORITIES } from './types/priority.js';
export { SortField, SortOrder, SORT_FIELDS, SORT_ORDERS } from './types/sort.js';
export type { TaskId, Task, TaskInput, TaskPatch, TaskQuery, TaskStats } from './types/task.js';

// Schema
export * from './schema/index.js';

// Database
export { createDb, createTestDb, getDefaultDbPath, getRawDb, CREATE_SCHEMA_SQL } from './db.js';
export type { TaskDb } from './db.js';

// Validation
export * from './validation/index.js';

// Queries
export * from './queries/index.js';

export { TaskStatus, TaskStatusName, TASK_STATUSES } from './task-status.js';
export { Priority, PriorityName, PRIORITIES } from './priority.js';
export { SortField, SortOrder, SORT_FIELDS, SORT_ORDERS } from './sort.js';
export type { TaskId, Task, TaskInput, TaskPatch, TaskQuery, TaskStats } from './task.js';

import type { TaskStatus } from './task-status.js';
import type { Priority } from './priority.js';
import type { SortField, SortOrder } from './sort.js';

/** Assigned by SQLite on insert, never reused */
export type TaskId = number;

export interface Task {
  readonly id: TaskId;
  readonly title: string;
  readonly description: string | null;
  readonly status: TaskStatus;
  readonly priority: Priority;
  readonly category: string;
  readonly dueDate: string; // yyyy-MM-dd
  readonly createdAt: string; // ISO string, UTC, millisecond precision
  readonly updatedAt: string; // ISO string, UTC, millisecond precision
}

/** Every writable field. Used for creation and full replacement. */
export interface TaskInput {
  readonly title: string;
  readonly description: string | null;
  readonly status: TaskStatus;
  readonly priority: Priority;
  readonly category: string;
  readonly dueDate: string;
}

/** Only the keys present are written */
export type TaskPatch = Partial<TaskInput>;

export interface TaskQuery {
  readonly status?: TaskStatus;
  readonly priority?: Priority;
  readonly category?: string;
  readonly sortBy?: SortField;
  readonly order?: SortOrder;
}

export interface TaskStats {
  readonly total: number;
  readonly byStatus: Record<TaskStatus, number>;
  readonly byPriority: Record<Priority, number>;
}

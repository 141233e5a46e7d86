/**
 * Task CRUD, filtering and maintenance operations using Drizzle ORM.
 */

import { eq, and, asc, desc, count, sql, type SQL } from 'drizzle-orm';
import type { TaskDb } from '../db.js';
import { getRawDb } from '../db.js';
import type { Task, TaskId, TaskInput, TaskPatch, TaskQuery, TaskStats } from '../types/task.js';
import { TaskStatus } from '../types/task-status.js';
import { Priority } from '../types/priority.js';
import { SortOrder, type SortField } from '../types/sort.js';
import { tasks, NOW } from '../schema/tasks.js';

// ---------------------------------------------------------------------------
// Row mapper
// ---------------------------------------------------------------------------

/** Map a Drizzle row to a Task object */
function toTask(row: typeof tasks.$inferSelect): Task {
  return { ...row };
}

/** Sortable columns keyed by their wire name. Never interpolate user input. */
const SORT_COLUMNS = {
  due_date: tasks.dueDate,
  created_at: tasks.createdAt,
  updated_at: tasks.updatedAt,
} satisfies Record<SortField, unknown>;

// ---------------------------------------------------------------------------
// Read queries
// ---------------------------------------------------------------------------

/** Get a single task by ID */
export function getTaskById(db: TaskDb, taskId: TaskId): Task | null {
  const row = db.select().from(tasks).where(eq(tasks.id, taskId)).get();
  return row ? toTask(row) : null;
}

/**
 * List tasks matching every supplied filter.
 * Without a sort key the order is by id; with one, id breaks ties.
 */
export function listTasks(db: TaskDb, query: TaskQuery = {}): Task[] {
  const conditions: SQL[] = [];

  if (query.status != null) {
    conditions.push(eq(tasks.status, query.status));
  }
  if (query.priority != null) {
    conditions.push(eq(tasks.priority, query.priority));
  }
  if (query.category != null) {
    conditions.push(eq(tasks.category, query.category));
  }

  const ordering: SQL[] = [];
  if (query.sortBy != null) {
    const column = SORT_COLUMNS[query.sortBy];
    ordering.push(query.order === SortOrder.Desc ? desc(column) : asc(column));
  }
  ordering.push(asc(tasks.id));

  const rows = db.select().from(tasks)
    .where(conditions.length > 0 ? and(...conditions) : undefined)
    .orderBy(...ordering)
    .all();
  return rows.map(toTask);
}

/** Count tasks overall and per status and priority */
export function getStats(db: TaskDb): TaskStats {
  const byStatus: Record<TaskStatus, number> = {
    [TaskStatus.Pending]: 0,
    [TaskStatus.InProgress]: 0,
    [TaskStatus.Completed]: 0,
  };
  const byPriority: Record<Priority, number> = {
    [Priority.Low]: 0,
    [Priority.Medium]: 0,
    [Priority.High]: 0,
  };

  const statusRows = db.select({ status: tasks.status, n: count() }).from(tasks).groupBy(tasks.status).all();
  for (const row of statusRows) byStatus[row.status] = row.n;

  const priorityRows = db.select({ priority: tasks.priority, n: count() }).from(tasks).groupBy(tasks.priority).all();
  for (const row of priorityRows) byPriority[row.priority] = row.n;

  return {
    total: statusRows.reduce((sum, row) => sum + row.n, 0),
    byStatus,
    byPriority,
  };
}

// ---------------------------------------------------------------------------
// Write operations
// ---------------------------------------------------------------------------

/** Insert a task. Both timestamps come from the same clock reading. */
export function createTask(db: TaskDb, input: TaskInput): Task {
  const row = db.insert(tasks).values({
    title: input.title,
    description: input.description,
    status: input.status,
    priority: input.priority,
    category: input.category,
    dueDate: input.dueDate,
    createdAt: NOW,
    updatedAt: NOW,
  }).returning().get();
  return toTask(row);
}

/** Overwrite every writable field. Returns null when the task does not exist. */
export function replaceTask(db: TaskDb, taskId: TaskId, input: TaskInput): Task | null {
  const row = db.update(tasks).set({
    title: input.title,
    description: input.description,
    status: input.status,
    priority: input.priority,
    category: input.category,
    dueDate: input.dueDate,
    updatedAt: NOW,
  }).where(eq(tasks.id, taskId)).returning().get();
  return row ? toTask(row) : null;
}

/**
 * Write only the fields present in the patch. An empty patch still
 * refreshes updated_at. Returns null when the task does not exist.
 */
export function patchTask(db: TaskDb, taskId: TaskId, patch: TaskPatch): Task | null {
  const row = db.update(tasks).set({
    ...(patch.title !== undefined && { title: patch.title }),
    ...(patch.description !== undefined && { description: patch.description }),
    ...(patch.status !== undefined && { status: patch.status }),
    ...(patch.priority !== undefined && { priority: patch.priority }),
    ...(patch.category !== undefined && { category: patch.category }),
    ...(patch.dueDate !== undefined && { dueDate: patch.dueDate }),
    updatedAt: NOW,
  }).where(eq(tasks.id, taskId)).returning().get();
  return row ? toTask(row) : null;
}

/** Permanently delete a task. Returns false when nothing was deleted. */
export function deleteTask(db: TaskDb, taskId: TaskId): boolean {
  const result = db.delete(tasks).where(eq(tasks.id, taskId)).run();
  return result.changes > 0;
}

// ---------------------------------------------------------------------------
// Maintenance
// ---------------------------------------------------------------------------

/** Delete every task and restart ids at 1. Returns the number deleted. */
export function clearTasks(db: TaskDb): number {
  const raw = getRawDb(db);
  return raw.transaction(() => {
    const { changes } = db.delete(tasks).run();
    db.run(sql`DELETE FROM sqlite_sequence WHERE name = 'tasks'`);
    return changes;
  })();
}

/** Insert many tasks atomically: either all are created or none */
export function seedTasks(db: TaskDb, inputs: readonly TaskInput[]): Task[] {
  const raw = getRawDb(db);
  return raw.transaction(() => inputs.map(input => createTask(db, input)))();
}

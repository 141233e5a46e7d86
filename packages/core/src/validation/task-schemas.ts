/**
 * Request payload schemas. Bodies and query strings arrive in the snake_case
 * wire format and come out as the camelCase domain types.
 */

import { z } from 'zod';
import { TASK_STATUSES } from '../types/task-status.js';
import { PRIORITIES } from '../types/priority.js';
import { SORT_FIELDS, SORT_ORDERS, SortOrder } from '../types/sort.js';
import type { TaskInput, TaskPatch, TaskQuery } from '../types/task.js';

export const TITLE_MAX_LENGTH = 200;

const DUE_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/** True for yyyy-MM-dd strings naming a day that exists (rejects 2026-02-30) */
export function isCalendarDate(value: string): boolean {
  const match = DUE_DATE_PATTERN.exec(value);
  if (!match) return false;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);

  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  return date.getUTCFullYear() === year
    && date.getUTCMonth() === month - 1
    && date.getUTCDate() === day;
}

export const taskStatusSchema = z.enum(TASK_STATUSES);
export const taskPrioritySchema = z.enum(PRIORITIES);

/** Length in characters (code points), the way SQLite's length() counts text */
export function charLength(value: string): number {
  return [...value].length;
}

// SQLite's length() stops at the first NUL, so such a title would trip the table CHECK
const titleSchema = z.string()
  .min(1)
  .refine(value => !value.includes('\u0000'), 'Must not contain NUL characters')
  .refine(value => charLength(value) <= TITLE_MAX_LENGTH, `Must be at most ${TITLE_MAX_LENGTH} characters`);
const descriptionSchema = z.string().nullable();
const categorySchema = z.string().min(1);
const dueDateSchema = z.string()
  .regex(DUE_DATE_PATTERN, 'Expected a date in YYYY-MM-DD format')
  // A value of the wrong shape already failed the regex; report it once
  .refine(value => !DUE_DATE_PATTERN.test(value) || isCalendarDate(value), 'Not a valid calendar date');

/** Full payload: POST and PUT. Only description may be left out. */
export const taskCreateSchema = z.object({
  title: titleSchema,
  description: descriptionSchema.optional(),
  status: taskStatusSchema,
  priority: taskPrioritySchema,
  category: categorySchema,
  due_date: dueDateSchema,
}).transform((body): TaskInput => ({
  title: body.title,
  description: body.description ?? null,
  status: body.status,
  priority: body.priority,
  category: body.category,
  dueDate: body.due_date,
}));

/**
 * Partial payload: PATCH. Absent keys stay absent in the result;
 * `description: null` clears the description.
 */
export const taskPatchSchema = z.object({
  title: titleSchema.optional(),
  description: descriptionSchema.optional(),
  status: taskStatusSchema.optional(),
  priority: taskPrioritySchema.optional(),
  category: categorySchema.optional(),
  due_date: dueDateSchema.optional(),
}).transform((body): TaskPatch => ({
  ...(body.title !== undefined && { title: body.title }),
  ...(body.description !== undefined && { description: body.description }),
  ...(body.status !== undefined && { status: body.status }),
  ...(body.priority !== undefined && { priority: body.priority }),
  ...(body.category !== undefined && { category: body.category }),
  ...(body.due_date !== undefined && { dueDate: body.due_date }),
}));

/** List filters. Unknown parameters are an error, not ignored. */
export const taskQuerySchema = z.object({
  status: taskStatusSchema.optional(),
  priority: taskPrioritySchema.optional(),
  category: z.string().optional(),
  sort_by: z.enum(SORT_FIELDS).optional(),
  order: z.enum(SORT_ORDERS).default(SortOrder.Asc),
}).strict().transform((query): TaskQuery => ({
  ...(query.status !== undefined && { status: query.status }),
  ...(query.priority !== undefined && { priority: query.priority }),
  // An empty category means no category filter
  ...(query.category !== undefined && query.category !== '' && { category: query.category }),
  ...(query.sort_by !== undefined && { sortBy: query.sort_by }),
  order: query.order,
}));

export const taskParamsSchema = z.object({
  task_id: z.string()
    .regex(/^-?\d{1,15}$/, 'Expected an integer')
    .transform(Number),
});

export {
  TITLE_MAX_LENGTH,
  isCalendarDate,
  charLength,
  taskStatusSchema,
  taskPrioritySchema,
  taskCreateSchema,
  taskPatchSchema,
  taskQuerySchema,
  taskParamsSchema,
} from './task-schemas.js';
export { formatIssues, validate } from './validate.js';
export type { IssueLocation, FieldIssue, ValidationResult } from './validate.js';

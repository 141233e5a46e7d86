/** Columns a task list may be ordered by, as they appear on the wire */
export const SortField = {
  DueDate: 'due_date',
  CreatedAt: 'created_at',
  UpdatedAt: 'updated_at',
} as const;

export type SortField = (typeof SortField)[keyof typeof SortField];

export const SORT_FIELDS = [SortField.DueDate, SortField.CreatedAt, SortField.UpdatedAt] as const;

export const SortOrder = {
  Asc: 'asc',
  Desc: 'desc',
} as const;

export type SortOrder = (typeof SortOrder)[keyof typeof SortOrder];

export const SORT_ORDERS = [SortOrder.Asc, SortOrder.Desc] as const;

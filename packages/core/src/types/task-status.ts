export const TaskStatus = {
  Pending: 'pending',
  InProgress: 'in_progress',
  Completed: 'completed',
} as const;

export type TaskStatus = (typeof TaskStatus)[keyof typeof TaskStatus];

/** Every status in declaration order */
export const TASK_STATUSES = [
  TaskStatus.Pending,
  TaskStatus.InProgress,
  TaskStatus.Completed,
] as const;

/** Reverse mapping for display purposes */
export const TaskStatusName: Record<TaskStatus, string> = {
  [TaskStatus.Pending]: 'Pending',
  [TaskStatus.InProgress]: 'In Progress',
  [TaskStatus.Completed]: 'Completed',
};

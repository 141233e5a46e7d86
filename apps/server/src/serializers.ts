import type { Task, TaskStatus, Priority } from '@taskapi/core';

/** A task as it appears on the wire */
export interface TaskResponse {
  id: number;
  title: string;
  description: string | null;
  status: TaskStatus;
  priority: Priority;
  category: string;
  due_date: string;
  created_at: string;
  updated_at: string;
}

export function toTaskResponse(task: Task): TaskResponse {
  return {
    id: task.id,
    title: task.title,
    description: task.description,
    status: task.status,
    priority: task.priority,
    category: task.category,
    due_date: task.dueDate,
    created_at: task.createdAt,
    updated_at: task.updatedAt,
  };
}

export const TASK_STATUSES = ['active', 'completed', 'archived'] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

export const TASK_PRIORITIES = ['low', 'medium', 'high'] as const;
export type TaskPriority = (typeof TASK_PRIORITIES)[number];

export interface Task {
  /** Assigned by the store, never reused */
  id: number;
  title: string;
  description?: string;
  status: TaskStatus;
  priority: TaskPriority;
  /** ISO-8601 */
  dueDate?: string;
  tags: string[];
  createdAt: string;
  updatedAt: string;
}

export interface TaskCreateInput {
  title: string;
  description?: string;
  status?: TaskStatus;
  priority?: TaskPriority;
  dueDate?: string;
  tags?: string[];
}

/**
 * Partial update. An omitted (undefined) field is left unchanged;
 * `null` clears one of the optional fields.
 */
export interface TaskPatch {
  title?: string;
  description?: string | null;
  status?: TaskStatus;
  priority?: TaskPriority;
  dueDate?: string | null;
  tags?: string[];
}

export interface TaskStatistics {
  total: number;
  active: number;
  completed: number;
  archived: number;
}

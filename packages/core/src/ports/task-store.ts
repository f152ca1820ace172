import type {
  Task,
  TaskCreateInput,
  TaskPatch,
  TaskPriority,
  TaskStatistics,
  TaskStatus,
} from '../models/task.js';

export interface TaskFilter {
  status?: TaskStatus;
  priority?: TaskPriority;
  /** Matches tasks carrying any of these tags */
  tags?: string[];
}

export interface TaskQuery extends TaskFilter {
  /** 1-based, defaults to 1 */
  page?: number;
  /** 1-100, defaults to 10 */
  pageSize?: number;
}

export interface TaskPage {
  tasks: Task[];
  /** Matching tasks before pagination */
  total: number;
}

export interface ITaskStore {
  create(input: TaskCreateInput): Promise<Task>;
  get(taskId: number): Promise<Task | null>;
  list(query?: TaskQuery): Promise<TaskPage>;
  listByStatus(status: TaskStatus): Promise<Task[]>;
  update(taskId: number, patch: TaskPatch): Promise<Task | null>;
  delete(taskId: number): Promise<boolean>;
  statistics(): Promise<TaskStatistics>;
  /** Drops every task and restarts ids at 1 */
  clear(): Promise<void>;
}

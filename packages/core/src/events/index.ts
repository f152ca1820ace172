import type { Task, TaskStatus } from '../models/task.js';
import type { JobStatus } from '../models/job.js';

// Task events
export interface TaskCreatedEvent {
  task: Task;
}

export interface TaskUpdatedEvent {
  task: Task;
  previousStatus: TaskStatus;
}

export interface TaskDeletedEvent {
  taskId: number;
}

// Job events
export interface JobStartedEvent {
  job: JobStatus;
}

export interface JobProgressEvent {
  job: JobStatus;
}

export interface JobFinishedEvent {
  job: JobStatus;
  durationMs: number;
}

export const Events = {
  TASK_CREATED: 'task:created',
  TASK_UPDATED: 'task:updated',
  TASK_DELETED: 'task:deleted',
  JOB_STARTED: 'job:started',
  JOB_PROGRESS: 'job:progress',
  JOB_COMPLETED: 'job:completed',
  JOB_FAILED: 'job:failed',
} as const;

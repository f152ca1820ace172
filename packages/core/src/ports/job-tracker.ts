import type { JobStatus, JobStep, JobUpdate } from '../models/job.js';

export interface IJobTracker {
  /** Registers a running job and schedules its driver. Returns without waiting for it. */
  start(durationSeconds: number, step?: JobStep): string;
  status(jobId: string): JobStatus | null;
  list(): JobStatus[];
  /** Driver-only. Returns null when the job is unknown or already terminal. */
  applyUpdate(jobId: string, update: JobUpdate): JobStatus | null;
}

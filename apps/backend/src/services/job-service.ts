import type { IJobTracker, JobStatus } from '@taskdeck/core';
import { JobDurationSchema, parseInput } from '@taskdeck/core';
import { guard, notFound, ok, type ServiceResult } from './result.js';

export interface JobStartResponse {
  jobId: string;
  status: 'started';
  message: string;
}

export class JobService {
  constructor(private readonly tracker: IJobTracker) {}

  /** Returns as soon as the job is registered; poll status() for progress. */
  start(rawDuration?: unknown): Promise<ServiceResult<JobStartResponse>> {
    return guard(async () => {
      const duration = parseInput(JobDurationSchema, rawDuration);
      const jobId = this.tracker.start(duration);
      return ok<JobStartResponse>({
        jobId,
        status: 'started',
        message: `Background job started with duration ${duration}s`,
      });
    });
  }

  async status(jobId: string): Promise<ServiceResult<JobStatus>> {
    const job = this.tracker.status(jobId);
    return job ? ok(job) : notFound<JobStatus>('job', jobId);
  }

  async list(): Promise<ServiceResult<JobStatus[]>> {
    return ok(this.tracker.list());
  }
}

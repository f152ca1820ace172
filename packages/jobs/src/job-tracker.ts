import { v4 as uuid } from 'uuid';
import type {
  Clock,
  IEventBus,
  IJobTracker,
  JobFinishedEvent,
  JobProgressEvent,
  JobStartedEvent,
  JobStatus,
  JobStep,
  JobUpdate,
} from '@taskdeck/core';
import {
  DEFAULT_JOB_STEP_MS,
  DEFAULT_MAX_CONCURRENT_JOBS,
  Events,
  JOB_DURATION_MAX,
  JOB_DURATION_MIN,
  JOB_STATES,
  ValidationError,
  createLogger,
  createMonotonicClock,
  errorMessage,
  isTerminal,
} from '@taskdeck/core';
import { runJobDriver, startMessage, type Sleep } from './job-driver.js';
import { WorkerSlots } from './utils/worker-slots.js';

const log = createLogger('JobTracker');

export const QUEUED_MESSAGE = 'Queued (waiting for a worker)';

export interface JobTrackerOptions {
  /** Wall time of one unit of simulated work (default 1000 ms) */
  stepMs?: number;
  /** Drivers allowed to run at once; later starts wait in FIFO order */
  maxConcurrentJobs?: number;
  eventBus?: IEventBus;
  clock?: Clock;
  generateId?: () => string;
  sleep?: Sleep;
}

function copyJob(job: JobStatus): JobStatus {
  return job.result ? { ...job, result: { ...job.result } } : { ...job };
}

function compareStartedAt(a: JobStatus, b: JobStatus): number {
  if (a.startedAt === b.startedAt) return 0;
  return a.startedAt < b.startedAt ? -1 : 1;
}

/** Rejects updates that would break the job state machine. */
function checkUpdate(job: JobStatus, update: JobUpdate): void {
  if (!JOB_STATES.includes(update.status)) {
    throw new ValidationError('status', `Unknown job status "${update.status}"`);
  }
  if (!Number.isInteger(update.progress) || update.progress < 0 || update.progress > 100) {
    throw new ValidationError('progress', `progress must be an integer between 0 and 100, got ${update.progress}`);
  }
  if (update.status === 'running' && update.progress < job.progress) {
    throw new ValidationError('progress', `progress cannot go from ${job.progress} back to ${update.progress}`);
  }
  if (update.status === 'completed' && update.progress !== 100) {
    throw new ValidationError('progress', 'a completed job must report progress 100');
  }
  if (update.result !== undefined && update.status !== 'completed') {
    throw new ValidationError('result', 'only a completed job carries a result');
  }
}

/**
 * Owns every job record. Each job has exactly one writer after registration:
 * its own driver, which commits through applyUpdate(). All methods here are
 * synchronous, so a commit is never interleaved with another read or write,
 * and a driver's sleep happens entirely outside them.
 */
export class JobTracker implements IJobTracker {
  private readonly jobs = new Map<string, JobStatus>();
  /** Driver handles; kept only so callers can wait for a job to settle */
  private readonly drivers = new Map<string, Promise<void>>();
  private readonly slots: WorkerSlots;
  private readonly stepMs: number;
  private readonly clock: Clock;
  private readonly eventBus: IEventBus | null;
  private readonly generateId: () => string;
  private readonly sleep: Sleep | undefined;

  constructor(options: JobTrackerOptions = {}) {
    this.stepMs = options.stepMs ?? DEFAULT_JOB_STEP_MS;
    this.slots = new WorkerSlots(options.maxConcurrentJobs ?? DEFAULT_MAX_CONCURRENT_JOBS);
    this.clock = options.clock ?? createMonotonicClock();
    this.eventBus = options.eventBus ?? null;
    this.generateId = options.generateId ?? (() => uuid());
    this.sleep = options.sleep;
  }

  start(durationSeconds: number, step?: JobStep): string {
    if (
      !Number.isInteger(durationSeconds) ||
      durationSeconds < JOB_DURATION_MIN ||
      durationSeconds > JOB_DURATION_MAX
    ) {
      throw new ValidationError(
        'duration',
        `duration must be an integer between ${JOB_DURATION_MIN} and ${JOB_DURATION_MAX}`,
      );
    }

    const jobId = this.generateId();
    if (this.jobs.has(jobId)) {
      throw new Error(`Duplicate job id generated: ${jobId}`);
    }

    const hasSlot = this.slots.tryAcquire();
    const job: JobStatus = {
      jobId,
      status: 'running',
      progress: 0,
      message: hasSlot ? startMessage(durationSeconds) : QUEUED_MESSAGE,
      startedAt: this.clock.now().toISOString(),
    };
    this.jobs.set(jobId, job);
    log.info(`Job ${jobId} started`, { durationSeconds, queued: !hasSlot });
    this.eventBus?.emit(Events.JOB_STARTED, { job: copyJob(job) } satisfies JobStartedEvent);

    const ready = hasSlot ? Promise.resolve() : this.slots.acquire();
    const handle = ready
      .then(() =>
        runJobDriver(this, jobId, durationSeconds, {
          stepMs: this.stepMs,
          clock: this.clock,
          step,
          sleep: this.sleep,
        }),
      )
      .finally(() => this.slots.release())
      .catch((err: unknown) => {
        log.error(`Driver for job ${jobId} crashed: ${errorMessage(err)}`);
      });
    this.drivers.set(jobId, handle);

    return jobId;
  }

  status(jobId: string): JobStatus | null {
    const job = this.jobs.get(jobId);
    return job ? copyJob(job) : null;
  }

  /** Oldest first */
  list(): JobStatus[] {
    return Array.from(this.jobs.values()).sort(compareStartedAt).map(copyJob);
  }

  applyUpdate(jobId: string, update: JobUpdate): JobStatus | null {
    const job = this.jobs.get(jobId);
    if (!job) {
      log.warn(`Update for unknown job ${jobId} ignored`);
      return null;
    }
    if (isTerminal(job.status)) {
      log.warn(`Job ${jobId} is already ${job.status}, update rejected`);
      return null;
    }
    checkUpdate(job, update);

    job.status = update.status;
    job.progress = update.progress;
    job.message = update.message;
    if (update.result !== undefined) {
      job.result = { ...update.result };
    }

    if (!isTerminal(job.status)) {
      this.eventBus?.emit(Events.JOB_PROGRESS, { job: copyJob(job) } satisfies JobProgressEvent);
      return copyJob(job);
    }

    const finishedAt = this.clock.now();
    job.completedAt = finishedAt.toISOString();
    const durationMs = finishedAt.getTime() - Date.parse(job.startedAt);
    if (job.status === 'completed') {
      log.info(`Job ${jobId} completed`, { durationMs });
      this.eventBus?.emit(Events.JOB_COMPLETED, { job: copyJob(job), durationMs } satisfies JobFinishedEvent);
    } else {
      log.warn(`Job ${jobId} failed: ${job.message}`);
      this.eventBus?.emit(Events.JOB_FAILED, { job: copyJob(job), durationMs } satisfies JobFinishedEvent);
    }
    return copyJob(job);
  }

  /** Resolves once the job's driver has finished, with the final record. */
  async settled(jobId: string): Promise<JobStatus | null> {
    await this.drivers.get(jobId);
    return this.status(jobId);
  }

  /** Waits for every driver started so far. */
  async whenIdle(): Promise<void> {
    await Promise.all(this.drivers.values());
  }

  get runningDrivers(): number {
    return this.slots.inUse;
  }

  get queuedJobs(): number {
    return this.slots.waiting;
  }
}

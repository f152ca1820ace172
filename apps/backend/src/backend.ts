import { EventBus, HookRegistry } from '@taskdeck/eventbus';
import { MemoryTaskStore } from '@taskdeck/tasks';
import { JobTracker, type Sleep } from '@taskdeck/jobs';
import type { Clock, JobFinishedEvent } from '@taskdeck/core';
import { Events, createLogger } from '@taskdeck/core';
import { DEFAULT_CONFIG, type TaskdeckConfig } from './config.js';
import { TaskService } from './services/task-service.js';
import { JobService } from './services/job-service.js';

const log = createLogger('Backend');

export interface BackendOverrides {
  clock?: Clock;
  generateJobId?: () => string;
  sleep?: Sleep;
}

export interface HealthReport {
  status: 'healthy';
  timestamp: string;
  version: string;
  runningJobs: number;
  queuedJobs: number;
}

function isJobFinishedEvent(payload: unknown): payload is JobFinishedEvent {
  return typeof payload === 'object' && payload !== null && 'job' in payload && 'durationMs' in payload;
}

/**
 * Composition root. Each instance owns its own bus, store and tracker;
 * nothing is shared between instances, so tests can build as many as they need.
 * The log level is process-wide and is set by startBackend(), not here.
 */
export class Backend {
  readonly config: TaskdeckConfig;
  readonly eventBus: EventBus;
  readonly hooks: HookRegistry;
  readonly taskStore: MemoryTaskStore;
  readonly jobTracker: JobTracker;
  readonly tasks: TaskService;
  readonly jobs: JobService;

  constructor(config: TaskdeckConfig = DEFAULT_CONFIG, overrides: BackendOverrides = {}) {
    this.config = config;

    this.eventBus = new EventBus();
    this.hooks = new HookRegistry(this.eventBus);
    this.taskStore = new MemoryTaskStore({ clock: overrides.clock, eventBus: this.eventBus });
    this.jobTracker = new JobTracker({
      stepMs: config.jobStepMs,
      maxConcurrentJobs: config.maxConcurrentJobs,
      eventBus: this.eventBus,
      clock: overrides.clock,
      generateId: overrides.generateJobId,
      sleep: overrides.sleep,
    });
    this.tasks = new TaskService(this.taskStore, config.defaultPageSize);
    this.jobs = new JobService(this.jobTracker);

    this.registerHooks();
    log.info(`${config.appName} ${config.version} ready`, {
      maxConcurrentJobs: config.maxConcurrentJobs,
      jobStepMs: config.jobStepMs,
    });
  }

  health(): HealthReport {
    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      version: this.config.version,
      runningJobs: this.jobTracker.runningDrivers,
      queuedJobs: this.jobTracker.queuedJobs,
    };
  }

  /** Drops every task. Jobs are left alone: a started job always runs to the end. */
  async reset(): Promise<void> {
    await this.taskStore.clear();
  }

  /** Waits for in-flight jobs, then detaches hooks and listeners. */
  async stop(): Promise<void> {
    await this.jobTracker.whenIdle();
    this.hooks.destroy();
    this.eventBus.removeAllListeners();
    log.info(`${this.config.appName} stopped`);
  }

  private registerHooks(): void {
    this.hooks.register(Events.JOB_COMPLETED, (payload) => {
      if (isJobFinishedEvent(payload)) {
        log.info(`Job ${payload.job.jobId} finished in ${payload.durationMs}ms`);
      }
    });
    this.hooks.register(Events.JOB_FAILED, (payload) => {
      if (isJobFinishedEvent(payload)) {
        log.warn(`Job ${payload.job.jobId} failed: ${payload.job.message}`);
      }
    }, 10);
  }
}

export function createBackend(config?: TaskdeckConfig, overrides?: BackendOverrides): Backend {
  return new Backend(config, overrides);
}

export const JOB_STATES = ['running', 'completed', 'failed'] as const;
export type JobState = (typeof JOB_STATES)[number];

export type TerminalJobState = Exclude<JobState, 'running'>;

export type JobResult = Record<string, unknown>;

export interface JobStatus {
  jobId: string;
  status: JobState;
  /** 0-100, non-decreasing while running */
  progress: number;
  message: string;
  startedAt: string;
  /** Stamped once, on the transition to a terminal state */
  completedAt?: string;
  /** Only present on completed jobs */
  result?: JobResult;
}

export interface JobUpdate {
  status: JobState;
  progress: number;
  message: string;
  result?: JobResult;
}

/** Work performed by a job between two progress reports. Throwing fails the job. */
export type JobStep = (step: number, totalSteps: number) => void | Promise<void>;

export function isTerminal(status: JobState): status is TerminalJobState {
  return status === 'completed' || status === 'failed';
}

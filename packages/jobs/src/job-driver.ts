import type { Clock, IJobTracker, JobStep } from '@taskdeck/core';
import { createLogger, errorMessage } from '@taskdeck/core';

const log = createLogger('JobDriver');

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface JobDriverOptions {
  /** Wall time of one unit step */
  stepMs: number;
  clock: Clock;
  step?: JobStep;
  sleep?: Sleep;
}

export function startMessage(durationSeconds: number): string {
  return `Starting job (duration: ${durationSeconds}s)`;
}

/**
 * The whole life of one job: `duration` unit steps with a progress report
 * after each, then a single completed update. The first error thrown by a
 * step turns into a single failed update and ends the run; it is never
 * rethrown. Sleeping happens outside the tracker, which only sees the
 * individual applyUpdate() commits.
 */
export async function runJobDriver(
  tracker: Pick<IJobTracker, 'applyUpdate'>,
  jobId: string,
  durationSeconds: number,
  options: JobDriverOptions,
): Promise<void> {
  const wait = options.sleep ?? sleep;

  try {
    if (!tracker.applyUpdate(jobId, { status: 'running', progress: 0, message: startMessage(durationSeconds) })) {
      return;
    }

    for (let i = 1; i <= durationSeconds; i++) {
      await wait(options.stepMs);
      await options.step?.(i, durationSeconds);

      const accepted = tracker.applyUpdate(jobId, {
        status: 'running',
        progress: Math.round((i / durationSeconds) * 100),
        message: `Processing step ${i}/${durationSeconds}`,
      });
      if (!accepted) {
        log.debug(`Job ${jobId} no longer accepts updates, stopping at step ${i}`);
        return;
      }
    }

    tracker.applyUpdate(jobId, {
      status: 'completed',
      progress: 100,
      message: 'Job completed successfully',
      result: {
        processedItems: durationSeconds,
        success: true,
        completionTime: options.clock.now().toISOString(),
      },
    });
  } catch (err) {
    log.error(`Job ${jobId} failed: ${errorMessage(err)}`);
    tracker.applyUpdate(jobId, {
      status: 'failed',
      progress: 0,
      message: `Job failed: ${errorMessage(err)}`,
    });
  }
}

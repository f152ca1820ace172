import { describe, it, expect, vi } from 'vitest';
import type { Clock, JobStatus, JobUpdate } from '@taskdeck/core';
import { runJobDriver } from '../job-driver.js';

const T0 = '2025-06-01T12:00:00.000Z';
const clock: Clock = { now: () => new Date(T0) };

function recordingTracker(acceptUpTo = Infinity) {
  const updates: JobUpdate[] = [];
  const applyUpdate = vi.fn((jobId: string, update: JobUpdate): JobStatus | null => {
    updates.push(update);
    if (updates.length > acceptUpTo) return null;
    return { jobId, startedAt: T0, ...update };
  });
  return { tracker: { applyUpdate }, updates };
}

describe('runJobDriver', () => {
  it('reports each step and then completes with a result', async () => {
    const { tracker, updates } = recordingTracker();
    const sleep = vi.fn(() => Promise.resolve());

    await runJobDriver(tracker, 'job-1', 2, { stepMs: 250, clock, sleep });

    expect(updates).toEqual([
      { status: 'running', progress: 0, message: 'Starting job (duration: 2s)' },
      { status: 'running', progress: 50, message: 'Processing step 1/2' },
      { status: 'running', progress: 100, message: 'Processing step 2/2' },
      {
        status: 'completed',
        progress: 100,
        message: 'Job completed successfully',
        result: { processedItems: 2, success: true, completionTime: T0 },
      },
    ]);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(250);
  });

  it('rounds progress to whole percentages', async () => {
    const { tracker, updates } = recordingTracker();

    await runJobDriver(tracker, 'job-1', 3, { stepMs: 0, clock, sleep: () => Promise.resolve() });

    expect(updates.map((u) => u.progress)).toEqual([0, 33, 67, 100, 100]);
  });

  it('turns a throwing step into one failed update and stops', async () => {
    const { tracker, updates } = recordingTracker();
    const step = vi.fn((i: number) => {
      if (i === 2) throw new Error('disk full');
    });

    await expect(
      runJobDriver(tracker, 'job-1', 4, { stepMs: 0, clock, step, sleep: () => Promise.resolve() }),
    ).resolves.toBeUndefined();

    expect(step).toHaveBeenCalledTimes(2);
    expect(updates.at(-1)).toEqual({ status: 'failed', progress: 0, message: 'Job failed: disk full' });
    expect(updates.filter((u) => u.status === 'failed')).toHaveLength(1);
  });

  it('also contains async step rejections', async () => {
    const { tracker, updates } = recordingTracker();

    await runJobDriver(tracker, 'job-1', 2, {
      stepMs: 0,
      clock,
      step: async () => {
        throw new Error('remote refused');
      },
      sleep: () => Promise.resolve(),
    });

    expect(updates.at(-1)?.message).toBe('Job failed: remote refused');
  });

  it('stops as soon as the tracker refuses an update', async () => {
    const { tracker, updates } = recordingTracker(1);
    const sleep = vi.fn(() => Promise.resolve());

    await runJobDriver(tracker, 'job-1', 5, { stepMs: 0, clock, sleep });

    expect(updates).toHaveLength(2);
    expect(sleep).toHaveBeenCalledTimes(1);
  });
});

export { JobTracker, QUEUED_MESSAGE } from './job-tracker.js';
export type { JobTrackerOptions } from './job-tracker.js';
export { runJobDriver, sleep, startMessage } from './job-driver.js';
export type { JobDriverOptions, Sleep } from './job-driver.js';
export { WorkerSlots } from './utils/worker-slots.js';

export * from './models/task.js';
export * from './models/job.js';
export * from './ports/task-store.js';
export * from './ports/job-tracker.js';
export * from './ports/event-bus.js';
export * from './events/index.js';
export * from './constants.js';
export * from './errors.js';
export * from './task-rules.js';
export * from './schemas.js';
export * from './clock.js';
export * from './logger.js';

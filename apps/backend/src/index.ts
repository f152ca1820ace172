export { Backend, createBackend } from './backend.js';
export type { BackendOverrides, HealthReport } from './backend.js';
export { startBackend } from './main.js';
export type { StartOptions } from './main.js';
export { loadConfig, DEFAULT_CONFIG, CONFIG_FILE_NAME } from './config.js';
export type { TaskdeckConfig, LoadConfigOptions } from './config.js';
export { TaskService } from './services/task-service.js';
export type { TaskListResponse, StatisticsResponse } from './services/task-service.js';
export { JobService } from './services/job-service.js';
export type { JobStartResponse } from './services/job-service.js';
export type { ServiceResult, ServiceError } from './services/result.js';

export { MemoryTaskStore } from './stores/memory-task-store.js';
export type { MemoryTaskStoreOptions } from './stores/memory-task-store.js';
export { Mutex } from './utils/mutex.js';

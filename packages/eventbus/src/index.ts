export { EventBus } from './event-bus.js';
export { HookRegistry } from './hook-registry.js';
export type { HookHandler, HookRegistration } from './hook-registry.js';

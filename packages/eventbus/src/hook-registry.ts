import type { IEventBus } from '@taskdeck/core';
import { createLogger, errorMessage } from '@taskdeck/core';

const log = createLogger('HookRegistry');

export type HookHandler = (payload: unknown) => void | Promise<void>;

export interface HookRegistration {
  event: string;
  handler: HookHandler;
  priority: number;
}

/**
 * Named side-effect hooks on top of the bus. Sync throws and async
 * rejections are both logged; neither reaches the emitter.
 */
export class HookRegistry {
  private hooks: HookRegistration[] = [];
  private unsubscribers: Array<() => void> = [];

  constructor(private readonly eventBus: IEventBus) {}

  register(event: string, handler: HookHandler, priority = 0): void {
    this.hooks.push({ event, handler, priority });
    this.hooks.sort((a, b) => b.priority - a.priority);

    const unsubscribe = this.eventBus.on(event, (payload: unknown) => {
      try {
        const pending = handler(payload);
        if (pending instanceof Promise) {
          pending.catch((error: unknown) => {
            log.error(`Error in async hook for "${event}": ${errorMessage(error)}`);
          });
        }
      } catch (error) {
        log.error(`Error in hook for "${event}": ${errorMessage(error)}`);
      }
    });

    this.unsubscribers.push(unsubscribe);
  }

  /** Registered hooks, highest priority first */
  list(event?: string): HookRegistration[] {
    return event === undefined ? [...this.hooks] : this.hooks.filter((h) => h.event === event);
  }

  destroy(): void {
    for (const unsub of this.unsubscribers) {
      unsub();
    }
    this.unsubscribers = [];
    this.hooks = [];
  }
}

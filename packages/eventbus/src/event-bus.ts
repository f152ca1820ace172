import type { EventHandler, IEventBus } from '@taskdeck/core';
import { createLogger, errorMessage } from '@taskdeck/core';

const log = createLogger('EventBus');

/** Synchronous in-process pub/sub. A failing handler is logged and skipped. */
export class EventBus implements IEventBus {
  private handlers = new Map<string, Set<EventHandler>>();

  on(event: string, handler: EventHandler): () => void {
    let set = this.handlers.get(event);
    if (!set) {
      set = new Set();
      this.handlers.set(event, set);
    }
    set.add(handler);
    return () => {
      const current = this.handlers.get(event);
      if (!current) return;
      current.delete(handler);
      if (current.size === 0) this.handlers.delete(event);
    };
  }

  once(event: string, handler: EventHandler): () => void {
    const unsubscribe = this.on(event, (payload) => {
      unsubscribe();
      handler(payload);
    });
    return unsubscribe;
  }

  emit(event: string, payload: unknown): void {
    const set = this.handlers.get(event);
    if (!set) return;
    // Snapshot so handlers may unsubscribe while we iterate
    for (const handler of [...set]) {
      try {
        handler(payload);
      } catch (error) {
        log.error(`Error in handler for "${event}": ${errorMessage(error)}`);
      }
    }
  }

  removeAllListeners(event?: string): void {
    if (event === undefined) {
      this.handlers.clear();
    } else {
      this.handlers.delete(event);
    }
  }

  listenerCount(event: string): number {
    return this.handlers.get(event)?.size ?? 0;
  }
}

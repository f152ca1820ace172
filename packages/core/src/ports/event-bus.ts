export type EventHandler = (payload: unknown) => void;

export interface IEventBus {
  /** Returns an unsubscribe function */
  on(event: string, handler: EventHandler): () => void;
  once(event: string, handler: EventHandler): () => void;
  emit(event: string, payload: unknown): void;
  removeAllListeners(event?: string): void;
}

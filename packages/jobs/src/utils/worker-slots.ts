/**
 * Counting semaphore for job drivers. A released slot is handed straight
 * to the oldest waiter, so queued jobs start in FIFO order.
 */
export class WorkerSlots {
  private active = 0;
  private queue: Array<() => void> = [];

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Worker capacity must be a positive integer, got ${capacity}`);
    }
  }

  /** Takes a slot if one is free. Never waits. */
  tryAcquire(): boolean {
    if (this.active >= this.capacity) return false;
    this.active += 1;
    return true;
  }

  async acquire(): Promise<void> {
    if (this.tryAcquire()) return;
    await new Promise<void>((resolve) => this.queue.push(resolve));
  }

  release(): void {
    const next = this.queue.shift();
    if (next) {
      next();
    } else if (this.active > 0) {
      this.active -= 1;
    }
  }

  get inUse(): number {
    return this.active;
  }

  get waiting(): number {
    return this.queue.length;
  }
}

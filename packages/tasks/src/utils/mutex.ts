/**
 * FIFO async mutex for the task store. Callers only see withLock(); the
 * lock is handed directly from one holder to the next waiter, so a section
 * queued earlier always runs before one queued later.
 */
export class Mutex {
  private locked = false;
  private waiters: Array<() => void> = [];

  async withLock<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  private async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return;
    }
    await new Promise<void>((resolve) => this.waiters.push(resolve));
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.locked = false;
    }
  }
}

export interface Clock {
  now(): Date;
}

/**
 * Never goes backwards, even if the wall clock does.
 * Readings from the same millisecond compare equal.
 */
export function createMonotonicClock(source: () => number = () => Date.now()): Clock {
  let last = 0;
  return {
    now() {
      last = Math.max(source(), last);
      return new Date(last);
    },
  };
}

/** Strictly increasing integer ids starting at 1. */
export class IdSequence {
  private nextId = 1;

  take(): number {
    return this.nextId++;
  }

  peek(): number {
    return this.nextId;
  }

  reset(): void {
    this.nextId = 1;
  }
}

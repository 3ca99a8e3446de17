export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms: number) => new Promise(resolve => setTimeout(resolve, ms)),
};

/**
 * Enforces a minimum pause between consecutive requests to one source.
 *
 * The interval runs from the moment one scheduled operation settles to the
 * start of the next, so a slow response still leaves the full pause before
 * the following request. Operations are queued and run one after another.
 */
export class RateLimiter {
  private lastSettledAt: number | null = null;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly minIntervalMs: number,
    private readonly clock: Clock = systemClock
  ) {
    if (!Number.isFinite(minIntervalMs) || minIntervalMs < 0) {
      throw new RangeError(
        `minIntervalMs must be a non-negative number, got ${minIntervalMs}`
      );
    }
  }

  /** Waits for a free slot and marks it used straight away. */
  public acquire(): Promise<void> {
    return this.schedule(async () => undefined);
  }

  public schedule<T>(operation: () => Promise<T>): Promise<T> {
    const run = this.queue.then(async () => {
      await this.waitForSlot();
      try {
        return await operation();
      } finally {
        this.lastSettledAt = this.clock.now();
      }
    });
    // The caller sees the rejection through `run`; the queue only needs to move on.
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async waitForSlot(): Promise<void> {
    if (this.lastSettledAt === null) {
      return;
    }
    const wait = this.minIntervalMs - (this.clock.now() - this.lastSettledAt);
    if (wait > 0) {
      await this.clock.sleep(wait);
    }
  }

  public getMinInterval(): number {
    return this.minIntervalMs;
  }
}

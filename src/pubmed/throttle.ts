/**
 * Outbound request pacing.
 */

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

/**
 * Runs tasks one at a time, starting each at least `minIntervalMs` after the
 * previous one started. A failed task does not block the queue.
 */
export class RequestThrottle {
  private lastStartedAt = Number.NEGATIVE_INFINITY;
  private tail: Promise<void> = Promise.resolve();

  constructor(
    readonly minIntervalMs: number,
    private readonly clock: Clock = systemClock
  ) {}

  schedule<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(async () => {
      const wait = this.lastStartedAt + this.minIntervalMs - this.clock.now();
      if (wait > 0) {
        await this.clock.sleep(wait);
      }
      this.lastStartedAt = this.clock.now();
      return task();
    });
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}

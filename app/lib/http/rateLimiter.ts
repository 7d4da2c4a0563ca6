/**
 * rateLimiter.ts
 *
 * Minimum spacing between outgoing requests to one provider.
 * Callers await acquire() before each request; grants are handed out one at a
 * time in call order, so concurrent callers are serialized.
 */

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

export class RateLimiter {
  private lastGrant = Number.NEGATIVE_INFINITY;
  private tail: Promise<void> = Promise.resolve();

  constructor(
    readonly minIntervalMs: number,
    private readonly clock: Clock = systemClock,
  ) {}

  acquire(): Promise<void> {
    const turn = this.tail.then(async () => {
      const wait = this.lastGrant + this.minIntervalMs - this.clock.now();
      if (wait > 0) {
        await this.clock.sleep(wait);
      }
      this.lastGrant = this.clock.now();
    });
    this.tail = turn;
    return turn;
  }
}

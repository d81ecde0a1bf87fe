import { ConfigurationError } from '../errors/dispatch-errors.js';

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: ms => new Promise(resolve => setTimeout(resolve, ms)),
};

export interface RateLimiter {
  /**
   * Resolves once the next attempt may start.
   * @returns milliseconds spent waiting
   */
  acquire(): Promise<number>;
  readonly totalWaitMs: number;
}

/**
 * Token bucket with capacity 1, refilled at `ratePerSecond` tokens per
 * second. Attempts are spaced at least 1/rate seconds apart, so no one-second
 * window holds more than `ratePerSecond` starts.
 */
export class TokenBucketRateLimiter implements RateLimiter {
  private readonly capacity = 1;
  private tokens: number;
  private updatedAt: number | null = null;
  private waited = 0;

  constructor(
    private readonly ratePerSecond: number,
    private readonly clock: Clock = systemClock
  ) {
    this.tokens = this.capacity;
  }

  get totalWaitMs(): number {
    return this.waited;
  }

  async acquire(): Promise<number> {
    this.refill();

    let waitMs = 0;
    if (this.tokens < 1) {
      waitMs = Math.ceil(((1 - this.tokens) / this.ratePerSecond) * 1000);
      await this.clock.sleep(waitMs);
      this.waited += waitMs;
      this.refill();
      // The sleep may come back early on a coarse timer; the token is owed either way.
      this.tokens = Math.max(this.tokens, 1);
    }

    this.tokens -= 1;
    return waitMs;
  }

  private refill(): void {
    const now = this.clock.now();
    if (this.updatedAt !== null) {
      const seconds = Math.max(0, (now - this.updatedAt) / 1000);
      this.tokens = Math.min(this.capacity, this.tokens + seconds * this.ratePerSecond);
    }
    this.updatedAt = now;
  }
}

/**
 * Used when no rate is configured.
 */
export class UnlimitedRateLimiter implements RateLimiter {
  readonly totalWaitMs = 0;

  async acquire(): Promise<number> {
    return 0;
  }
}

/**
 * @throws ConfigurationError when the rate is below 1 or not a finite number
 */
export function createRateLimiter(ratePerSecond?: number, clock: Clock = systemClock): RateLimiter {
  if (ratePerSecond === undefined) {
    return new UnlimitedRateLimiter();
  }
  if (!Number.isFinite(ratePerSecond) || ratePerSecond < 1) {
    throw new ConfigurationError(`--rate-limit must be a number >= 1, got ${ratePerSecond}`);
  }
  return new TokenBucketRateLimiter(ratePerSecond, clock);
}

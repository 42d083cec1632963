import { delay } from "@shardstream/replay";

/** Reported as the limit when no rate is configured. */
export const UNLIMITED_RATE = 2147483647;

export interface RateLimiterOptions {
  /** Unlimited when absent */
  recordsPerSecond?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Token bucket holding at most one second worth of records. `acquire` waits
 * until the requested number of tokens has been taken.
 */
export class RateLimiter {
  private readonly rate?: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private tokens: number;
  private lastRefill: number;

  constructor(options: RateLimiterOptions = {}) {
    if (options.recordsPerSecond !== undefined && options.recordsPerSecond < 1) {
      throw new RangeError(`recordsPerSecond must be at least 1, got ${options.recordsPerSecond}`);
    }
    this.rate = options.recordsPerSecond;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? delay;
    this.tokens = this.rate ?? 0;
    this.lastRefill = this.now();
  }

  getCurrentLimit(): number {
    return this.rate === undefined ? UNLIMITED_RATE : Math.min(Math.floor(this.rate), UNLIMITED_RATE);
  }

  async acquire(count: number): Promise<void> {
    const rate = this.rate;
    if (rate === undefined) {
      return;
    }

    let needed = count;
    while (needed > 0) {
      this.refill(rate);
      const granted = Math.min(needed, Math.floor(this.tokens));
      this.tokens -= granted;
      needed -= granted;
      if (needed > 0) {
        const deficit = Math.min(needed, rate) - this.tokens;
        await this.sleep(Math.ceil((deficit * 1000) / rate));
      }
    }
  }

  private refill(rate: number): void {
    const now = this.now();
    this.tokens = Math.min(rate, this.tokens + ((now - this.lastRefill) * rate) / 1000);
    this.lastRefill = now;
  }
}

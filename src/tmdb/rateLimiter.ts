import { setTimeout as delay } from 'node:timers/promises';

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleep = async (ms, signal) => {
  if (ms <= 0) {
    signal?.throwIfAborted();
    return;
  }
  await delay(ms, undefined, { signal });
};

export interface RateLimiter {
  /** Resolves once a permit is available. Returns the time waited in ms. */
  acquire(signal?: AbortSignal): Promise<number>;
}

export interface TokenBucketOptions {
  /** Sustained rate, tokens per second */
  ratePerSecond: number;
  /** Maximum burst capacity */
  burst: number;
  now?: () => number;
  sleep?: Sleep;
}

/**
 * Token bucket shared by every upstream catalog call.
 *
 * A caller reserves its token before sleeping (the balance may go negative),
 * so concurrent callers queue behind each other instead of all waking at
 * the same instant and overdrawing the bucket.
 */
export class TokenBucketRateLimiter implements RateLimiter {
  private tokens: number;
  private lastRefill: number;
  private readonly maxTokens: number;
  private readonly refillRate: number;
  private readonly now: () => number;
  private readonly sleep: Sleep;

  constructor(options: TokenBucketOptions) {
    if (options.ratePerSecond <= 0) {
      throw new RangeError('ratePerSecond must be positive');
    }
    this.maxTokens = Math.max(1, options.burst);
    this.refillRate = options.ratePerSecond;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleep;
    this.tokens = this.maxTokens;
    this.lastRefill = this.now();
  }

  private refill(): void {
    const now = this.now();
    const elapsed = (now - this.lastRefill) / 1000;
    this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.refillRate);
    this.lastRefill = now;
  }

  async acquire(signal?: AbortSignal): Promise<number> {
    signal?.throwIfAborted();
    this.refill();
    this.tokens -= 1;

    if (this.tokens >= 0) {
      return 0;
    }

    const waitMs = Math.ceil((-this.tokens / this.refillRate) * 1000);
    try {
      await this.sleep(waitMs, signal);
    } catch (error) {
      // hand the reservation back to the queue
      this.tokens += 1;
      throw error;
    }
    return waitMs;
  }

  /** Current balance, negative while callers are queued. */
  getTokens(): number {
    this.refill();
    return this.tokens;
  }
}

/** Pass-through limiter for tests and offline tooling. */
export const unlimited: RateLimiter = {
  acquire: async () => 0,
};

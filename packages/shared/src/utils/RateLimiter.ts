/**
 * Token-bucket rate limiter.
 *
 * Callers are served strictly in arrival order. The bucket starts full,
 * refills continuously at `requestsPerMinute` and never holds more than
 * `burst` tokens.
 */
import { Clock, SystemClock } from './time/Clock';

export interface RateLimiterConfig {
  requestsPerMinute: number;
  burst: number;
}

const TOKEN_EPSILON = 1e-9;

export const DEFAULT_RATE_LIMITER_CONFIG: RateLimiterConfig = {
  requestsPerMinute: 600,
  burst: 10,
};

export class RateLimiter {
  private readonly capacity: number;
  private readonly refillPerMs: number;
  private readonly clock: Clock;
  private tokens: number;
  private lastRefill: number;
  private tail: Promise<void> = Promise.resolve();
  private waiting = 0;

  constructor(config: Partial<RateLimiterConfig> = {}, clock: Clock = new SystemClock()) {
    const merged = { ...DEFAULT_RATE_LIMITER_CONFIG, ...config };
    if (merged.requestsPerMinute <= 0 || merged.burst < 1) {
      throw new Error('RateLimiter requires requestsPerMinute > 0 and burst >= 1');
    }
    this.capacity = merged.burst;
    this.refillPerMs = merged.requestsPerMinute / 60_000;
    this.clock = clock;
    this.tokens = this.capacity;
    this.lastRefill = clock.now();
  }

  /**
   * Wait for a token. Resolves in FIFO order.
   */
  acquire(): Promise<void> {
    this.waiting++;
    const next = this.tail.then(() => this.takeToken());
    // eslint-disable-next-line functional/immutable-data
    this.tail = next.catch(() => undefined);
    return next;
  }

  /**
   * Execute a function once a token is available
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    return fn();
  }

  availableTokens(): number {
    this.refill();
    return this.tokens;
  }

  /** Callers currently waiting, including the one being served */
  queueLength(): number {
    return this.waiting;
  }

  private async takeToken(): Promise<void> {
    try {
      this.refill();
      while (this.tokens < 1 - TOKEN_EPSILON) {
        const waitMs = Math.max(1, Math.ceil((1 - this.tokens) / this.refillPerMs));
        await this.clock.sleep(waitMs);
        this.refill();
      }
      this.tokens = Math.max(0, this.tokens - 1);
    } finally {
      this.waiting--;
    }
  }

  private refill(): void {
    const now = this.clock.now();
    const elapsed = now - this.lastRefill;
    if (elapsed > 0) {
      this.tokens = Math.min(this.capacity, this.tokens + elapsed * this.refillPerMs);
      this.lastRefill = now;
    }
  }
}

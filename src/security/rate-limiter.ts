import { logger } from '../observability/logger';

interface RateBucket {
  count: number;
  resetAt: number;
}

export interface RateLimitDecision {
  allowed: boolean;
  remaining: number;
  retryAfterMs: number;
}

/**
 * In-memory fixed-window rate limiter, one bucket per key.
 * Limits are per process; several instances each allow `maxRequests` per window.
 */
export class RateLimiter {
  private buckets: Map<string, RateBucket> = new Map();
  private readonly windowMs: number;
  private readonly cleanupTimer: NodeJS.Timeout;
  private log = logger.child({ component: 'rate-limiter' });

  constructor(
    readonly maxRequests: number,
    windowSeconds: number,
    private readonly now: () => number = Date.now,
  ) {
    this.windowMs = windowSeconds * 1000;
    // Drop expired buckets every 5 minutes
    this.cleanupTimer = setInterval(() => this.cleanup(), 5 * 60 * 1000);
    this.cleanupTimer.unref();
  }

  /**
   * Counts a request against `key`. Not allowed once the window's count passes `maxRequests`.
   */
  check(key: string): RateLimitDecision {
    const now = this.now();
    let bucket = this.buckets.get(key);

    if (!bucket || now >= bucket.resetAt) {
      bucket = { count: 0, resetAt: now + this.windowMs };
      this.buckets.set(key, bucket);
    }

    bucket.count++;

    if (bucket.count > this.maxRequests) {
      const retryAfterMs = bucket.resetAt - now;
      this.log.warn({ key, count: bucket.count, limit: this.maxRequests }, 'Rate limit exceeded');
      return { allowed: false, remaining: 0, retryAfterMs };
    }

    return {
      allowed: true,
      remaining: this.maxRequests - bucket.count,
      retryAfterMs: 0,
    };
  }

  get size(): number {
    return this.buckets.size;
  }

  stop(): void {
    clearInterval(this.cleanupTimer);
  }

  /** Visible for tests; normally run by the interval. */
  cleanup(): void {
    const now = this.now();
    for (const [key, bucket] of this.buckets) {
      if (now >= bucket.resetAt) {
        this.buckets.delete(key);
      }
    }
  }
}

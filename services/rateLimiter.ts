import { componentLogger } from "../config/logger.js";
import { InvalidRequestError, RateLimitExceededError } from "../shared/errors.js";

const log = componentLogger("rate-limiter");

const WINDOW_MS = 60_000;

interface Bucket {
  tokens: number;
  updatedAt: number;
}

/**
 * Token bucket per key. Each bucket holds up to `perMinute` tokens and
 * refills continuously at `perMinute` tokens per minute. Buckets that have
 * refilled completely are dropped at most once per window.
 */
export class RateLimiter {
  private readonly buckets = new Map<string, Bucket>();
  private readonly refillPerMs: number;
  private lastSweepAt: number;

  constructor(
    private readonly perMinute: number,
    private readonly now: () => number = Date.now,
  ) {
    if (!Number.isInteger(perMinute) || perMinute < 1) {
      throw new InvalidRequestError(`Rate limit must be a positive integer, got ${perMinute}`);
    }
    this.refillPerMs = perMinute / WINDOW_MS;
    this.lastSweepAt = now();
  }

  /** Number of keys currently holding a partially drained bucket. */
  get trackedKeys(): number {
    return this.buckets.size;
  }

  /** Takes one token for `key` or throws RateLimitExceededError with a retry hint. */
  consume(key: string): void {
    this.sweep();
    const bucket = this.refill(key);
    if (bucket.tokens >= 1) {
      bucket.tokens -= 1;
      return;
    }

    const retryAfterMs = Math.ceil(((1 - bucket.tokens) * WINDOW_MS) / this.perMinute);
    log.warn({ key, retryAfterMs }, "Rate limit exceeded");
    throw new RateLimitExceededError(key, retryAfterMs);
  }

  remaining(key: string): number {
    if (!this.buckets.has(key)) return this.perMinute;
    return Math.floor(this.refill(key).tokens);
  }

  reset(key?: string): void {
    if (key === undefined) {
      this.buckets.clear();
    } else {
      this.buckets.delete(key);
    }
  }

  private sweep(): void {
    const now = this.now();
    if (now - this.lastSweepAt < WINDOW_MS) return;
    this.lastSweepAt = now;

    let evicted = 0;
    for (const [key, bucket] of this.buckets) {
      const elapsed = Math.max(0, now - bucket.updatedAt);
      if (bucket.tokens + elapsed * this.refillPerMs >= this.perMinute) {
        this.buckets.delete(key);
        evicted++;
      }
    }
    if (evicted > 0) {
      log.debug({ evicted, remaining: this.trackedKeys }, "Rate limit buckets evicted");
    }
  }

  private refill(key: string): Bucket {
    const now = this.now();
    const bucket = this.buckets.get(key);
    if (!bucket) {
      const fresh = { tokens: this.perMinute, updatedAt: now };
      this.buckets.set(key, fresh);
      return fresh;
    }

    const elapsed = Math.max(0, now - bucket.updatedAt);
    bucket.tokens = Math.min(this.perMinute, bucket.tokens + elapsed * this.refillPerMs);
    bucket.updatedAt = now;
    return bucket;
  }
}

import { max, min } from '@tubular/math';
import type { TimeSource } from './ntp-timestamp';

export interface RateLimiterOptions {
  burst: number; // Bucket capacity
  idleTimeout: number; // Milliseconds without a request before an address is forgotten
  maxClients: number;
  minInterval: number; // Milliseconds to refill one token
  now: TimeSource;
}

export const DEFAULT_RATE_LIMITER_OPTIONS: RateLimiterOptions = {
  burst: 1,
  idleTimeout: 86_400_000, // 24 hours
  maxClients: 10_000,
  minInterval: 10_000,
  now: Date.now
};

interface TokenBucket {
  tokens: number;
  lastRefill: number;
  lastSeen: number;
}

/**
 * Per-address token buckets. The map is kept in order of last use (an entry is deleted and
 * re-inserted whenever it's touched), so the least recently used address is always first. That
 * makes both capacity eviction and idle eviction a matter of trimming from the front.
 */
export class RateLimiter {
  private buckets = new Map<string, TokenBucket>();
  private options: RateLimiterOptions;

  constructor(options: Partial<RateLimiterOptions> = {}) {
    this.options = { ...DEFAULT_RATE_LIMITER_OPTIONS, ...options };

    if (!(this.options.burst >= 1))
      throw new Error('burst must be at least 1');
    else if (!(this.options.minInterval > 0))
      throw new Error('minInterval must be greater than 0');
    else if (!(this.options.maxClients >= 1))
      throw new Error('maxClients must be at least 1');
  }

  get size(): number {
    return this.buckets.size;
  }

  has(address: string): boolean {
    return this.buckets.has(address);
  }

  admit(address: string): boolean {
    const now = this.options.now();

    this.evictIdle(now);

    let bucket = this.buckets.get(address);

    if (bucket) {
      const elapsed = max(now - bucket.lastRefill, 0);

      bucket.tokens = min(this.options.burst, bucket.tokens + elapsed / this.options.minInterval);
      bucket.lastRefill = now;
      this.buckets.delete(address);
    }
    else {
      bucket = { tokens: this.options.burst, lastRefill: now, lastSeen: now };

      for (const oldest of this.buckets.keys()) {
        if (this.buckets.size < this.options.maxClients)
          break;

        this.buckets.delete(oldest);
      }
    }

    bucket.lastSeen = now;
    this.buckets.set(address, bucket);

    if (bucket.tokens >= 1) {
      --bucket.tokens;

      return true;
    }

    return false;
  }

  /** Forget every address idle for longer than the idle timeout. */
  sweep(): number {
    return this.evictIdle(this.options.now());
  }

  clear(): void {
    this.buckets.clear();
  }

  private evictIdle(now: number): number {
    let count = 0;

    for (const [address, bucket] of this.buckets) {
      if (now - bucket.lastSeen <= this.options.idleTimeout)
        break;

      this.buckets.delete(address);
      ++count;
    }

    return count;
  }
}

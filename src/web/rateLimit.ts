/**
 * Token bucket.
 *
 * capacity          – max tokens available at any time
 * refillIntervalMs  – milliseconds to regain one token
 */
export class TokenBucket {
  private tokens: number;
  private lastRefillMs: number;

  constructor(
    private readonly capacity: number,
    private readonly refillIntervalMs: number,
    private readonly now: () => number = Date.now
  ) {
    this.tokens = capacity;
    this.lastRefillMs = now();
  }

  tryAcquire(n = 1): boolean {
    this.refill();
    if (this.tokens >= n) {
      this.tokens -= n;
      return true;
    }
    return false;
  }

  /** Milliseconds until `n` tokens will be available. */
  msUntil(n = 1): number {
    this.refill();
    if (this.tokens >= n) return 0;
    return Math.ceil((n - this.tokens) * this.refillIntervalMs);
  }

  /** True once the bucket has refilled completely (safe to forget). */
  isFull(): boolean {
    this.refill();
    return this.tokens >= this.capacity;
  }

  private refill(): void {
    const now = this.now();
    const elapsed = now - this.lastRefillMs;
    if (elapsed > 0) {
      this.tokens = Math.min(this.capacity, this.tokens + elapsed / this.refillIntervalMs);
      this.lastRefillMs = now;
    }
  }
}

export interface ThrottleDecision {
  allowed: boolean;
  retryAfterMs: number;
}

/** One request per client per window on /lof. */
export class ClientThrottle {
  private buckets = new Map<string, TokenBucket>();

  constructor(
    private readonly windowMs: number,
    private readonly now: () => number = Date.now
  ) {}

  check(clientId: string): ThrottleDecision {
    let bucket = this.buckets.get(clientId);
    if (!bucket) {
      bucket = new TokenBucket(1, this.windowMs, this.now);
      this.buckets.set(clientId, bucket);
    }
    if (bucket.tryAcquire()) return { allowed: true, retryAfterMs: 0 };
    return { allowed: false, retryAfterMs: bucket.msUntil() };
  }

  /** Drop clients whose bucket is full again. */
  prune(): number {
    let removed = 0;
    for (const [id, bucket] of this.buckets) {
      if (bucket.isFull()) {
        this.buckets.delete(id);
        removed++;
      }
    }
    return removed;
  }

  size(): number {
    return this.buckets.size;
  }
}

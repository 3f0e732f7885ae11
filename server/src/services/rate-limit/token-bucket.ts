/**
 * Token Bucket
 * Lazily refilled quota for one client. No timers: tokens are topped up
 * from elapsed wall time whenever the bucket is looked at.
 */

export interface TokenBucketSnapshot {
  capacity: number;
  tokens: number;
  refillRate: number;
  lastRefill: number;
}

export class TokenBucket {
  private constructor(
    private _capacity: number,
    private _tokens: number,
    /** Tokens added per second */
    readonly refillRate: number,
    private _lastRefill: number
  ) {}

  static full(capacity: number, refillRate: number, now: number): TokenBucket {
    if (!(capacity > 0)) throw new RangeError(`capacity must be positive, got ${capacity}`);
    if (!(refillRate > 0)) throw new RangeError(`refillRate must be positive, got ${refillRate}`);
    return new TokenBucket(capacity, capacity, refillRate, now);
  }

  get capacity(): number {
    return this._capacity;
  }

  get tokens(): number {
    return this._tokens;
  }

  get lastRefill(): number {
    return this._lastRefill;
  }

  get utilization(): number {
    return (this._capacity - this._tokens) / this._capacity;
  }

  /**
   * Token count a refill at now would produce, without touching the bucket
   */
  projectedTokens(now: number): number {
    const elapsedSeconds = Math.max(0, now - this._lastRefill) / 1000;
    return Math.min(this._capacity, this._tokens + elapsedSeconds * this.refillRate);
  }

  refill(now: number): void {
    this._tokens = this.projectedTokens(now);
    // A clock that steps backwards must not rewind the refill mark
    this._lastRefill = Math.max(this._lastRefill, now);
  }

  /**
   * Refill, then take cost tokens if available. Tokens are untouched on denial.
   */
  tryConsume(cost: number, now: number): boolean {
    if (cost < 0) throw new RangeError(`cost must not be negative, got ${cost}`);
    this.refill(now);
    if (this._tokens >= cost) {
      this._tokens -= cost;
      return true;
    }
    return false;
  }

  /**
   * Seconds until one whole token is available (0 if one already is)
   */
  timeUntilNextToken(now: number): number {
    this.refill(now);
    return Math.max(0, (1 - this._tokens) / this.refillRate);
  }

  /**
   * Change capacity in place.
   * Growth credits the added headroom; shrinking clamps tokens to the new capacity.
   */
  resize(newCapacity: number): void {
    if (!(newCapacity > 0)) throw new RangeError(`capacity must be positive, got ${newCapacity}`);
    const previous = this._capacity;
    this._capacity = newCapacity;
    if (newCapacity > previous) {
      this._tokens = Math.min(newCapacity, this._tokens + (newCapacity - previous));
    } else {
      this._tokens = Math.min(newCapacity, this._tokens);
    }
    this._tokens = Math.max(0, this._tokens);
  }

  reset(now: number): void {
    this._tokens = this._capacity;
    this._lastRefill = now;
  }

  snapshot(): TokenBucketSnapshot {
    return {
      capacity: this._capacity,
      tokens: this._tokens,
      refillRate: this.refillRate,
      lastRefill: this._lastRefill,
    };
  }
}

/**
 * Rate Limiter
 * Token bucket per client identity (remote address or API key).
 *
 * Strategy:
 * - Buckets are created full on first contact and refilled lazily on every check
 * - One mutex serializes all access to the client map
 * - A background sweep drops buckets that sat (nearly) full for two sweep intervals
 */

import { logger as defaultLogger, type Logger } from '../../lib/logger/structured-logger.js';
import { Mutex } from '../../lib/concurrency/mutex.js';
import { PeriodicTask } from '../../lib/concurrency/periodic-task.js';
import { systemClock, type Clock } from '../../lib/reliability/timeout-guard.js';
import { TokenBucket } from './token-bucket.js';
import type {
  AdmissionLimiter,
  ClientRateStats,
  RateLimitDecision,
  RateLimiterStats
} from './rate-limit.types.js';

export interface RateLimiterOptions {
  requestsPerWindow: number;
  windowSeconds: number;
  clock?: Clock;
  logger?: Logger;
}

/** A bucket at or above this share of capacity counts as idle */
const IDLE_FULLNESS = 0.9;
const MIN_CLEANUP_INTERVAL_SECONDS = 60;

export class RateLimiter implements AdmissionLimiter {
  readonly requestsPerWindow: number;
  readonly windowSeconds: number;
  readonly refillRate: number;
  readonly cleanupIntervalSeconds: number;

  private readonly buckets = new Map<string, TokenBucket>();
  private readonly mutex = new Mutex();
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly sweeper: PeriodicTask;

  constructor(options: RateLimiterOptions) {
    const { requestsPerWindow, windowSeconds } = options;
    if (!(requestsPerWindow > 0)) throw new RangeError('requestsPerWindow must be positive');
    if (!(windowSeconds > 0)) throw new RangeError('windowSeconds must be positive');

    this.requestsPerWindow = requestsPerWindow;
    this.windowSeconds = windowSeconds;
    this.refillRate = requestsPerWindow / windowSeconds;
    this.cleanupIntervalSeconds = Math.max(MIN_CLEANUP_INTERVAL_SECONDS, windowSeconds);
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? defaultLogger;

    this.sweeper = new PeriodicTask(
      'rate-limiter-sweep',
      this.cleanupIntervalSeconds * 1000,
      async () => {
        await this.sweepIdle();
      },
      this.logger
    );

    this.logger.info(
      {
        requestsPerWindow,
        windowSeconds,
        refillRate: this.refillRate,
        event: 'rate_limiter_initialized'
      },
      '[RateLimit] Limiter initialized'
    );
  }

  start(): void {
    this.sweeper.start();
  }

  async stop(): Promise<void> {
    await this.sweeper.stop();
  }

  get clientCount(): number {
    return this.buckets.size;
  }

  async allow(clientId: string, cost = 1): Promise<boolean> {
    const decision = await this.check(clientId, cost);
    return decision.allowed;
  }

  async check(clientId: string, cost = 1): Promise<RateLimitDecision> {
    return this.mutex.runExclusive(() => this.consume(clientId, cost, undefined));
  }

  /**
   * Resize the client's bucket, then consume, inside one critical section
   */
  async allowWithCapacity(clientId: string, capacity: number, cost = 1): Promise<RateLimitDecision> {
    return this.mutex.runExclusive(() => this.consume(clientId, cost, capacity));
  }

  /**
   * Current capacity for a client, base capacity when it has no bucket yet
   */
  async capacityOf(clientId: string): Promise<number> {
    return this.mutex.runExclusive(
      () => this.buckets.get(clientId)?.capacity ?? this.requestsPerWindow
    );
  }

  async clientIds(): Promise<string[]> {
    return this.mutex.runExclusive(() => Array.from(this.buckets.keys()));
  }

  async remainingTokens(clientId: string): Promise<number> {
    return this.mutex.runExclusive(() => {
      const bucket = this.buckets.get(clientId);
      if (!bucket) return this.requestsPerWindow;
      bucket.refill(this.clock());
      return bucket.tokens;
    });
  }

  async timeUntilNextToken(clientId: string): Promise<number> {
    return this.mutex.runExclusive(() => {
      const bucket = this.buckets.get(clientId);
      return bucket ? bucket.timeUntilNextToken(this.clock()) : 0;
    });
  }

  /**
   * Force a client's bucket back to full. False when the client is unknown.
   */
  async reset(clientId: string): Promise<boolean> {
    return this.mutex.runExclusive(() => {
      const bucket = this.buckets.get(clientId);
      if (!bucket) return false;
      bucket.reset(this.clock());
      this.logger.info({ clientId, event: 'rate_limit_reset' }, '[RateLimit] Client limit reset');
      return true;
    });
  }

  async clientStats(clientId: string): Promise<ClientRateStats | null> {
    return this.mutex.runExclusive(() => {
      const bucket = this.buckets.get(clientId);
      if (!bucket) return null;
      bucket.refill(this.clock());
      return toClientStats(bucket);
    });
  }

  async stats(): Promise<RateLimiterStats> {
    return this.mutex.runExclusive(() => {
      const now = this.clock();
      const clients: Record<string, ClientRateStats> = {};
      for (const [clientId, bucket] of this.buckets) {
        bucket.refill(now);
        clients[clientId] = toClientStats(bucket);
      }
      return {
        totalClients: this.buckets.size,
        requestsPerWindow: this.requestsPerWindow,
        windowSeconds: this.windowSeconds,
        refillRate: this.refillRate,
        clients
      };
    });
  }

  /**
   * Drop buckets that are at least 90% full and untouched for two sweep intervals.
   * Returns the removed client ids.
   */
  async sweepIdle(): Promise<string[]> {
    return this.mutex.runExclusive(() => {
      const now = this.clock();
      const threshold = now - this.cleanupIntervalSeconds * 2 * 1000;
      const removed: string[] = [];

      for (const [clientId, bucket] of this.buckets) {
        // lastRefill marks the last touch; fullness includes what a refill would add
        const idle = bucket.lastRefill < threshold;
        if (idle && bucket.projectedTokens(now) >= bucket.capacity * IDLE_FULLNESS) {
          removed.push(clientId);
        }
      }
      for (const clientId of removed) {
        this.buckets.delete(clientId);
      }

      if (removed.length > 0) {
        this.logger.info(
          {
            removed: removed.length,
            remainingClients: this.buckets.size,
            event: 'rate_limit_buckets_swept'
          },
          '[RateLimit] Cleaned up inactive buckets'
        );
      }
      return removed;
    });
  }

  private consume(clientId: string, cost: number, capacity: number | undefined): RateLimitDecision {
    const now = this.clock();
    let bucket = this.buckets.get(clientId);
    if (!bucket) {
      bucket = TokenBucket.full(this.requestsPerWindow, this.refillRate, now);
      this.buckets.set(clientId, bucket);
      this.logger.debug(
        { clientId, capacity: this.requestsPerWindow, event: 'rate_limit_bucket_created' },
        '[RateLimit] Created token bucket'
      );
    }

    bucket.refill(now);
    if (capacity !== undefined && capacity !== bucket.capacity) {
      bucket.resize(capacity);
    }

    const allowed = bucket.tryConsume(cost, now);
    const retryAfterSeconds = allowed ? 0 : Math.max(0, (cost - bucket.tokens) / bucket.refillRate);

    this.logger.debug(
      {
        clientId,
        cost,
        allowed,
        tokens: bucket.tokens,
        event: allowed ? 'rate_limit_allowed' : 'rate_limit_denied'
      },
      allowed ? '[RateLimit] Request allowed' : '[RateLimit] Request denied - insufficient tokens'
    );

    return {
      allowed,
      remaining: Math.floor(bucket.tokens),
      limit: bucket.capacity,
      retryAfterSeconds
    };
  }
}

function toClientStats(bucket: TokenBucket): ClientRateStats {
  return {
    capacity: bucket.capacity,
    currentTokens: bucket.tokens,
    refillRate: bucket.refillRate,
    utilization: bucket.utilization,
    lastRefill: new Date(bucket.lastRefill).toISOString()
  };
}

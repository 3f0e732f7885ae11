/**
 * Adaptive Rate Limiter
 * Wraps a RateLimiter and scales each client's bucket capacity by observed behavior.
 *
 * multiplier = clamp(successRate * min(2, avgInterval / (window / capacity)), min, max)
 *
 * Steady, successful clients earn headroom; bursty or failing ones are tightened.
 * Effective capacity always stays within [min, max] x base capacity.
 */

import { logger as defaultLogger, type Logger } from '../../lib/logger/structured-logger.js';
import { PeriodicTask } from '../../lib/concurrency/periodic-task.js';
import { systemClock, type Clock } from '../../lib/reliability/timeout-guard.js';
import type { RateLimiter } from './rate-limiter.js';
import type {
  AdmissionLimiter,
  ClientRateStats,
  RateLimitDecision,
  RateLimiterStats
} from './rate-limit.types.js';

export interface AdaptiveRateLimiterOptions {
  minMultiplier?: number;
  maxMultiplier?: number;
  clock?: Clock;
  logger?: Logger;
}

interface ClientBehavior {
  successRate: number;
  /** Seconds, EWMA of the gap between requests */
  avgInterval: number;
  lastRequest: number | null;
}

export interface ClientBehaviorStats {
  successRate: number;
  avgIntervalSeconds: number;
  multiplier: number;
}

export interface AdaptiveRateLimiterStats extends RateLimiterStats {
  adaptive: {
    minMultiplier: number;
    maxMultiplier: number;
    clients: Record<string, ClientBehaviorStats>;
  };
}

/** Weight given to the newest sample in both moving averages */
const EWMA_WEIGHT = 0.1;
const MAX_INTERVAL_FACTOR = 2.0;

export class AdaptiveRateLimiter implements AdmissionLimiter {
  readonly minMultiplier: number;
  readonly maxMultiplier: number;

  // Touched only in synchronous sections, so no lock of its own
  private readonly behaviors = new Map<string, ClientBehavior>();
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly sweeper: PeriodicTask;

  constructor(
    private readonly base: RateLimiter,
    options: AdaptiveRateLimiterOptions = {}
  ) {
    this.minMultiplier = options.minMultiplier ?? 0.5;
    this.maxMultiplier = options.maxMultiplier ?? 2.0;
    if (!(this.minMultiplier > 0) || this.minMultiplier > this.maxMultiplier) {
      throw new RangeError(
        `Invalid multiplier bounds: min=${this.minMultiplier}, max=${this.maxMultiplier}`
      );
    }
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? defaultLogger;

    this.sweeper = new PeriodicTask(
      'adaptive-rate-limiter-sweep',
      base.cleanupIntervalSeconds * 1000,
      async () => {
        await this.sweepIdle();
      },
      this.logger
    );
  }

  get baseCapacity(): number {
    return this.base.requestsPerWindow;
  }

  start(): void {
    this.sweeper.start();
  }

  async stop(): Promise<void> {
    await this.sweeper.stop();
  }

  async allow(clientId: string, cost = 1): Promise<boolean> {
    const decision = await this.check(clientId, cost);
    return decision.allowed;
  }

  async check(clientId: string, cost = 1): Promise<RateLimitDecision> {
    const behavior = this.observeRequest(clientId);
    const multiplier = this.multiplierFor(behavior);
    const capacity = this.base.requestsPerWindow * multiplier;

    const decision = await this.base.allowWithCapacity(clientId, capacity, cost);

    this.logger.debug(
      {
        clientId,
        multiplier,
        capacity,
        allowed: decision.allowed,
        event: 'adaptive_rate_limit_applied'
      },
      '[RateLimit] Adaptive limit applied'
    );
    return decision;
  }

  /**
   * Feed back the outcome of an admitted request
   */
  recordResult(clientId: string, success: boolean): void {
    const behavior = this.behaviorFor(clientId);
    const sample = success ? 1 : 0;
    behavior.successRate = behavior.successRate * (1 - EWMA_WEIGHT) + sample * EWMA_WEIGHT;
  }

  /**
   * The multiplier the next request from this client would get, ignoring its own timing
   */
  currentMultiplier(clientId: string): number {
    const behavior = this.behaviors.get(clientId);
    return behavior ? this.multiplierFor(behavior) : this.clamp(1);
  }

  async effectiveCapacity(clientId: string): Promise<number> {
    return this.base.capacityOf(clientId);
  }

  async remainingTokens(clientId: string): Promise<number> {
    return this.base.remainingTokens(clientId);
  }

  async timeUntilNextToken(clientId: string): Promise<number> {
    return this.base.timeUntilNextToken(clientId);
  }

  /**
   * Refill the bucket and forget the client's behavior history
   */
  async reset(clientId: string): Promise<boolean> {
    this.behaviors.delete(clientId);
    return this.base.reset(clientId);
  }

  async clientStats(clientId: string): Promise<ClientRateStats | null> {
    return this.base.clientStats(clientId);
  }

  async stats(): Promise<AdaptiveRateLimiterStats> {
    const baseStats = await this.base.stats();
    const clients: Record<string, ClientBehaviorStats> = {};
    for (const [clientId, behavior] of this.behaviors) {
      clients[clientId] = {
        successRate: behavior.successRate,
        avgIntervalSeconds: behavior.avgInterval,
        multiplier: this.multiplierFor(behavior)
      };
    }
    return {
      ...baseStats,
      adaptive: {
        minMultiplier: this.minMultiplier,
        maxMultiplier: this.maxMultiplier,
        clients
      }
    };
  }

  /**
   * Sweep idle buckets through the base limiter and drop behavior for clients without one
   */
  async sweepIdle(): Promise<string[]> {
    const removed = await this.base.sweepIdle();
    const live = new Set(await this.base.clientIds());
    for (const clientId of Array.from(this.behaviors.keys())) {
      if (!live.has(clientId)) {
        this.behaviors.delete(clientId);
      }
    }
    return removed;
  }

  private observeRequest(clientId: string): ClientBehavior {
    const now = this.clock();
    const behavior = this.behaviorFor(clientId);
    if (behavior.lastRequest !== null) {
      const intervalSeconds = Math.max(0, now - behavior.lastRequest) / 1000;
      behavior.avgInterval = behavior.avgInterval * (1 - EWMA_WEIGHT) + intervalSeconds * EWMA_WEIGHT;
    }
    behavior.lastRequest = now;
    return behavior;
  }

  private behaviorFor(clientId: string): ClientBehavior {
    let behavior = this.behaviors.get(clientId);
    if (!behavior) {
      behavior = { successRate: 1.0, avgInterval: 1.0, lastRequest: null };
      this.behaviors.set(clientId, behavior);
    }
    return behavior;
  }

  private multiplierFor(behavior: ClientBehavior): number {
    const expectedInterval = this.base.windowSeconds / this.base.requestsPerWindow;
    const intervalFactor = Math.min(MAX_INTERVAL_FACTOR, behavior.avgInterval / expectedInterval);
    return this.clamp(behavior.successRate * intervalFactor);
  }

  private clamp(multiplier: number): number {
    return Math.max(this.minMultiplier, Math.min(this.maxMultiplier, multiplier));
  }
}

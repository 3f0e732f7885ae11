/**
 * Runtime
 * Builds the registry, limiter and dispatcher from config and owns their lifecycle.
 */

import type { AppConfig } from './config/env.js';
import { logger as defaultLogger, type Logger } from './lib/logger/structured-logger.js';
import type { Clock } from './lib/reliability/timeout-guard.js';
import { SessionRegistry } from './services/session/session-registry.js';
import { RateLimiter } from './services/rate-limit/rate-limiter.js';
import { AdaptiveRateLimiter } from './services/rate-limit/adaptive-rate-limiter.js';
import type { AdmissionLimiter } from './services/rate-limit/rate-limit.types.js';
import { ConnectionDispatcher } from './infra/sse/connection-dispatcher.js';

export interface Runtime {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly registry: SessionRegistry;
  readonly limiter: AdmissionLimiter;
  readonly dispatcher: ConnectionDispatcher;
  start(): void;
  stop(): Promise<void>;
}

export interface RuntimeOverrides {
  clock?: Clock;
  logger?: Logger;
}

export function createRuntime(config: AppConfig, overrides: RuntimeOverrides = {}): Runtime {
  const logger = overrides.logger ?? defaultLogger;
  const { clock } = overrides;

  const registry = new SessionRegistry({
    maxSessions: config.session.maxSessions,
    sessionTimeoutSeconds: config.session.sessionTimeoutSeconds,
    cleanupIntervalSeconds: config.session.cleanupIntervalSeconds,
    clock,
    logger: logger.child({ component: 'session-registry' })
  });

  const baseLimiter = new RateLimiter({
    requestsPerWindow: config.rateLimit.requests,
    windowSeconds: config.rateLimit.windowSeconds,
    clock,
    logger: logger.child({ component: 'rate-limiter' })
  });
  // The adaptive limiter runs its own sweep over the base limiter
  const limiter: AdmissionLimiter = config.rateLimit.adaptive
    ? new AdaptiveRateLimiter(baseLimiter, {
        minMultiplier: config.rateLimit.minMultiplier,
        maxMultiplier: config.rateLimit.maxMultiplier,
        clock,
        logger: logger.child({ component: 'adaptive-rate-limiter' })
      })
    : baseLimiter;

  const dispatcher = new ConnectionDispatcher({
    registry,
    heartbeatIntervalSeconds: config.sse.heartbeatIntervalSeconds,
    retryIntervalMs: config.sse.retryIntervalMs,
    pollIntervalMs: config.sse.pollIntervalMs,
    clock,
    logger: logger.child({ component: 'sse-dispatcher' })
  });

  let started = false;

  return {
    config,
    logger,
    registry,
    limiter,
    dispatcher,

    start(): void {
      if (started) return;
      started = true;
      registry.start();
      limiter.start();
      logger.info(
        { adaptiveRateLimit: config.rateLimit.adaptive, event: 'runtime_started' },
        '[Runtime] Background tasks started'
      );
    },

    async stop(): Promise<void> {
      await dispatcher.shutdown();
      await registry.shutdown();
      await limiter.stop();
      started = false;
      logger.info({ event: 'runtime_stopped' }, '[Runtime] Stopped');
    }
  };
}

/**
 * Rate Limiting Middleware
 * Admits control-channel requests through an AdmissionLimiter.
 *
 * Client identity: a configured API key when x-api-key carries one,
 * otherwise the remote address as resolved under Express 'trust proxy'.
 * Denials never reach the route handler.
 */

import { createHash } from 'node:crypto';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { AdmissionLimiter } from '../services/rate-limit/rate-limit.types.js';

/**
 * Remote address. X-Forwarded-For counts only for proxies the app trusts.
 */
export function getClientIp(req: Request): string {
  return req.ip ?? req.socket.remoteAddress ?? 'unknown';
}

/**
 * Stable limiter key. Keys are hashed so raw keys never reach logs or admin output.
 * An unrecognised key is ignored, so rotating it does not mint fresh buckets.
 */
export function getClientId(req: Request, apiKeys: ReadonlySet<string>): string {
  const apiKey = req.get('x-api-key');
  if (apiKey && apiKeys.has(apiKey)) {
    const digest = createHash('sha256').update(apiKey).digest('hex').slice(0, 16);
    return `key:${digest}`;
  }
  return `ip:${getClientIp(req)}`;
}

export interface RateLimitMiddlewareOptions {
  apiKeys?: ReadonlySet<string>;
  cost?: number;
}

export function createRateLimitMiddleware(
  limiter: AdmissionLimiter,
  { apiKeys = new Set<string>(), cost = 1 }: RateLimitMiddlewareOptions = {}
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const clientId = getClientId(req, apiKeys);

    limiter
      .check(clientId, cost)
      .then(decision => {
        res.setHeader('X-RateLimit-Limit', Math.floor(decision.limit).toString());
        res.setHeader('X-RateLimit-Remaining', decision.remaining.toString());

        if (!decision.allowed) {
          const retryAfter = Math.max(1, Math.ceil(decision.retryAfterSeconds));

          req.log.warn(
            {
              clientId,
              path: req.path,
              limit: decision.limit,
              retryAfter,
              event: 'rate_limit_blocked'
            },
            '[RateLimit] Request blocked - limit exceeded'
          );

          res.setHeader('Retry-After', retryAfter.toString());
          res.status(429).json({
            error: 'Too many requests',
            code: 'RATE_LIMIT_EXCEEDED',
            traceId: req.traceId,
            retryAfter
          });
          return;
        }

        const recordResult = limiter.recordResult?.bind(limiter);
        if (recordResult) {
          res.on('finish', () => recordResult(clientId, res.statusCode < 400));
        }
        next();
      })
      .catch(next);
  };
}

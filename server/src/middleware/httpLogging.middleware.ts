/**
 * HTTP Logging Middleware
 * One log line per request, one per response (status, duration).
 * Level follows the status code. All lines carry traceId via req.log.
 */

import type { Request, Response, NextFunction } from 'express';

export function httpLoggingMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const startTime = Date.now();

  req.log.info({
    msg: 'HTTP request',
    method: req.method,
    path: req.path,
    query: req.query,
  });

  // For SSE this fires when the stream ends
  res.on('close', () => {
    const duration = Date.now() - startTime;
    const level = res.statusCode >= 500 ? 'error'
                : res.statusCode >= 400 ? 'warn'
                : 'info';

    req.log[level]({
      msg: 'HTTP response',
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      durationMs: duration,
      completed: res.writableFinished,
    });
  });

  next();
}

/**
 * Admin Authentication Middleware
 * Bearer-token guard for the admin surface.
 * With no token configured the guard is open (local/dev use).
 */

import { createHash, timingSafeEqual } from 'node:crypto';
import type { Request, Response, NextFunction, RequestHandler } from 'express';

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

export function createAdminAuthMiddleware(adminToken: string | undefined): RequestHandler {
  const expected = adminToken ? digest(adminToken) : null;

  return (req: Request, res: Response, next: NextFunction): void => {
    if (!expected) {
      next();
      return;
    }

    const authHeader = req.headers.authorization;
    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      req.log.warn(
        { path: req.path, method: req.method, event: 'admin_auth_missing' },
        '[Auth] Missing or invalid Authorization header'
      );
      res.status(401).json({
        error: 'Unauthorized',
        code: 'MISSING_AUTH',
        traceId: req.traceId
      });
      return;
    }

    // timingSafeEqual needs equal lengths, digests always are
    const presented = digest(authHeader.substring(7));
    if (!timingSafeEqual(presented, expected)) {
      req.log.warn(
        { path: req.path, method: req.method, event: 'admin_auth_rejected' },
        '[Auth] Admin token rejected'
      );
      res.status(401).json({
        error: 'Unauthorized',
        code: 'INVALID_TOKEN',
        traceId: req.traceId
      });
      return;
    }

    next();
  };
}

/**
 * Admin Router
 * Introspection and operator controls, guarded by ADMIN_TOKEN when set.
 *
 * - GET    /admin/sessions
 * - GET    /admin/sessions/:sessionId
 * - DELETE /admin/sessions/:sessionId
 * - GET    /admin/stats
 * - POST   /admin/broadcast               { message: string, context?: object }
 * - GET    /admin/rate-limit
 * - GET    /admin/rate-limit/:clientId
 * - POST   /admin/rate-limit/:clientId/reset
 */

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import type { SessionRegistry } from '../../services/session/session-registry.js';
import type { AdmissionLimiter } from '../../services/rate-limit/rate-limit.types.js';
import type { ConnectionDispatcher } from '../../infra/sse/connection-dispatcher.js';
import { createAdminAuthMiddleware } from '../../middleware/auth.middleware.js';
import { AppError, createValidationError } from '../../middleware/error.middleware.js';
import { asyncHandler } from '../../middleware/async-handler.js';

const BroadcastBodySchema = z.object({
  message: z.string().min(1),
  context: z.record(z.string(), z.unknown()).optional(),
  excludeSessionId: z.string().min(1).optional()
});

export interface AdminRouterDeps {
  registry: SessionRegistry;
  limiter: AdmissionLimiter;
  dispatcher: ConnectionDispatcher;
  adminToken: string | undefined;
}

export function createAdminRouter({ registry, limiter, dispatcher, adminToken }: AdminRouterDeps): Router {
  const router = Router();
  router.use(createAdminAuthMiddleware(adminToken));

  router.get(
    '/sessions',
    asyncHandler(async (_req: Request, res: Response) => {
      const sessions = await registry.list();
      res.json({ total: sessions.length, sessions });
    })
  );

  router.get(
    '/sessions/:sessionId',
    asyncHandler(async (req: Request, res: Response) => {
      const summary = await registry.describe(req.params.sessionId ?? '');
      if (!summary) {
        throw new AppError('Session not found', 404, 'SESSION_NOT_FOUND', undefined, true);
      }
      res.json(summary);
    })
  );

  router.delete(
    '/sessions/:sessionId',
    asyncHandler(async (req: Request, res: Response) => {
      const sessionId = req.params.sessionId ?? '';
      if (!(await registry.remove(sessionId))) {
        throw new AppError('Session not found', 404, 'SESSION_NOT_FOUND', undefined, true);
      }
      req.log.info({ sessionId, event: 'admin_session_removed' }, '[Admin] Session removed');
      res.json({ removed: true, sessionId });
    })
  );

  router.get(
    '/stats',
    asyncHandler(async (_req: Request, res: Response) => {
      const [sessions, rateLimit] = await Promise.all([registry.stats(), limiter.stats()]);
      res.json({
        sessions,
        rateLimit,
        connections: { active: dispatcher.activeConnections }
      });
    })
  );

  router.post(
    '/broadcast',
    asyncHandler(async (req: Request, res: Response) => {
      const parsed = BroadcastBodySchema.safeParse(req.body);
      if (!parsed.success) {
        throw createValidationError('Body must be { message: string, context?: object }', parsed.error.flatten().fieldErrors);
      }
      const { message, context, excludeSessionId } = parsed.data;

      const recipients = await registry.broadcast(
        {
          type: 'broadcast',
          message,
          context: context ?? {},
          timestamp: new Date().toISOString()
        },
        excludeSessionId
      );

      req.log.info({ recipients, event: 'admin_broadcast' }, '[Admin] Broadcast sent');
      res.json({ recipients });
    })
  );

  router.get(
    '/rate-limit',
    asyncHandler(async (_req: Request, res: Response) => {
      res.json(await limiter.stats());
    })
  );

  router.get(
    '/rate-limit/:clientId',
    asyncHandler(async (req: Request, res: Response) => {
      const clientId = req.params.clientId ?? '';
      const stats = await limiter.clientStats(clientId);
      if (!stats) {
        throw new AppError('Client not found', 404, 'CLIENT_NOT_FOUND', undefined, true);
      }
      res.json({
        clientId,
        ...stats,
        timeUntilNextTokenSeconds: await limiter.timeUntilNextToken(clientId)
      });
    })
  );

  router.post(
    '/rate-limit/:clientId/reset',
    asyncHandler(async (req: Request, res: Response) => {
      const clientId = req.params.clientId ?? '';
      if (!(await limiter.reset(clientId))) {
        throw new AppError('Client not found', 404, 'CLIENT_NOT_FOUND', undefined, true);
      }
      req.log.info({ clientId, event: 'admin_rate_limit_reset' }, '[Admin] Rate limit reset');
      res.json({ reset: true, clientId });
    })
  );

  return router;
}

/**
 * SSE Router
 *
 * Endpoint:
 * - GET /sse?user_id=&session_id=
 *
 * SSE Events:
 * - connected: { sessionId, userId }, sent once when streaming starts
 * - message: one queued payload, with a per-connection id
 * - heartbeat: { type: 'heartbeat', timestamp } on idle connections
 *
 * The stream ends when the client disconnects, the session is removed
 * (admin or DELETE /message/:sessionId) or the server shuts down.
 *
 * Errors (before any event): 409 SESSION_IN_USE when the session already
 * streams, 403 SESSION_FORBIDDEN when it belongs to another user.
 */

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { SessionRejectedError, type ConnectionDispatcher } from '../../infra/sse/connection-dispatcher.js';
import { SseWriter } from '../../infra/sse/sse-writer.js';
import { getClientIp } from '../../middleware/rate-limit.middleware.js';
import { AppError, createValidationError } from '../../middleware/error.middleware.js';
import { asyncHandler } from '../../middleware/async-handler.js';

export const DEFAULT_USER_ID = 'anonymous';

const SseQuerySchema = z.object({
  user_id: z.string().min(1).max(256).default(DEFAULT_USER_ID),
  session_id: z.string().min(1).max(128).optional()
});

function toHttpError(err: SessionRejectedError): AppError {
  return err.rejection === 'session_in_use'
    ? new AppError(err.message, 409, 'SESSION_IN_USE', undefined, true)
    : new AppError(err.message, 403, 'SESSION_FORBIDDEN', undefined, true);
}

export function createSseRouter(dispatcher: ConnectionDispatcher): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const parsed = SseQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        throw createValidationError('Invalid query parameters', parsed.error.flatten().fieldErrors);
      }

      const peer = new AbortController();
      res.on('close', () => peer.abort());

      const outcome = await dispatcher
        .serve({
          transport: new SseWriter(res),
          userId: parsed.data.user_id,
          sessionId: parsed.data.session_id,
          clientIp: getClientIp(req),
          signal: peer.signal
        })
        .catch((err: unknown) => {
          throw err instanceof SessionRejectedError ? toHttpError(err) : err;
        });

      req.log.info(
        {
          sessionId: outcome.sessionId,
          reason: outcome.reason,
          eventsSent: outcome.eventsSent,
          event: 'sse_request_finished'
        },
        '[SSE] Stream finished'
      );
    })
  );

  return router;
}

/**
 * Message Router
 * Control channel: clients post payloads for their own session's stream.
 *
 * - POST   /message/:sessionId  enqueue { message } (rate limited, 202)
 * - DELETE /message/:sessionId  client-initiated disconnect
 */

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import type { SessionRegistry } from '../../services/session/session-registry.js';
import type { AdmissionLimiter } from '../../services/rate-limit/rate-limit.types.js';
import { createRateLimitMiddleware } from '../../middleware/rate-limit.middleware.js';
import { AppError, createValidationError } from '../../middleware/error.middleware.js';
import { asyncHandler } from '../../middleware/async-handler.js';

const MessageBodySchema = z.object({
  message: z.record(z.string(), z.unknown())
});

/** A payload whose method is this marks the session's handshake as done */
export const INITIALIZE_METHOD = 'initialize';

function sessionNotFound(sessionId: string): AppError {
  return new AppError(`Session not found: ${sessionId}`, 404, 'SESSION_NOT_FOUND', undefined, true);
}

export interface MessageRouterDeps {
  registry: SessionRegistry;
  limiter: AdmissionLimiter;
  apiKeys: ReadonlySet<string>;
}

export function createMessageRouter({ registry, limiter, apiKeys }: MessageRouterDeps): Router {
  const router = Router();

  router.post(
    '/:sessionId',
    createRateLimitMiddleware(limiter, { apiKeys }),
    asyncHandler(async (req: Request, res: Response) => {
      const { sessionId } = req.params;
      if (!sessionId) throw createValidationError('sessionId is required');

      const parsed = MessageBodySchema.safeParse(req.body);
      if (!parsed.success) {
        throw createValidationError('Body must be { message: object }', parsed.error.flatten().fieldErrors);
      }
      const { message } = parsed.data;

      if (!(await registry.touch(sessionId))) {
        throw sessionNotFound(sessionId);
      }
      if (message['method'] === INITIALIZE_METHOD) {
        await registry.markInitialized(sessionId);
      }
      if (!(await registry.sendTo(sessionId, message))) {
        // Removed between the touch and the enqueue
        throw sessionNotFound(sessionId);
      }

      req.log.debug({ sessionId, event: 'message_accepted' }, '[Message] Message queued');
      res.status(202).json({ accepted: true, sessionId });
    })
  );

  router.delete(
    '/:sessionId',
    asyncHandler(async (req: Request, res: Response) => {
      const { sessionId } = req.params;
      if (!sessionId || !(await registry.remove(sessionId))) {
        throw sessionNotFound(sessionId ?? '');
      }
      req.log.info({ sessionId, event: 'session_disconnected_by_client' }, '[Message] Session disconnected');
      res.status(200).json({ disconnected: true, sessionId });
    })
  );

  return router;
}

/**
 * Request Context Middleware
 * Ensures every request has a traceId:
 * - Reuses x-trace-id from the client if provided
 * - Generates a UUID otherwise
 * - Attaches req.traceId and req.log (child logger carrying traceId)
 * - Echoes x-trace-id on the response
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { v4 as uuidv4 } from 'uuid';
import type { Logger } from '../lib/logger/structured-logger.js';

declare global {
  namespace Express {
    interface Request {
      traceId: string;
      log: Logger;
    }
  }
}

const MAX_TRACE_ID_LENGTH = 128;

export function createRequestContextMiddleware(baseLogger: Logger): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const incoming = req.get('x-trace-id');
    const traceId = incoming && incoming.length <= MAX_TRACE_ID_LENGTH ? incoming : uuidv4();

    req.traceId = traceId;
    req.log = baseLogger.child({ traceId });
    res.setHeader('x-trace-id', traceId);

    next();
  };
}

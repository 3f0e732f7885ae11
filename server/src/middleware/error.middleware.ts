/**
 * Centralized Error Middleware
 * Renders { error, code, traceId, details? } and keeps internal messages
 * and stack traces out of production responses.
 */

import type { Request, Response, NextFunction, ErrorRequestHandler, RequestHandler } from 'express';
import { logger } from '../lib/logger/structured-logger.js';

/**
 * Application Error - known HTTP failure with a stable code
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly code: string = 'INTERNAL_ERROR',
    public readonly details?: unknown,
    public readonly exposeMessage: boolean = false
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

interface ErrorResponse {
  error: string;
  code: string;
  traceId: string;
  details?: unknown;
  stack?: string;
}

export interface ErrorMiddlewareOptions {
  /** Include raw messages, details and stacks (non-production) */
  verbose: boolean;
}

/**
 * Must be registered LAST, after every router
 */
export function createErrorMiddleware(options: ErrorMiddlewareOptions): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(err);
      return;
    }

    const error = err instanceof Error ? err : new Error(String(err));
    const appError = error instanceof AppError ? error : null;
    const traceId = req.traceId || 'unknown';
    const statusCode = appError ? appError.statusCode : bodyParserStatus(error) ?? 500;
    const code = appError ? appError.code : statusCode < 500 ? 'BAD_REQUEST' : 'INTERNAL_ERROR';

    let clientMessage: string;
    if (appError?.exposeMessage || (!appError && options.verbose)) {
      clientMessage = error.message || getGenericMessage(statusCode);
    } else {
      clientMessage = getGenericMessage(statusCode);
    }

    const log = req.log ?? logger;
    const logContext = {
      error: { name: error.name, message: error.message, stack: error.stack, code, statusCode },
      method: req.method,
      path: req.path,
      event: 'http_request_failed'
    };
    if (statusCode >= 500) {
      log.error(logContext, '[HTTP] Request error');
    } else {
      log.warn(logContext, '[HTTP] Request error');
    }

    const response: ErrorResponse = { error: clientMessage, code, traceId };
    if (appError?.details !== undefined && (options.verbose || appError.exposeMessage)) {
      response.details = appError.details;
    }
    if (options.verbose && error.stack) {
      response.stack = error.stack;
    }

    res.status(statusCode).json(response);
  };
}

/**
 * Fallback for unmatched routes
 */
export const notFoundHandler: RequestHandler = (req, _res, next) => {
  next(new AppError(`Route not found: ${req.method} ${req.path}`, 404, 'NOT_FOUND', undefined, true));
};

export function createValidationError(message: string, details?: unknown): AppError {
  return new AppError(message, 400, 'VALIDATION_ERROR', details, true);
}

/**
 * express.json() reports malformed bodies as errors carrying status 400
 */
function bodyParserStatus(error: Error): number | undefined {
  if ('status' in error && typeof error.status === 'number' && error.status >= 400 && error.status < 500) {
    return error.status;
  }
  return undefined;
}

function getGenericMessage(statusCode: number): string {
  switch (statusCode) {
    case 400:
      return 'Invalid request';
    case 401:
      return 'Unauthorized';
    case 403:
      return 'Forbidden';
    case 404:
      return 'Not found';
    case 429:
      return 'Too many requests';
    case 503:
      return 'Service unavailable';
    default:
      return statusCode >= 500 ? 'Internal server error' : 'Bad request';
  }
}

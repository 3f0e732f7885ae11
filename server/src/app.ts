import express from 'express';
import cors from 'cors';
import compression from 'compression';
import helmet from 'helmet';
import type { Runtime } from './runtime.js';
import { createRequestContextMiddleware } from './middleware/requestContext.middleware.js';
import { httpLoggingMiddleware } from './middleware/httpLogging.middleware.js';
import { createErrorMiddleware, notFoundHandler } from './middleware/error.middleware.js';
import { createSseRouter } from './controllers/sse/sse.controller.js';
import { createMessageRouter } from './controllers/message/message.controller.js';
import { createAdminRouter } from './controllers/admin/admin.controller.js';
import { healthzHandler, infoHandler } from './controllers/health.controller.js';

const SSE_PATH = '/sse';

/**
 * Event streams must flush per event, so they are never compressed
 */
function shouldCompress(req: express.Request, res: express.Response): boolean {
    const contentType = res.getHeader('Content-Type');
    if (typeof contentType === 'string' && contentType.startsWith('text/event-stream')) {
        return false;
    }
    return compression.filter(req, res);
}

/**
 * compression wraps res.write even when it decides not to compress,
 * so the stream route never passes through it
 */
function compressExceptEventStream(): express.RequestHandler {
    const compress = compression({ filter: shouldCompress });
    return (req, res, next) => {
        if (req.path === SSE_PATH || req.path.startsWith(`${SSE_PATH}/`)) {
            next();
            return;
        }
        compress(req, res, next);
    };
}

export function createApp(runtime: Runtime) {
    const { config, registry, limiter, dispatcher, logger } = runtime;
    const app = express();
    app.set('trust proxy', config.trustProxy);

    // Request context & logging first, so body errors carry a traceId
    app.use(createRequestContextMiddleware(logger));
    app.use(httpLoggingMiddleware);

    app.use(helmet());
    app.use(compressExceptEventStream());
    app.use(express.json({ limit: '1mb' }));
    app.use(cors({
        origin: config.allowedOrigins.includes('*') ? true : config.allowedOrigins,
        credentials: true
    }));

    app.use(SSE_PATH, createSseRouter(dispatcher));
    app.use('/message', createMessageRouter({ registry, limiter, apiKeys: config.apiKeys }));
    app.use('/admin', createAdminRouter({ registry, limiter, dispatcher, adminToken: config.adminToken }));

    app.get('/healthz', healthzHandler);
    app.get('/info', infoHandler);

    app.use(notFoundHandler);
    app.use(createErrorMiddleware({ verbose: config.nodeEnv !== 'production' }));

    return app;
}

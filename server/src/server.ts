import 'dotenv/config';
import { createApp } from './app.js';
import { ConfigError, getConfig, type AppConfig } from './config/env.js';
import { logger } from './lib/logger/structured-logger.js';
import { createRuntime } from './runtime.js';

function loadConfigOrExit(): AppConfig {
    try {
        return getConfig();
    } catch (err) {
        if (err instanceof ConfigError) {
            logger.fatal({ issues: err.issues, event: 'config_invalid' }, '[Server] Invalid configuration');
            process.exit(1);
        }
        throw err;
    }
}

const config = loadConfigOrExit();

const runtime = createRuntime(config);
const app = createApp(runtime);

runtime.start();
const server = app.listen(config.port, config.host, () => {
    logger.info(
        { host: config.host, port: config.port, event: 'server_listening' },
        `Server listening on http://${config.host}:${config.port}`
    );
});

let shuttingDown = false;

async function shutdown(signal: NodeJS.Signals): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal, event: 'shutdown_started' }, `Received ${signal}. Shutting down gracefully...`);

    // Open streams end here, so server.close() is not held up by them
    await runtime.stop();
    server.close(err => {
        if (err) {
            logger.error({ error: err.message, event: 'server_close_failed' }, 'Server close failed');
            process.exit(1);
        }
        logger.info({ event: 'server_closed' }, 'Server closed');
        process.exit(0);
    });
}

function onSignal(signal: NodeJS.Signals): void {
    shutdown(signal).catch(err => {
        logger.error(
            { error: err instanceof Error ? err.message : String(err), event: 'shutdown_failed' },
            'Shutdown failed'
        );
        process.exit(1);
    });
}

process.on('SIGINT', onSignal);
process.on('SIGTERM', onSignal);

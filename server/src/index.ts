/**
 * Server entry point
 *
 * Validates the environment, builds the engine and serves HTTP until
 * SIGINT/SIGTERM, then closes the listener and exits.
 */

// Config first: it loads .env before the logger reads NODE_ENV and LOG_LEVEL
import { buildEngineConfig, loadEnv } from './config/index.js';
import { createApp } from './app.js';
import { AvailabilityEngine } from './services/availability/index.js';
import logger from './utils/logger.js';

/** Hard stop when open connections do not drain */
const SHUTDOWN_TIMEOUT_MS = 10000;

const env = loadEnv();
const config = buildEngineConfig(env);
const engine = new AvailabilityEngine(config);
const app = createApp(engine);

const server = app.listen(env.PORT, () => {
    logger.info({
        port: env.PORT,
        sourceMode: config.source.mode,
        policy: config.policy.name,
        timeZone: config.timeZone,
        today: config.today ?? null,
    }, 'Availability service listening');
});

let isShuttingDown = false;

function shutdown(signal: NodeJS.Signals): void {
    if (isShuttingDown) return;
    isShuttingDown = true;
    logger.info({ signal }, 'Shutting down');

    const forceExit = setTimeout(() => {
        logger.error({ timeoutMs: SHUTDOWN_TIMEOUT_MS }, 'Shutdown timed out, forcing exit');
        process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();

    server.close(error => {
        if (error) {
            logger.error({ error: error.message }, 'Error while closing server');
            process.exit(1);
        }
        process.exit(0);
    });
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

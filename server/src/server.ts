
import { createApp } from './app.js';
import { getConfig } from './config/env.js';
import { logger } from './lib/logger/structured-logger.js';
import { closeRedisClient } from './lib/redis/redis-client.js';
import { createRecommendationServices } from './services/recommendation/index.js';

const SHUTDOWN_GRACE_MS = 10_000;

async function main() {
    const config = getConfig();
    const services = await createRecommendationServices(config);

    const app = createApp(services);
    const server = app.listen(config.port, () => {
        logger.info({ event: 'server_started', port: config.port, env: config.env }, `Server listening on http://localhost:${config.port}`);
    });

    let shuttingDown = false;

    async function shutdown(signal: NodeJS.Signals) {
        if (shuttingDown) return;
        shuttingDown = true;
        logger.info({ event: 'shutdown_started', signal }, `Received ${signal}. Shutting down gracefully...`);

        const forceExit = setTimeout(() => {
            logger.error({ event: 'shutdown_forced' }, 'Graceful shutdown timed out');
            process.exit(1);
        }, SHUTDOWN_GRACE_MS);
        forceExit.unref();

        await new Promise<void>((resolve) => server.close(() => resolve()));
        await services.interactions.drain();
        await closeRedisClient();

        logger.info({ event: 'shutdown_completed' }, 'Server closed');
        process.exit(0);
    }

    const onSignal = (signal: NodeJS.Signals) => {
        shutdown(signal).catch((error: unknown) => {
            logger.error({ event: 'shutdown_failed', error: error instanceof Error ? error.message : String(error) }, 'Shutdown failed');
            process.exit(1);
        });
    };

    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
}

main().catch((error: unknown) => {
    logger.fatal({ event: 'startup_failed', error: error instanceof Error ? error.message : String(error) }, 'Server failed to start');
    process.exit(1);
});

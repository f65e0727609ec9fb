/**
 * Server entry point
 * Loads the configuration, authenticates as the GitHub App and starts listening for webhooks.
 */

import { createApp } from './app.js';
import { loadConfigFromEnvironment } from './config/index.js';
import { createServices } from './composition.js';
import { WEBHOOK_ROUTE } from './CONSTS.js';
import { installFatalProcessHandlers } from './lib/fatalProcessHandlers.js';
import { logger, shutdownLogger } from './lib/logger.js';

async function main(): Promise<void> {
    const config = loadConfigFromEnvironment();
    const services = createServices(config);

    // Fail fast on a wrong App ID, key or organization instead of on the first webhook.
    logger.info(
        { event: 'startup_token_request', organization: config.github.organization },
        'Requesting GitHub App installation access token'
    );
    await services.tokenCache.acquire();

    const app = createApp(services.appDeps);
    const { host, port } = config.server;
    const server = app.listen(port, host);

    server.once('listening', () => {
        const address = server.address();
        const actualPort = address && typeof address !== 'string' ? address.port : port;

        logger.info(
            {
                event: 'startup',
                host,
                port: actualPort,
                organization: config.github.organization,
                apiBaseUrl: config.github.baseUrl,
                endpoints: {
                    health: `GET http://${host}:${actualPort}/health`,
                    webhook: `POST http://${host}:${actualPort}${WEBHOOK_ROUTE}`,
                },
            },
            'Listening for GitHub webhook events'
        );
    });

    server.on('error', (error: NodeJS.ErrnoException) => {
        const message =
            error.code === 'EADDRINUSE'
                ? 'Port is already in use'
                : error.code === 'EACCES'
                  ? 'No permission to bind to port'
                  : 'Failed to start server';

        logger.error({ event: 'startup_error', code: error.code, host, port, err: error }, message);
        void shutdownLogger().finally(() => process.exit(1));
    });

    let shuttingDown = false;

    async function shutdown(reason: string): Promise<void> {
        if (shuttingDown) return;
        shuttingDown = true;

        logger.info({ event: 'shutdown', reason }, 'Closing server');

        // Stop accepting new connections; in-flight background work is abandoned.
        await new Promise<void>((resolve) => server.close(() => resolve()));
        await shutdownLogger();
    }

    installFatalProcessHandlers({
        logger,
        exitTimeoutMs: 5000,
        onFatal: async (event) => {
            await shutdown(event.kind);
        },
    });

    process.on('SIGINT', () => {
        void shutdown('SIGINT').finally(() => process.exit(0));
    });
    process.on('SIGTERM', () => {
        void shutdown('SIGTERM').finally(() => process.exit(0));
    });
}

main().catch(async (err: unknown) => {
    logger.fatal({ event: 'startup_failed', err }, 'Could not start branch-guard');
    await shutdownLogger();
    process.exit(1);
});

/**
 * Express application setup
 */

import express, { type Express, type NextFunction, type Request, type Response } from 'express';

import { WEBHOOK_ROUTE } from './CONSTS.js';
import { formatErrorResponse, getErrorStatus, HttpError } from './lib/httpErrors.js';
import { logger } from './lib/logger.js';
import { requestLoggingMiddleware } from './middleware/requestLogging.js';
import { createHealthRouter, type HealthRouterDeps } from './routes/health.js';
import { createWebhookRouter, type WebhookRouterDeps } from './routes/webhooks.js';

export interface AppDeps {
    webhook: WebhookRouterDeps;
    health: HealthRouterDeps;
}

/**
 * body-parser marks its own failures with a `type`, e.g. `entity.too.large`.
 */
function bodyParserErrorType(err: unknown): string | undefined {
    if (typeof err !== 'object' || err === null || !('type' in err)) return undefined;
    return typeof err.type === 'string' ? err.type : undefined;
}

export function createApp(deps: AppDeps): Express {
    const app = express();

    app.disable('x-powered-by');
    app.use(requestLoggingMiddleware);

    app.use('/health', createHealthRouter(deps.health));
    app.use(WEBHOOK_ROUTE, createWebhookRouter(deps.webhook));

    app.use((req: Request, res: Response) => {
        res.status(404).json({ error: 'not found', path: req.path });
    });

    app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
        const parserError = bodyParserErrorType(err);
        const error =
            parserError === 'entity.too.large'
                ? new HttpError(413, 'payload too large')
                : parserError
                  ? new HttpError(400, 'malformed payload body', parserError)
                  : err;

        const status = getErrorStatus(error);
        if (status >= 500) {
            logger.error({ event: 'http_unhandled_error', err }, 'Unhandled error in request');
        }

        res.status(status).json(formatErrorResponse(error));
    });

    return app;
}

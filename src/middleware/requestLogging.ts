import { randomUUID } from 'node:crypto';

import type { NextFunction, Request, Response } from 'express';

import { logger } from '../lib/logger.js';
import { runWithRequestContext } from '../lib/requestContext.js';

type Outcome = 'success' | 'error';

function getOutcome(statusCode: number): Outcome {
    return statusCode >= 400 ? 'error' : 'success';
}

export interface HttpWideEvent {
    event: 'http_request';
    requestId: string;
    method: string;
    path: string;
    /** `X-GitHub-Event` of a webhook delivery. */
    githubEvent?: string;
    /** `X-GitHub-Delivery` GUID, useful for redelivering from the App settings page. */
    deliveryId?: string;
    statusCode?: number;
    durationMs?: number;
    outcome?: Outcome;
    userAgent?: string;
    ip?: string;
}

function isHealthCheckRequest(req: Request): boolean {
    const pathname = (req.originalUrl || req.url || '').split('?')[0] ?? '';
    return pathname === '/health' || pathname === '/health/';
}

export function requestLoggingMiddleware(req: Request, res: Response, next: NextFunction): void {
    const headerRequestId = req.header('x-request-id');
    const requestId =
        headerRequestId && headerRequestId.trim().length > 0 ? headerRequestId : randomUUID();

    res.setHeader('X-Request-Id', requestId);

    const start = Date.now();
    const isHealthCheck = isHealthCheckRequest(req);

    const wideEvent: HttpWideEvent = {
        event: 'http_request',
        requestId,
        method: req.method,
        path: req.originalUrl || req.url,
        githubEvent: req.header('x-github-event') ?? undefined,
        deliveryId: req.header('x-github-delivery') ?? undefined,
        userAgent: req.header('user-agent') ?? undefined,
        ip: req.ip,
    };

    res.on('finish', () => {
        wideEvent.statusCode = res.statusCode;
        wideEvent.durationMs = Date.now() - start;
        wideEvent.outcome = getOutcome(res.statusCode);

        // Skip successful health checks; they are polled constantly.
        if (isHealthCheck && res.statusCode < 500) return;

        logger.info(wideEvent);
    });

    runWithRequestContext({ requestId }, () => {
        next();
    });
}

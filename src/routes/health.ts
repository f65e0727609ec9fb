/**
 * Health check endpoint
 */

import { Router } from 'express';

import type { InstallationTokenCache } from '../github/installationTokenCache.js';

export interface HealthRouterDeps {
    tokenCache: Pick<InstallationTokenCache, 'peek'>;
    clock?: () => Date;
}

export function createHealthRouter(deps: HealthRouterDeps): Router {
    const router: Router = Router();
    const clock = deps.clock ?? (() => new Date());
    const startTime = clock().getTime();

    router.get('/', (_req, res) => {
        const now = clock();
        const token = deps.tokenCache.peek();

        res.json({
            status: 'ok',
            timestamp: now.toISOString(),
            uptime: Math.floor((now.getTime() - startTime) / 1000),
            installationToken:
                token === undefined
                    ? 'missing'
                    : token.expiresAt.getTime() > now.getTime()
                      ? 'valid'
                      : 'expired',
        });
    });

    return router;
}

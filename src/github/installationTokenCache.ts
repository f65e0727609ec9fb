import { logger } from '../lib/logger.js';
import type {
    InstallationToken,
    InstallationTokenExchange,
    InstallationTokenSource,
} from './types.js';

export interface CreateInstallationTokenCacheDeps {
    exchange: InstallationTokenExchange;
    /**
     * Renew once the cached token has less than this much lifetime left.
     */
    renewalMarginMs?: number;
    clock?: () => Date;
}

export interface InstallationTokenCache extends InstallationTokenSource {
    /** Cached token without triggering a renewal. */
    peek(): InstallationToken | undefined;
}

/**
 * Holds the organization's installation token and renews it before it expires.
 *
 * Renewal is single-flight: while an exchange is running every `acquire()` awaits that
 * same exchange. A token is only stored once the exchange has fully succeeded, so a
 * failed or abandoned renewal leaves the previous state untouched.
 */
export function createInstallationTokenCache(
    deps: CreateInstallationTokenCacheDeps
): InstallationTokenCache {
    const clock = deps.clock ?? (() => new Date());
    const renewalMarginMs = Math.max(deps.renewalMarginMs ?? 60_000, 0);

    let current: InstallationToken | undefined;
    let forceRenewal = false;
    let pending: Promise<InstallationToken> | null = null;

    function isUsable(token: InstallationToken): boolean {
        return token.expiresAt.getTime() - clock().getTime() > renewalMarginMs;
    }

    function renew(): Promise<InstallationToken> {
        if (pending) return pending;

        const start = Date.now();
        const inFlight = Promise.resolve()
            .then(() => deps.exchange())
            .then(
                (token) => {
                    current = token;
                    forceRenewal = false;
                    logger.info(
                        {
                            event: 'installation_token_renewed',
                            expiresAt: token.expiresAt.toISOString(),
                            durationMs: Date.now() - start,
                        },
                        'Obtained GitHub App installation access token'
                    );
                    return token;
                },
                (err: unknown) => {
                    logger.warn(
                        {
                            event: 'installation_token_renewal_failed',
                            durationMs: Date.now() - start,
                            err,
                        },
                        'Failed to obtain GitHub App installation access token'
                    );
                    throw err;
                }
            )
            .finally(() => {
                pending = null;
            });

        pending = inFlight;
        return inFlight;
    }

    return {
        acquire(): Promise<InstallationToken> {
            if (current && !forceRenewal && isUsable(current)) {
                return Promise.resolve(current);
            }
            return renew();
        },

        invalidate(staleToken?: string): void {
            // Another task may already have replaced the token this caller saw rejected.
            if (staleToken !== undefined && current?.token !== staleToken) return;
            if (!current) return;

            forceRenewal = true;
            logger.info(
                { event: 'installation_token_invalidated' },
                'Installation access token invalidated; next call renews it'
            );
        },

        peek(): InstallationToken | undefined {
            return current;
        },
    };
}

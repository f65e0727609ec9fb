import type { KeyObject } from 'node:crypto';

import type { AppConfig } from './config/index.js';
import { USER_AGENT } from './CONSTS.js';
import { createAssertionFactory, loadPrivateKey } from './github/appJwt.js';
import { createGitHubClient } from './github/githubClient.js';
import { createInstallationTokenCache } from './github/installationTokenCache.js';
import { createInstallationTokenExchange } from './github/installationTokenExchange.js';
import { createBranchProtectionService } from './services/branchProtectionService.js';
import type { AppDeps } from './app.js';

export interface ServiceOverrides {
    privateKey?: KeyObject;
    fetchImpl?: typeof fetch;
    clock?: () => Date;
}

/**
 * Wires the GitHub App stack for one organization. Throws `KeyError` when the private
 * key cannot be used, which is fatal at startup.
 */
export function createServices(config: AppConfig, overrides?: ServiceOverrides) {
    const privateKey = overrides?.privateKey ?? loadPrivateKey(config.github.privateKeyPath);

    const createAssertion = createAssertionFactory({
        appId: config.github.appId,
        privateKey,
        clockSkewSeconds: config.auth.clockSkewSeconds,
        lifetimeSeconds: config.auth.assertionLifetimeSeconds,
        clock: overrides?.clock,
    });

    const tokenCache = createInstallationTokenCache({
        exchange: createInstallationTokenExchange({
            baseUrl: config.github.baseUrl,
            organization: config.github.organization,
            installationId: config.github.installationId,
            createAssertion,
            userAgent: USER_AGENT,
            timeoutMs: config.auth.exchangeTimeoutMs,
            fetchImpl: overrides?.fetchImpl,
        }),
        renewalMarginMs: config.auth.renewalMarginSeconds * 1000,
        clock: overrides?.clock,
    });

    const githubClient = createGitHubClient({
        baseUrl: config.github.baseUrl,
        tokenSource: tokenCache,
        userAgent: USER_AGENT,
        requestTimeoutMs: config.requests.timeoutMs,
        retry: {
            maxAttempts: config.requests.maxAttempts,
            baseDelayMs: config.requests.baseDelayMs,
            maxDelayMs: config.requests.maxDelayMs,
            jitterRatio: config.requests.jitterRatio,
        },
        fetchImpl: overrides?.fetchImpl,
    });

    const branchProtectionService = createBranchProtectionService({
        client: githubClient,
        requiredApprovingReviewCount: config.protection.requiredApprovingReviewCount,
    });

    const appDeps: AppDeps = {
        webhook: {
            webhookSecret: config.github.webhookSecret,
            maxBodyBytes: config.webhook.maxBodyBytes,
            handlingTimeoutMs: config.webhook.handlingTimeoutMs,
            onDefaultBranchCreated: (event, signal) =>
                branchProtectionService.protectDefaultBranch(event, signal),
        },
        health: { tokenCache, clock: overrides?.clock },
    };

    return {
        tokenCache,
        githubClient,
        branchProtectionService,
        appDeps,
    };
}

export type Services = ReturnType<typeof createServices>;

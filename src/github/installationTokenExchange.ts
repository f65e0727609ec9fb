import { z } from 'zod';

import { logger } from '../lib/logger.js';
import { GITHUB_ACCEPT, GITHUB_API_VERSION, resolveApiUrl, truncate } from './apiUrl.js';
import { CredentialExchangeError } from './errors.js';
import type { InstallationToken, InstallationTokenExchange } from './types.js';

const InstallationResponseSchema = z.object({
    id: z.number().int().positive(),
});

const AccessTokenResponseSchema = z.object({
    token: z.string().min(1),
    expires_at: z
        .string()
        .refine((v) => !Number.isNaN(Date.parse(v)), 'expires_at must be a timestamp'),
});

export interface CreateInstallationTokenExchangeDeps {
    baseUrl: string;
    /** Organization slug as it appears in URLs. */
    organization: string;
    /** Skips the installation lookup when known up front. */
    installationId?: number;
    /** Returns a freshly signed app JWT on every call. */
    createAssertion: () => Promise<string>;
    userAgent: string;
    timeoutMs?: number;
    fetchImpl?: typeof fetch;
}

function isTransientStatus(status: number): boolean {
    return status === 429 || status >= 500;
}

export function createInstallationTokenExchange(
    deps: CreateInstallationTokenExchangeDeps
): InstallationTokenExchange {
    const timeoutMs = Math.max(Math.floor(deps.timeoutMs ?? 10_000), 500);
    const fetchImpl = deps.fetchImpl ?? fetch;
    let installationId = deps.installationId;

    async function appRequest(
        method: 'GET' | 'POST',
        path: string
    ): Promise<{ status: number; payload: unknown }> {
        const assertion = await deps.createAssertion();
        const url = resolveApiUrl(deps.baseUrl, path);

        const controller = new AbortController();
        const timeout = setTimeout(() => controller.abort(), timeoutMs);

        let response: Response;
        let text: string;
        try {
            response = await fetchImpl(url, {
                method,
                headers: {
                    accept: GITHUB_ACCEPT,
                    authorization: `Bearer ${assertion}`,
                    'user-agent': deps.userAgent,
                    'x-github-api-version': GITHUB_API_VERSION,
                },
                signal: controller.signal,
            });
            // The timeout also bounds a body that stalls after the headers.
            text = await response.text();
        } catch (err) {
            throw new CredentialExchangeError(
                controller.signal.aborted
                    ? `GitHub ${method} ${path} timed out after ${timeoutMs}ms`
                    : `Unable to reach GitHub for ${method} ${path}`,
                0,
                true,
                { cause: err }
            );
        } finally {
            clearTimeout(timeout);
        }

        if (!response.ok) {
            throw new CredentialExchangeError(
                `GitHub ${method} ${path} failed (${response.status}): ${truncate(text)}`,
                response.status,
                isTransientStatus(response.status)
            );
        }

        try {
            return { status: response.status, payload: JSON.parse(text) as unknown };
        } catch (err) {
            throw new CredentialExchangeError(
                `GitHub ${method} ${path} returned a non-JSON body`,
                response.status,
                false,
                { cause: err }
            );
        }
    }

    async function resolveInstallationId(): Promise<number> {
        if (installationId !== undefined) return installationId;

        const { status, payload } = await appRequest(
            'GET',
            `orgs/${encodeURIComponent(deps.organization)}/installation`
        );
        const parsed = InstallationResponseSchema.safeParse(payload);
        if (!parsed.success) {
            throw new CredentialExchangeError(
                `Unexpected installation response for organization "${deps.organization}"`,
                status,
                false,
                { cause: parsed.error }
            );
        }

        installationId = parsed.data.id;
        logger.info(
            { event: 'installation_resolved', organization: deps.organization, installationId },
            'Resolved GitHub App installation'
        );
        return installationId;
    }

    return async function exchange(): Promise<InstallationToken> {
        const id = await resolveInstallationId();
        const { status, payload } = await appRequest(
            'POST',
            `app/installations/${id}/access_tokens`
        );

        const parsed = AccessTokenResponseSchema.safeParse(payload);
        if (!parsed.success) {
            throw new CredentialExchangeError(
                'Unexpected installation access token response',
                status,
                false,
                { cause: parsed.error }
            );
        }

        return {
            token: parsed.data.token,
            expiresAt: new Date(parsed.data.expires_at),
        };
    };
}

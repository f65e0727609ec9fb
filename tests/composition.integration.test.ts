import request from 'supertest';
import { describe, expect, it, vi } from 'vitest';

import { createApp } from '../src/app.js';
import { parseConfig } from '../src/config/index.js';
import { createServices } from '../src/composition.js';
import { parsePrivateKey } from '../src/github/appJwt.js';
import {
    createManualClock,
    createRsaKeyPair,
    jsonResponse,
    requestUrl,
    statusResponse,
} from './testUtils.js';

const { privateKeyPem } = createRsaKeyPair();

const config = parseConfig({
    github: {
        organization: 'acme',
        appId: 4242,
        privateKeyPath: '/unused/key.pem',
        webhookSecret: 'test-secret',
    },
});

function headerOf(init: RequestInit | undefined, name: string): string | undefined {
    return new Headers(init?.headers).get(name) ?? undefined;
}

/**
 * A GitHub stand-in that serves the four endpoints the service touches.
 */
function createFakeGitHub() {
    const seen: Array<{ method: string; url: string; authorization?: string; body?: string }> = [];
    let tokensIssued = 0;

    const fetchImpl = vi.fn<typeof fetch>(async (input, init) => {
        const url = requestUrl(input);
        const method = init?.method ?? 'GET';
        seen.push({
            method,
            url,
            authorization: headerOf(init, 'authorization'),
            body: typeof init?.body === 'string' ? init.body : undefined,
        });

        if (url === 'https://api.github.com/orgs/acme/installation') {
            return jsonResponse({ id: 31 });
        }
        if (url === 'https://api.github.com/app/installations/31/access_tokens') {
            tokensIssued += 1;
            return jsonResponse(
                { token: `ghs_test_${tokensIssued}`, expires_at: '2026-01-01T01:00:00Z' },
                201
            );
        }
        if (url === 'https://api.github.com/repos/acme/widgets/branches/main/protection') {
            return jsonResponse({ url });
        }
        if (url === 'https://api.github.com/repos/acme/widgets/issues') {
            return jsonResponse(
                { number: 12, html_url: 'https://github.com/acme/widgets/issues/12' },
                201
            );
        }
        return statusResponse(404, '{"message":"Not Found"}');
    });

    return { fetchImpl, seen };
}

describe('service composition', () => {
    it('protects a default branch using an installation token', async () => {
        const github = createFakeGitHub();
        const clock = createManualClock(new Date('2026-01-01T00:00:00Z'));
        const services = createServices(config, {
            privateKey: parsePrivateKey(privateKeyPem),
            fetchImpl: github.fetchImpl,
            clock: clock.now,
        });

        const result = await services.branchProtectionService.protectDefaultBranch({
            owner: 'acme',
            repository: 'widgets',
            branch: 'main',
            creator: 'octocat',
        });

        expect(result).toEqual({
            issueNumber: 12,
            issueUrl: 'https://github.com/acme/widgets/issues/12',
        });
        expect(github.seen.map((r) => `${r.method} ${r.url}`)).toEqual([
            'GET https://api.github.com/orgs/acme/installation',
            'POST https://api.github.com/app/installations/31/access_tokens',
            'PUT https://api.github.com/repos/acme/widgets/branches/main/protection',
            'POST https://api.github.com/repos/acme/widgets/issues',
        ]);

        // App endpoints see a JWT, repository endpoints the installation token.
        expect(github.seen[0].authorization).toMatch(/^Bearer eyJ/);
        expect(github.seen[1].authorization).toMatch(/^Bearer eyJ/);
        expect(github.seen[2].authorization).toBe('Bearer ghs_test_1');
        expect(github.seen[3].authorization).toBe('Bearer ghs_test_1');
    });

    it('reuses the cached installation token across deliveries', async () => {
        const github = createFakeGitHub();
        const clock = createManualClock(new Date('2026-01-01T00:00:00Z'));
        const services = createServices(config, {
            privateKey: parsePrivateKey(privateKeyPem),
            fetchImpl: github.fetchImpl,
            clock: clock.now,
        });
        const event = { owner: 'acme', repository: 'widgets', branch: 'main', creator: 'octocat' };

        await services.branchProtectionService.protectDefaultBranch(event);
        clock.advance(30 * 60_000);
        await services.branchProtectionService.protectDefaultBranch(event);

        const exchanges = github.seen.filter((r) => r.url.endsWith('/access_tokens'));
        expect(exchanges).toHaveLength(1);
    });

    it('reports the installation token state on /health', async () => {
        const github = createFakeGitHub();
        const clock = createManualClock(new Date('2026-01-01T00:00:00Z'));
        const services = createServices(config, {
            privateKey: parsePrivateKey(privateKeyPem),
            fetchImpl: github.fetchImpl,
            clock: clock.now,
        });
        const app = createApp(services.appDeps);

        const before = await request(app).get('/health').expect(200);
        expect(before.body).toEqual({
            status: 'ok',
            timestamp: '2026-01-01T00:00:00.000Z',
            uptime: 0,
            installationToken: 'missing',
        });

        await services.tokenCache.acquire();
        clock.advance(5_000);
        const after = await request(app).get('/health').expect(200);
        expect(after.body).toMatchObject({ uptime: 5, installationToken: 'valid' });

        clock.advance(60 * 60_000);
        const expired = await request(app).get('/health').expect(200);
        expect(expired.body).toMatchObject({ installationToken: 'expired' });
    });
});

/**
 * GitHub App identity assertions.
 *
 * GitHub authenticates an App with a short-lived RS256 JWT whose issuer is the App ID.
 * The JWT is only ever used to obtain an installation access token.
 * @see https://docs.github.com/en/apps/creating-github-apps/authenticating-with-a-github-app/generating-a-json-web-token-jwt-for-a-github-app
 */

import { createPrivateKey, type KeyObject } from 'node:crypto';
import { readFileSync } from 'node:fs';
import { SignJWT } from 'jose';

import { KeyError } from './errors.js';

/** GitHub rejects app JWTs that live longer than ten minutes. */
export const MAX_ASSERTION_LIFETIME_SECONDS = 600;

export interface AppJwtOptions {
    appId: string;
    privateKey: KeyObject;
    now?: Date;
    /** Back-dates `iat` to tolerate clock drift between us and GitHub. */
    clockSkewSeconds?: number;
    lifetimeSeconds?: number;
}

export function parsePrivateKey(pem: string): KeyObject {
    let key: KeyObject;
    try {
        // Accepts both PKCS#1 (what GitHub hands out) and PKCS#8 PEM.
        key = createPrivateKey({ key: pem, format: 'pem' });
    } catch (err) {
        throw new KeyError('Could not parse GitHub App private key', { cause: err });
    }

    if (key.asymmetricKeyType !== 'rsa') {
        throw new KeyError(
            `GitHub App private key must be an RSA key (got ${key.asymmetricKeyType ?? 'unknown'})`
        );
    }

    return key;
}

export function loadPrivateKey(path: string): KeyObject {
    let pem: string;
    try {
        pem = readFileSync(path, 'utf8');
    } catch (err) {
        throw new KeyError(`Could not read GitHub App private key file at ${path}`, { cause: err });
    }
    return parsePrivateKey(pem);
}

export async function createAppJwt(options: AppJwtOptions): Promise<string> {
    const nowSeconds = Math.floor((options.now ?? new Date()).getTime() / 1000);
    const clockSkewSeconds = Math.max(Math.floor(options.clockSkewSeconds ?? 60), 0);
    const lifetimeSeconds = Math.min(
        Math.max(Math.floor(options.lifetimeSeconds ?? MAX_ASSERTION_LIFETIME_SECONDS), 1),
        MAX_ASSERTION_LIFETIME_SECONDS
    );

    try {
        return await new SignJWT({})
            .setProtectedHeader({ alg: 'RS256', typ: 'JWT' })
            .setIssuedAt(nowSeconds - clockSkewSeconds)
            .setExpirationTime(nowSeconds + lifetimeSeconds)
            .setIssuer(options.appId)
            .sign(options.privateKey);
    } catch (err) {
        throw new KeyError('Could not sign GitHub App JWT', { cause: err });
    }
}

/**
 * Binds the signer to one App so callers can mint a fresh assertion per request.
 */
export function createAssertionFactory(deps: {
    appId: string;
    privateKey: KeyObject;
    clockSkewSeconds?: number;
    lifetimeSeconds?: number;
    clock?: () => Date;
}): () => Promise<string> {
    const clock = deps.clock ?? (() => new Date());
    return () =>
        createAppJwt({
            appId: deps.appId,
            privateKey: deps.privateKey,
            now: clock(),
            clockSkewSeconds: deps.clockSkewSeconds,
            lifetimeSeconds: deps.lifetimeSeconds,
        });
}

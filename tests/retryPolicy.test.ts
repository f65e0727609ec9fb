import { describe, expect, it } from 'vitest';

import { CredentialExchangeError, KeyError, ResponseDecodeError } from '../src/github/errors.js';
import {
    classifyOutcome,
    classifyStatus,
    computeBackoffMs,
    DEFAULT_RETRY_POLICY,
    parseRetryAfter,
} from '../src/github/retryPolicy.js';

describe('classifyStatus', () => {
    it.each([
        [200, 'success'],
        [201, 'success'],
        [204, 'success'],
        [401, 'reauthenticate'],
        [403, 'reauthenticate'],
        [429, 'retryable'],
        [500, 'retryable'],
        [503, 'retryable'],
        [400, 'fatal'],
        [404, 'fatal'],
        [422, 'fatal'],
        [304, 'fatal'],
    ])('classifies %i as %s', (status, expected) => {
        expect(classifyStatus(status)).toBe(expected);
    });
});

describe('classifyOutcome', () => {
    it('retries transient credential failures only', () => {
        expect(
            classifyOutcome({
                kind: 'error',
                error: new CredentialExchangeError('timed out', 0, true),
            })
        ).toBe('retryable');
        expect(
            classifyOutcome({
                kind: 'error',
                error: new CredentialExchangeError('bad credentials', 401, false),
            })
        ).toBe('fatal');
    });

    it('treats our own failures as fatal', () => {
        expect(classifyOutcome({ kind: 'error', error: new KeyError('bad key') })).toBe('fatal');
        expect(
            classifyOutcome({ kind: 'error', error: new ResponseDecodeError(200, 'bad body') })
        ).toBe('fatal');
    });

    it('retries network errors', () => {
        expect(classifyOutcome({ kind: 'error', error: new TypeError('fetch failed') })).toBe(
            'retryable'
        );
    });

    it('classifies responses by status', () => {
        expect(
            classifyOutcome({
                kind: 'response',
                status: 403,
                headers: new Headers(),
                body: '',
                token: 'test-token',
            })
        ).toBe('reauthenticate');
    });
});

describe('parseRetryAfter', () => {
    const now = new Date('2026-01-01T00:00:00Z');

    it('reads delta seconds', () => {
        expect(parseRetryAfter('3', now)).toBe(3000);
        expect(parseRetryAfter(' 0 ', now)).toBe(0);
    });

    it('reads an HTTP date relative to now', () => {
        expect(parseRetryAfter('Thu, 01 Jan 2026 00:00:30 GMT', now)).toBe(30_000);
    });

    it('clamps dates in the past to zero', () => {
        expect(parseRetryAfter('Wed, 31 Dec 2025 23:59:00 GMT', now)).toBe(0);
    });

    it('ignores absent or unreadable values', () => {
        expect(parseRetryAfter(null, now)).toBeNull();
        expect(parseRetryAfter('', now)).toBeNull();
        expect(parseRetryAfter('soon', now)).toBeNull();
    });
});

describe('computeBackoffMs', () => {
    const policy = DEFAULT_RETRY_POLICY;

    it('doubles from the base delay', () => {
        expect(computeBackoffMs(1, policy, () => 0)).toBe(1000);
        expect(computeBackoffMs(2, policy, () => 0)).toBe(2000);
        expect(computeBackoffMs(3, policy, () => 0)).toBe(4000);
    });

    it('adds jitter proportional to the delay', () => {
        expect(computeBackoffMs(2, policy, () => 0.5)).toBe(2200);
        expect(computeBackoffMs(1, policy, () => 1)).toBe(1200);
    });

    it('never exceeds the maximum delay', () => {
        expect(computeBackoffMs(10, policy, () => 1)).toBe(60_000);
    });

    it('prefers the server hint, capped at the maximum', () => {
        expect(computeBackoffMs(1, policy, () => 1, 5000)).toBe(5000);
        expect(computeBackoffMs(1, policy, () => 1, 120_000)).toBe(60_000);
    });
});

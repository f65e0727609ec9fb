import { CredentialExchangeError, GitHubAppError } from './errors.js';

export interface RetryPolicy {
    /** Upper bound on attempts for transient failures, the first attempt included. */
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    /** Extra random delay as a fraction of the computed backoff (0.2 → up to +20%). */
    jitterRatio: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
    maxAttempts: 4,
    baseDelayMs: 1_000,
    maxDelayMs: 60_000,
    jitterRatio: 0.2,
};

export type AttemptOutcome =
    | {
          kind: 'response';
          status: number;
          headers: Headers;
          body: string;
          /** The installation token the request was sent with. */
          token: string;
      }
    | { kind: 'error'; error: unknown };

export type OutcomeClass = 'success' | 'retryable' | 'reauthenticate' | 'fatal';

export function classifyStatus(status: number): OutcomeClass {
    if (status >= 200 && status < 300) return 'success';
    if (status === 401 || status === 403) return 'reauthenticate';
    if (status === 429 || status >= 500) return 'retryable';
    return 'fatal';
}

export function classifyOutcome(outcome: AttemptOutcome): OutcomeClass {
    if (outcome.kind === 'response') return classifyStatus(outcome.status);

    const { error } = outcome;
    if (error instanceof CredentialExchangeError) {
        return error.transient ? 'retryable' : 'fatal';
    }
    // Our own errors (bad key, undecodable response) will not fix themselves.
    if (error instanceof GitHubAppError) return 'fatal';

    // Connection resets, DNS failures, per-attempt timeouts.
    return 'retryable';
}

/**
 * Milliseconds to wait from a `Retry-After` header (delta-seconds or HTTP date).
 */
export function parseRetryAfter(value: string | null, now: Date = new Date()): number | null {
    if (value === null) return null;
    const trimmed = value.trim();
    if (!trimmed) return null;

    if (/^\d+$/.test(trimmed)) {
        return Number.parseInt(trimmed, 10) * 1000;
    }

    const at = Date.parse(trimmed);
    if (Number.isNaN(at)) return null;
    return Math.max(at - now.getTime(), 0);
}

/**
 * Delay before retry number `retry` (1 for the first retry).
 * A server-provided hint replaces the exponential schedule; both are capped at `maxDelayMs`.
 */
export function computeBackoffMs(
    retry: number,
    policy: RetryPolicy,
    random: () => number = Math.random,
    retryAfterMs: number | null = null
): number {
    if (retryAfterMs !== null) {
        return Math.min(retryAfterMs, policy.maxDelayMs);
    }

    const exponent = Math.max(retry - 1, 0);
    const base = Math.min(policy.baseDelayMs * 2 ** exponent, policy.maxDelayMs);
    const jitter = base * policy.jitterRatio * random();
    return Math.min(Math.round(base + jitter), policy.maxDelayMs);
}

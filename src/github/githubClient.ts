import { setTimeout as delay } from 'node:timers/promises';
import type { z } from 'zod';

import { logger } from '../lib/logger.js';
import { GITHUB_ACCEPT, GITHUB_API_VERSION, resolveApiUrl, truncate } from './apiUrl.js';
import {
    AuthorizationError,
    ClientRequestError,
    RequestFailedError,
    ResponseDecodeError,
    TransientResponseError,
} from './errors.js';
import {
    DEFAULT_RETRY_POLICY,
    classifyOutcome,
    computeBackoffMs,
    parseRetryAfter,
    type AttemptOutcome,
    type RetryPolicy,
} from './retryPolicy.js';
import type {
    GitHubRequest,
    GitHubResponse,
    InstallationTokenSource,
} from './types.js';

type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface CreateGitHubClientDeps {
    baseUrl: string;
    tokenSource: InstallationTokenSource;
    userAgent: string;
    retry?: Partial<RetryPolicy>;
    /** Timeout of a single HTTP attempt. */
    requestTimeoutMs?: number;
    fetchImpl?: typeof fetch;
    sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
    random?: () => number;
}

export interface GitHubClient {
    /**
     * Sends one GitHub API request as the App installation.
     *
     * Transient failures are retried, so the same request may reach GitHub more than once.
     * Only pass requests that are idempotent (GET, PUT of a full resource) or whose
     * repetition is acceptable; the client does not deduplicate side effects.
     */
    execute<T>(request: GitHubRequest<T>): Promise<GitHubResponse<T>>;
    get<T>(path: string, schema: Schema<T>, signal?: AbortSignal): Promise<T>;
    post<T>(path: string, body: unknown, schema: Schema<T>, signal?: AbortSignal): Promise<T>;
    put<T>(path: string, body: unknown, schema: Schema<T>, signal?: AbortSignal): Promise<T>;
    patch<T>(path: string, body: unknown, schema: Schema<T>, signal?: AbortSignal): Promise<T>;
    delete<T>(path: string, schema: Schema<T>, signal?: AbortSignal): Promise<T>;
}

type ExecutionState<T> =
    | { kind: 'attempting'; attempt: number }
    | { kind: 'backingOff'; attempt: number; delayMs: number }
    | { kind: 'succeeded'; response: GitHubResponse<T> }
    | { kind: 'exhausted'; attempts: number };

async function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
    await delay(ms, undefined, signal ? { signal } : undefined);
}

function parseBody(text: string): unknown {
    // GitHub answers some writes with 204 and no body.
    if (!text.trim()) return undefined;
    return JSON.parse(text) as unknown;
}

function describeFailure(outcome: AttemptOutcome): Record<string, unknown> {
    return outcome.kind === 'response' ? { status: outcome.status } : { err: outcome.error };
}

export function createGitHubClient(deps: CreateGitHubClientDeps): GitHubClient {
    const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...deps.retry };
    const maxAttempts = Math.max(Math.floor(policy.maxAttempts), 1);
    const requestTimeoutMs = Math.max(Math.floor(deps.requestTimeoutMs ?? 15_000), 500);
    const fetchImpl = deps.fetchImpl ?? fetch;
    const sleep = deps.sleep ?? defaultSleep;
    const random = deps.random ?? Math.random;

    async function sendOnce<T>(request: GitHubRequest<T>): Promise<AttemptOutcome> {
        let token: string;
        try {
            token = (await deps.tokenSource.acquire()).token;
        } catch (error) {
            return { kind: 'error', error };
        }
        // The caller may have given up while the token was being renewed.
        request.signal?.throwIfAborted();

        const controller = new AbortController();
        const timeout = setTimeout(() => controller.abort(), requestTimeoutMs);
        const forwardAbort = () => controller.abort();
        request.signal?.addEventListener('abort', forwardAbort, { once: true });

        try {
            const response = await fetchImpl(resolveApiUrl(deps.baseUrl, request.path), {
                method: request.method,
                headers: {
                    accept: GITHUB_ACCEPT,
                    authorization: `Bearer ${token}`,
                    'user-agent': deps.userAgent,
                    'x-github-api-version': GITHUB_API_VERSION,
                    ...(request.body !== undefined ? { 'content-type': 'application/json' } : {}),
                },
                ...(request.body !== undefined ? { body: JSON.stringify(request.body) } : {}),
                signal: controller.signal,
            });
            const body = await response.text();
            return {
                kind: 'response',
                status: response.status,
                headers: response.headers,
                body,
                token,
            };
        } catch (error) {
            // Abandoned by the caller: not a transient failure, stop here.
            request.signal?.throwIfAborted();
            return { kind: 'error', error };
        } finally {
            clearTimeout(timeout);
            request.signal?.removeEventListener('abort', forwardAbort);
        }
    }

    function decode<T>(
        request: GitHubRequest<T>,
        outcome: Extract<AttemptOutcome, { kind: 'response' }>
    ): GitHubResponse<T> {
        let payload: unknown;
        try {
            payload = parseBody(outcome.body);
        } catch (err) {
            throw new ResponseDecodeError(
                outcome.status,
                `GitHub ${request.method} ${request.path} returned a non-JSON body`,
                { cause: err }
            );
        }

        const parsed = request.schema.safeParse(payload);
        if (!parsed.success) {
            throw new ResponseDecodeError(
                outcome.status,
                `GitHub ${request.method} ${request.path} returned an unexpected body`,
                { cause: parsed.error }
            );
        }

        return { status: outcome.status, headers: outcome.headers, data: parsed.data };
    }

    async function execute<T>(request: GitHubRequest<T>): Promise<GitHubResponse<T>> {
        const start = Date.now();
        let state: ExecutionState<T> = { kind: 'attempting', attempt: 1 };
        let reauthenticated = false;
        let lastFailure: unknown;

        for (;;) {
            switch (state.kind) {
                case 'attempting': {
                    request.signal?.throwIfAborted();
                    const outcome = await sendOnce(request);
                    const verdict = classifyOutcome(outcome);

                    if (verdict === 'success' && outcome.kind === 'response') {
                        state = { kind: 'succeeded', response: decode(request, outcome) };
                        break;
                    }

                    if (verdict === 'reauthenticate' && outcome.kind === 'response') {
                        if (reauthenticated) {
                            throw new AuthorizationError(
                                outcome.status,
                                `GitHub rejected ${request.method} ${request.path} with a freshly issued installation token (${outcome.status}): ${truncate(outcome.body)}`
                            );
                        }
                        reauthenticated = true;
                        logger.info(
                            {
                                event: 'github_request_reauthenticate',
                                method: request.method,
                                path: request.path,
                                status: outcome.status,
                            },
                            'Installation token rejected; renewing and retrying once'
                        );
                        deps.tokenSource.invalidate(outcome.token);
                        // The re-authenticated attempt does not count against the transient budget.
                        state = { kind: 'attempting', attempt: state.attempt };
                        break;
                    }

                    if (verdict === 'retryable') {
                        lastFailure =
                            outcome.kind === 'response'
                                ? new TransientResponseError(
                                      outcome.status,
                                      truncate(outcome.body),
                                      parseRetryAfter(outcome.headers.get('retry-after'))
                                  )
                                : outcome.error;

                        if (state.attempt >= maxAttempts) {
                            state = { kind: 'exhausted', attempts: state.attempt };
                            break;
                        }

                        const retryAfterMs =
                            lastFailure instanceof TransientResponseError
                                ? lastFailure.retryAfterMs
                                : null;
                        const delayMs = computeBackoffMs(state.attempt, policy, random, retryAfterMs);
                        logger.warn(
                            {
                                event: 'github_request_retry',
                                method: request.method,
                                path: request.path,
                                attempt: state.attempt,
                                maxAttempts,
                                delayMs,
                                ...describeFailure(outcome),
                            },
                            'Transient GitHub API failure; backing off'
                        );
                        state = { kind: 'backingOff', attempt: state.attempt, delayMs };
                        break;
                    }

                    // fatal
                    if (outcome.kind === 'response') {
                        throw new ClientRequestError(
                            outcome.status,
                            outcome.body,
                            `GitHub ${request.method} ${request.path} failed (${outcome.status}): ${truncate(outcome.body)}`
                        );
                    }
                    throw outcome.error;
                }

                case 'backingOff': {
                    await sleep(state.delayMs, request.signal);
                    state = { kind: 'attempting', attempt: state.attempt + 1 };
                    break;
                }

                case 'succeeded': {
                    logger.debug(
                        {
                            event: 'github_request',
                            method: request.method,
                            path: request.path,
                            status: state.response.status,
                            durationMs: Date.now() - start,
                        },
                        'GitHub API request succeeded'
                    );
                    return state.response;
                }

                case 'exhausted': {
                    logger.error(
                        {
                            event: 'github_request_exhausted',
                            method: request.method,
                            path: request.path,
                            attempts: state.attempts,
                            durationMs: Date.now() - start,
                            err: lastFailure,
                        },
                        'GitHub API request failed after retries'
                    );
                    throw new RequestFailedError(
                        state.attempts,
                        `GitHub ${request.method} ${request.path} failed after ${state.attempts} attempts`,
                        { cause: lastFailure }
                    );
                }
            }
        }
    }

    return {
        execute,
        async get(path, schema, signal) {
            return (await execute({ method: 'GET', path, schema, signal })).data;
        },
        async post(path, body, schema, signal) {
            return (await execute({ method: 'POST', path, body, schema, signal })).data;
        },
        async put(path, body, schema, signal) {
            return (await execute({ method: 'PUT', path, body, schema, signal })).data;
        },
        async patch(path, body, schema, signal) {
            return (await execute({ method: 'PATCH', path, body, schema, signal })).data;
        },
        async delete(path, schema, signal) {
            return (await execute({ method: 'DELETE', path, schema, signal })).data;
        },
    };
}

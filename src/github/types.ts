import type { z } from 'zod';

export interface InstallationToken {
    token: string;
    expiresAt: Date;
}

/**
 * Mints a brand-new installation token. Every call signs its own app JWT.
 */
export type InstallationTokenExchange = () => Promise<InstallationToken>;

export interface InstallationTokenSource {
    acquire(): Promise<InstallationToken>;
    invalidate(staleToken?: string): void;
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export interface GitHubRequest<T> {
    method: HttpMethod;
    /** Path relative to the API base URL, without a leading slash (e.g. `repos/acme/widgets`). */
    path: string;
    body?: unknown;
    /** Decodes the response body; pass `z.unknown()` when the body is irrelevant. */
    schema: z.ZodType<T, z.ZodTypeDef, unknown>;
    signal?: AbortSignal;
}

export interface GitHubResponse<T> {
    status: number;
    headers: Headers;
    data: T;
}

export const GITHUB_API_VERSION = '2022-11-28';
export const GITHUB_ACCEPT = 'application/vnd.github+json';

/**
 * Joins an endpoint such as `orgs/acme/installation` onto the API base URL.
 * The base keeps its own path prefix (GitHub Enterprise serves the API under `/api/v3/`).
 */
export function resolveApiUrl(baseUrl: string, path: string): string {
    const base = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
    return new URL(path.replace(/^\/+/, ''), base).toString();
}

export function truncate(value: string, max = 200): string {
    if (value.length <= max) return value;
    return value.slice(0, max) + '...';
}

export type GitHubAppErrorCode =
    | 'KEY_INVALID'
    | 'CREDENTIAL_EXCHANGE_FAILED'
    | 'SIGNATURE_MALFORMED'
    | 'AUTHORIZATION_FAILED'
    | 'CLIENT_REQUEST_FAILED'
    | 'RESPONSE_INVALID'
    | 'REQUEST_FAILED';

export class GitHubAppError extends Error {
    constructor(
        public readonly code: GitHubAppErrorCode,
        message: string,
        options?: ErrorOptions
    ) {
        super(message, options);
        this.name = 'GitHubAppError';
    }
}

/**
 * The App's private key is unreadable, unparsable or not an RSA key.
 * Fatal at startup.
 */
export class KeyError extends GitHubAppError {
    constructor(message: string, options?: ErrorOptions) {
        super('KEY_INVALID', message, options);
        this.name = 'KeyError';
    }
}

export class CredentialExchangeError extends GitHubAppError {
    constructor(
        message: string,
        /** HTTP status of the failed exchange call, 0 when no response arrived. */
        public readonly status: number,
        /** Network failures, timeouts, 429 and 5xx may succeed on a later attempt. */
        public readonly transient: boolean,
        options?: ErrorOptions
    ) {
        super('CREDENTIAL_EXCHANGE_FAILED', message, options);
        this.name = 'CredentialExchangeError';
    }
}

export class MalformedSignatureError extends GitHubAppError {
    constructor(message: string) {
        super('SIGNATURE_MALFORMED', message);
        this.name = 'MalformedSignatureError';
    }
}

export class AuthorizationError extends GitHubAppError {
    constructor(
        public readonly status: number,
        message: string,
        options?: ErrorOptions
    ) {
        super('AUTHORIZATION_FAILED', message, options);
        this.name = 'AuthorizationError';
    }
}

export class ClientRequestError extends GitHubAppError {
    constructor(
        public readonly status: number,
        public readonly body: string,
        message: string
    ) {
        super('CLIENT_REQUEST_FAILED', message);
        this.name = 'ClientRequestError';
    }
}

export class ResponseDecodeError extends GitHubAppError {
    constructor(
        public readonly status: number,
        message: string,
        options?: ErrorOptions
    ) {
        super('RESPONSE_INVALID', message, options);
        this.name = 'ResponseDecodeError';
    }
}

export class RequestFailedError extends GitHubAppError {
    constructor(
        public readonly attempts: number,
        message: string,
        options?: ErrorOptions
    ) {
        super('REQUEST_FAILED', message, options);
        this.name = 'RequestFailedError';
    }
}

/**
 * Failure of a single outbound attempt that the retry loop may retry.
 * Never escapes the client; it ends up as the `cause` of a `RequestFailedError`.
 */
export class TransientResponseError extends Error {
    constructor(
        public readonly status: number,
        public readonly body: string,
        public readonly retryAfterMs: number | null
    ) {
        super(`GitHub API responded with status ${status}`);
        this.name = 'TransientResponseError';
    }
}

import { createHmac, timingSafeEqual } from 'node:crypto';

import { MalformedSignatureError } from './errors.js';

export const SIGNATURE_HEADER = 'x-hub-signature-256';

const SIGNATURE_PREFIX = 'sha256=';
const SHA256_HEX_LENGTH = 64;
const HEX_PATTERN = /^[0-9a-fA-F]+$/;

export type SignatureRejectionReason = 'missing_secret' | 'missing_signature' | 'mismatch';

export type SignatureVerdict =
    | { verified: true }
    | { verified: false; reason: SignatureRejectionReason };

export interface VerifyWebhookSignatureInput {
    /** Exact bytes of the request body as received, before any parsing. */
    payload: Buffer;
    signatureHeader: string | undefined;
    secret: string;
}

function computeDigest(payload: Buffer, secret: string): Buffer {
    return createHmac('sha256', secret).update(payload).digest();
}

/**
 * Header value GitHub would send for `payload` signed with `secret`.
 */
export function signWebhookPayload(payload: Buffer | string, secret: string): string {
    const bytes = typeof payload === 'string' ? Buffer.from(payload, 'utf8') : payload;
    return `${SIGNATURE_PREFIX}${computeDigest(bytes, secret).toString('hex')}`;
}

/**
 * Checks an `X-Hub-Signature-256` header against the raw payload.
 *
 * A mismatch is an ordinary outcome and is returned, not thrown. A header that is not
 * `sha256=` followed by 64 hex characters throws `MalformedSignatureError` before any
 * comparison happens.
 */
export function verifyWebhookSignature(input: VerifyWebhookSignatureInput): SignatureVerdict {
    if (!input.secret) {
        return { verified: false, reason: 'missing_secret' };
    }

    const header = input.signatureHeader;
    if (header === undefined || header === '') {
        return { verified: false, reason: 'missing_signature' };
    }

    if (!header.startsWith(SIGNATURE_PREFIX)) {
        throw new MalformedSignatureError('Signature must use the sha256= scheme');
    }

    const providedHex = header.slice(SIGNATURE_PREFIX.length);
    if (providedHex.length !== SHA256_HEX_LENGTH) {
        throw new MalformedSignatureError(
            `Signature must be ${SHA256_HEX_LENGTH} hex characters (got ${providedHex.length})`
        );
    }
    if (!HEX_PATTERN.test(providedHex)) {
        throw new MalformedSignatureError('Signature contains non-hex characters');
    }

    const provided = Buffer.from(providedHex, 'hex');
    const expected = computeDigest(input.payload, input.secret);

    // Both are 32 bytes here; timingSafeEqual throws on unequal lengths.
    return timingSafeEqual(provided, expected)
        ? { verified: true }
        : { verified: false, reason: 'mismatch' };
}

/**
 * Account Service - Bearer Token Authentication
 *
 * Extracts `Authorization: Bearer <token>` and verifies it with the codec.
 *
 * @see RFC 6750 Section 2.1 - Authorization Request Header Field
 */

import type { SessionClaims } from '../../../shared_types/session';
import type { TokenCodec, TokenRejection } from '../token-codec';

export type BearerRejection = TokenRejection | 'missing';

export type BearerAuthResult =
    | { valid: true; claims: SessionClaims }
    | { valid: false; reason: BearerRejection };

const BEARER_PATTERN = /^Bearer\s+(\S+)\s*$/i;

/**
 * Token from an Authorization header value, or null when absent or not Bearer.
 */
export function extractBearerToken(authorization: string | undefined): string | null {
    if (!authorization) {
        return null;
    }
    const match = BEARER_PATTERN.exec(authorization.trim());
    return match ? match[1] : null;
}

export async function authenticateBearer(
    authorization: string | undefined,
    codec: TokenCodec
): Promise<BearerAuthResult> {
    const token = extractBearerToken(authorization);
    if (!token) {
        return { valid: false, reason: 'missing' };
    }
    return codec.verify(token);
}

/**
 * Account Service - Token Codec
 *
 * Issues and verifies stateless HMAC-signed JWTs with jose.
 *
 * - `iat`/`exp` are always set here, in Unix seconds; caller claims cannot carry them
 * - Verification accepts only the configured algorithm (no `alg` downgrade)
 * - A token is valid iff the signature checks and `now < exp`
 * - `verify` reports failures as values; it does not throw for bad tokens
 *
 * Rotating the secret or algorithm invalidates every issued token.
 *
 * @see RFC 7519 - JSON Web Token
 */

import { SignJWT, errors, jwtVerify } from 'jose';
import type { JWTPayload } from 'jose';
import type { SessionAlgorithm, SessionClaims, SubjectClaims } from '../../shared_types/session';

// =============================================================================
// Types
// =============================================================================

export interface TokenCodecOptions {
    secret: string;
    algorithm: SessionAlgorithm;
    /** Lifetime applied when `issue` is called without one */
    ttlSeconds: number;
    /** Epoch milliseconds; injectable for deterministic tests */
    now?: () => number;
}

export type TokenRejection = 'malformed' | 'signature' | 'expired';

export type TokenVerification =
    | { valid: true; claims: SessionClaims }
    | { valid: false; reason: TokenRejection };

export interface IssuedToken {
    token: string;
    iat: number;
    exp: number;
}

// =============================================================================
// Token Codec
// =============================================================================

export class TokenCodec {
    private readonly key: Uint8Array;
    private readonly algorithm: SessionAlgorithm;
    private readonly now: () => number;
    readonly defaultTtlSeconds: number;

    constructor(options: TokenCodecOptions) {
        if (options.secret.length === 0) {
            throw new Error('Token signing secret must not be empty');
        }
        assertTtl(options.ttlSeconds);

        this.key = new TextEncoder().encode(options.secret);
        this.algorithm = options.algorithm;
        this.defaultTtlSeconds = options.ttlSeconds;
        this.now = options.now ?? Date.now;
    }

    /**
     * Current time in Unix seconds, as the codec sees it.
     */
    nowSeconds(): number {
        return Math.floor(this.now() / 1000);
    }

    /**
     * Sign `claims` with `iat = now` and `exp = now + ttlSeconds`.
     *
     * @throws RangeError when ttlSeconds is not a positive integer
     */
    async issue(claims: SubjectClaims, ttlSeconds = this.defaultTtlSeconds): Promise<string> {
        const issued = await this.issueWithExpiry(claims, ttlSeconds);
        return issued.token;
    }

    /**
     * Same as `issue`, also returning the timestamps written into the token.
     */
    async issueWithExpiry(claims: SubjectClaims, ttlSeconds = this.defaultTtlSeconds): Promise<IssuedToken> {
        assertTtl(ttlSeconds);

        const iat = this.nowSeconds();
        const exp = iat + ttlSeconds;

        const token = await new SignJWT({ ...claims })
            .setProtectedHeader({ alg: this.algorithm, typ: 'JWT' })
            .setIssuedAt(iat)
            .setExpirationTime(exp)
            .sign(this.key);

        return { token, iat, exp };
    }

    /**
     * Check signature and expiry, then recover the claims.
     *
     * Errors that are not JOSE errors indicate a bug and are rethrown.
     */
    async verify(token: string): Promise<TokenVerification> {
        let payload: JWTPayload;

        try {
            const verified = await jwtVerify(token, this.key, {
                algorithms: [this.algorithm],
                currentDate: new Date(this.now()),
            });
            payload = verified.payload;
        } catch (err) {
            return { valid: false, reason: classifyJoseError(err) };
        }

        const claims = toSessionClaims(payload);
        if (!claims) {
            return { valid: false, reason: 'malformed' };
        }

        return { valid: true, claims };
    }
}

// =============================================================================
// Helpers
// =============================================================================

function assertTtl(ttlSeconds: number): void {
    if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
        throw new RangeError(`Token lifetime must be a positive whole number of seconds, got ${ttlSeconds}`);
    }
}

function classifyJoseError(err: unknown): TokenRejection {
    if (err instanceof errors.JWTExpired) {
        return 'expired';
    }
    if (err instanceof errors.JWSSignatureVerificationFailed || err instanceof errors.JOSEAlgNotAllowed) {
        return 'signature';
    }
    if (err instanceof errors.JOSEError) {
        return 'malformed';
    }
    throw err;
}

/**
 * Narrow a verified payload to the claims this service issues.
 * Returns null when a required claim is missing or has the wrong type.
 */
function toSessionClaims(payload: JWTPayload): SessionClaims | null {
    const { sub, iat, exp, email, first_name, last_name } = payload;

    if (typeof sub !== 'string' || typeof email !== 'string') {
        return null;
    }
    if (typeof iat !== 'number' || typeof exp !== 'number') {
        return null;
    }
    if (first_name !== undefined && typeof first_name !== 'string') {
        return null;
    }
    if (last_name !== undefined && typeof last_name !== 'string') {
        return null;
    }

    const claims: SessionClaims = { sub, email, iat, exp };
    if (first_name !== undefined) {
        claims.first_name = first_name;
    }
    if (last_name !== undefined) {
        claims.last_name = last_name;
    }
    return claims;
}

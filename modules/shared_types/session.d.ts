/**
 * Account Service - Session Types
 *
 * Token claims, the session response returned by both sign-in flows,
 * and the values exchanged with the identity provider.
 */

// =============================================================================
// Token Claims
// =============================================================================

/** HMAC algorithms accepted for session tokens */
export type SessionAlgorithm = 'HS256' | 'HS384' | 'HS512';

/**
 * Claims supplied by the caller when issuing a token.
 * `iat` and `exp` are always computed by the codec.
 */
export interface SubjectClaims {
    /** Directory id, or a `pseudo_` identity in degraded mode */
    sub: string;
    email: string;
    first_name?: string;
    last_name?: string;
}

/** Claims as recovered from a verified token */
export interface SessionClaims extends SubjectClaims {
    /** Issued-at, Unix seconds */
    iat: number;
    /** Expiry, Unix seconds. Always greater than iat. */
    exp: number;
}

// =============================================================================
// Session Response
// =============================================================================

export interface SessionUser {
    id: string;
    email: string;
    first_name: string;
    last_name: string;
}

/**
 * Body returned by POST /auth/login and GET /auth/google/callback.
 * Replayed verbatim for a repeated authorization code.
 */
export interface SessionResponse {
    token: string;
    token_type: 'Bearer';
    /** Seconds until the token expires */
    expires_in: number;
    user: SessionUser;
}

// =============================================================================
// Identity Provider
// =============================================================================

/** Result of a successful authorization-code exchange. Never persisted. */
export interface OAuthTokenSet {
    accessToken: string;
    refreshToken?: string;
    idToken: string;
}

/** Profile fetched from the provider's userinfo endpoint */
export interface ExternalProfile {
    email: string;
    givenName: string;
    familyName: string;
}

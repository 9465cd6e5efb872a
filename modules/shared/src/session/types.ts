/**
 * Account Service - Session Issuer Types
 */

import type { SessionResponse } from '../../../shared_types/session';
import type { AuditLogger, Logger } from '../audit-logger';
import type { PasswordCheckMode } from '../config';
import type { GoogleOAuthClient } from '../oauth/google-client';
import type { SecretHasher } from '../password';
import type { Result } from '../result';
import type { UserDirectory } from '../storage/types';
import type { TokenCodec } from '../token-codec';
import type { IdempotencyCache } from './idempotency-cache';

// =============================================================================
// Failures
// =============================================================================

export type LoginFailureKind =
    | 'invalid_credentials'
    | 'invalid_grant'
    | 'exchange_failed'
    | 'profile_fetch_failed'
    | 'network_timeout'
    | 'directory_unavailable'
    | 'request_cancelled';

export interface LoginFailure {
    kind: LoginFailureKind;
    /** Safe to show to the caller */
    message: string;
}

export type LoginResult = Result<SessionResponse, LoginFailure>;

// =============================================================================
// Dependencies
// =============================================================================

export type SessionCache = IdempotencyCache<SessionResponse, LoginFailure>;

export interface SessionIssuerDeps {
    directory: UserDirectory;
    codec: TokenCodec;
    hasher: SecretHasher;
    oauth: GoogleOAuthClient;
    cache: SessionCache;
    /** Defaults to 'verify' */
    passwordCheckMode?: PasswordCheckMode;
}

/**
 * Request-scoped loggers. The issuer falls back to system loggers when omitted.
 */
export interface LoginContext {
    log?: Logger;
    audit?: AuditLogger;
}

export interface GoogleLoginOptions extends LoginContext {
    /** Must match the redirect URI used for the authorization request */
    redirectUri?: string;
    /**
     * Aborting answers the caller with request_cancelled immediately.
     * The exchange keeps running and its result is still cached.
     */
    signal?: AbortSignal;
}

export interface IssuerStats {
    /** Tokens issued under a pseudo identity because the directory failed */
    degradedLogins: number;
    /** Callbacks answered from the idempotency cache */
    replayedCodes: number;
}

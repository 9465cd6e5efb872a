/**
 * Account Service - Composition
 *
 * Process-wide instances built from environment configuration.
 * Created on first use and reused across Lambda warm starts; each Lambda
 * instance therefore has its own idempotency cache.
 */

import type { SessionResponse } from '../../../shared_types/session';
import { getGoogleConfig, getIssuerConfig, getTokenConfig } from '../config';
import { GoogleOAuthClient } from '../oauth/google-client';
import { SecretHasher } from '../password';
import { getUserDirectory } from '../storage/create-directory';
import { TokenCodec } from '../token-codec';
import { IdempotencyCache } from './idempotency-cache';
import { SessionIssuer } from './session-issuer';
import type { LoginFailure } from './types';

let codec: TokenCodec | null = null;
let hasher: SecretHasher | null = null;
let oauthClient: GoogleOAuthClient | null = null;
let issuer: SessionIssuer | null = null;

export function getTokenCodec(): TokenCodec {
    if (!codec) {
        codec = new TokenCodec(getTokenConfig());
    }
    return codec;
}

export function getSecretHasher(): SecretHasher {
    if (!hasher) {
        hasher = new SecretHasher();
    }
    return hasher;
}

export function getGoogleOAuthClient(): GoogleOAuthClient {
    if (!oauthClient) {
        oauthClient = new GoogleOAuthClient(getGoogleConfig());
    }
    return oauthClient;
}

export function getSessionIssuer(): SessionIssuer {
    if (!issuer) {
        const issuerConfig = getIssuerConfig();
        issuer = new SessionIssuer({
            directory: getUserDirectory(),
            codec: getTokenCodec(),
            hasher: getSecretHasher(),
            oauth: getGoogleOAuthClient(),
            cache: new IdempotencyCache<SessionResponse, LoginFailure>(issuerConfig.cacheMaxEntries),
            passwordCheckMode: issuerConfig.passwordCheckMode,
        });
    }
    return issuer;
}

/**
 * Drop all instances (useful for testing).
 */
export function resetSessionIssuer(): void {
    codec = null;
    hasher = null;
    oauthClient = null;
    issuer = null;
}

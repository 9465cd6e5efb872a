export { IdempotencyCache, DEFAULT_CACHE_MAX_ENTRIES } from './idempotency-cache';

export { SessionIssuer } from './session-issuer';

export {
    getSessionIssuer,
    getTokenCodec,
    getSecretHasher,
    getGoogleOAuthClient,
    resetSessionIssuer,
} from './create-session-issuer';

export type {
    GoogleLoginOptions,
    IssuerStats,
    LoginContext,
    LoginFailure,
    LoginFailureKind,
    LoginResult,
    SessionCache,
    SessionIssuerDeps,
} from './types';

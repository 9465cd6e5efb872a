/**
 * Account Service - Shared Package
 *
 * Central export for everything the Lambda modules share.
 *
 * Modules:
 * - Credential core: Secret Hasher, Token Codec, Google OAuth client,
 *   Idempotency Cache, Session Issuer
 * - Storage: User Directory port with DynamoDB and in-memory implementations
 * - Audit Logger: structured JSON logging to CloudWatch
 * - Response Helpers: HTTP response formatting and failure mapping
 * - Configuration: environment loading with validation
 * - Errors, validation and crypto helpers
 */

// =============================================================================
// Credential Core
// =============================================================================

export { SecretHasher, ARGON2_DEFAULTS, OAUTH_PASSWORD_SENTINEL } from './password';

export type { Argon2Params } from './password';

export { TokenCodec } from './token-codec';

export type {
    IssuedToken,
    TokenCodecOptions,
    TokenRejection,
    TokenVerification,
} from './token-codec';

export { GoogleOAuthClient, GOOGLE_SCOPES } from './oauth';

export type {
    AuthorizationRequest,
    FetchLike,
    OAuthFailure,
    OAuthFailureKind,
} from './oauth';

export {
    IdempotencyCache,
    DEFAULT_CACHE_MAX_ENTRIES,
    SessionIssuer,
    getSessionIssuer,
    getTokenCodec,
    getSecretHasher,
    getGoogleOAuthClient,
    resetSessionIssuer,
} from './session';

export type {
    GoogleLoginOptions,
    IssuerStats,
    LoginContext,
    LoginFailure,
    LoginFailureKind,
    LoginResult,
    SessionCache,
    SessionIssuerDeps,
} from './session';

export { authenticateBearer, extractBearerToken } from './auth';

export type { BearerAuthResult, BearerRejection } from './auth';

// =============================================================================
// Storage
// =============================================================================

export { getDocClient } from './dynamo-client';

// Re-export modular storage operations for direct use
export * as storage from './storage';

export {
    DynamoUserDirectory,
    InMemoryUserDirectory,
    getUserDirectory,
    resetUserDirectory,
} from './storage';

export type {
    DirectoryFailure,
    DirectoryFailureKind,
    DirectoryResult,
    UserDirectory,
} from './storage';

// =============================================================================
// Audit Logger
// =============================================================================

export {
    AuditLogger,
    Logger,
    withContext,
    createSystemLogger,
    createLogger,
} from './audit-logger';

export type { AuditContext, LogLevel } from './audit-logger';

// =============================================================================
// HTTP Response Helpers
// =============================================================================

export {
    success,
    created,
    noContent,
    error,
    invalidRequest,
    invalidToken,
    notFound,
    conflict,
    methodNotAllowed,
    serverError,
    temporarilyUnavailable,
    configurationError,
    loginFailure,
    directoryFailure,
    redirect,
} from './response';

export type { ErrorBody } from './response';

// =============================================================================
// Configuration
// =============================================================================

export {
    getTokenConfig,
    getGoogleConfig,
    getIssuerConfig,
    getDirectoryConfig,
    clearConfigCache,
    requireEnv,
    optionalEnv,
    optionalNumericEnv,
    optionalEnumEnv,
    SESSION_ALGORITHMS,
} from './config';

export type {
    TokenConfig,
    GoogleConfig,
    IssuerConfig,
    DirectoryConfig,
    DirectoryBackend,
    PasswordCheckMode,
} from './config';

// =============================================================================
// Error Constants
// =============================================================================

export {
    AuthErrors,
    GeneralErrors,
    HttpStatus,
    ErrorMessages,
    ConfigurationError,
    isConfigurationError,
} from './errors';

export type {
    AuthErrorCode,
    GeneralErrorCode,
    ServiceErrorCode,
    HttpStatusCode,
} from './errors';

// =============================================================================
// Validation & Crypto
// =============================================================================

export {
    isValidEmail,
    isValidRedirectUri,
    normalizeRedirectUri,
    MAX_EMAIL_LENGTH,
} from './validation';

export {
    hashToken,
    derivePseudoIdentity,
    isPseudoIdentity,
    base64UrlEncode,
    generateSecureRandom,
    PSEUDO_IDENTITY_PREFIX,
} from './crypto';

export { ok, err } from './result';

export type { Ok, Err, Result } from './result';

// =============================================================================
// Request Parsing
// =============================================================================

export { parseJsonBody, isPlainObject, describeError } from './request';

export type { HttpHandler } from './request';

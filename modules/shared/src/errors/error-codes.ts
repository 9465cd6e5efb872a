/**
 * Account Service - Error Codes
 *
 * Stable machine-readable codes placed in the `error` field of every
 * error response. Clients branch on these, never on descriptions.
 */

// =============================================================================
// Sign-in Error Codes
// =============================================================================

export const AuthErrors = {
    /** Unknown email, wrong password, or a password check against an OAuth-only account */
    INVALID_CREDENTIALS: 'invalid_credentials',

    /** Google rejected the authorization code (expired or already redeemed) */
    INVALID_GRANT: 'invalid_grant',

    /** Token exchange or profile fetch failed at the provider */
    AUTHENTICATION_FAILED: 'authentication_failed',

    /** The provider did not answer within the configured timeout */
    NETWORK_TIMEOUT: 'network_timeout',

    /** The caller went away before the sign-in completed */
    REQUEST_CANCELLED: 'request_cancelled',

    /** Google credentials are not configured on this deployment */
    CONFIGURATION_ERROR: 'configuration_error',

    /** Missing, malformed, expired or forged bearer token */
    INVALID_TOKEN: 'invalid_token',
} as const;

export type AuthErrorCode = typeof AuthErrors[keyof typeof AuthErrors];

// =============================================================================
// General Error Codes
// =============================================================================

export const GeneralErrors = {
    /** The request is missing a required parameter or is otherwise malformed */
    INVALID_REQUEST: 'invalid_request',

    NOT_FOUND: 'not_found',

    /** Unique constraint violated (email already registered) */
    CONFLICT: 'conflict',

    METHOD_NOT_ALLOWED: 'method_not_allowed',

    /** The server encountered an unexpected condition */
    SERVER_ERROR: 'server_error',

    /** A dependency (the user directory) is currently unreachable */
    TEMPORARILY_UNAVAILABLE: 'temporarily_unavailable',
} as const;

export type GeneralErrorCode = typeof GeneralErrors[keyof typeof GeneralErrors];

/** Union of every code the service can return */
export type ServiceErrorCode = AuthErrorCode | GeneralErrorCode;

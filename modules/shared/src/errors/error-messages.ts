/**
 * Account Service - Error Messages
 *
 * Human-readable descriptions placed in `error_description`.
 * Internal detail (provider bodies, SDK errors) goes to logs, never here.
 */

export const ErrorMessages = {
    // -------------------------------------------------------------------------
    // Sign-in
    // -------------------------------------------------------------------------

    INVALID_CREDENTIALS: 'Invalid email or password',

    /** Google returned invalid_grant: the user must start the login again */
    INVALID_GRANT: 'Authorization code is invalid or has already been used. Please restart login.',

    AUTHENTICATION_FAILED: 'Authentication with the identity provider failed',

    NETWORK_TIMEOUT: 'The identity provider did not respond in time',

    REQUEST_CANCELLED: 'The request was cancelled',

    CONFIGURATION_ERROR: 'The service is not configured for this login method',

    MISSING_CODE: 'Missing required parameter: code',

    PROVIDER_DENIED: 'Sign-in was not completed at Google. Please restart login.',

    MISSING_CREDENTIALS: 'Missing required fields: email, password',

    // -------------------------------------------------------------------------
    // Bearer Tokens
    // -------------------------------------------------------------------------

    INVALID_TOKEN: 'The access token is invalid or expired',

    MISSING_TOKEN: 'Missing bearer token',

    // -------------------------------------------------------------------------
    // Users
    // -------------------------------------------------------------------------

    USER_NOT_FOUND: 'User not found',

    EMAIL_EXISTS: 'Email already exists',

    USER_DELETED_UPDATE: 'Cannot update deleted user',

    USER_ALREADY_DELETED: 'User already deleted',

    INVALID_JSON: 'Request body must be a JSON object',

    // -------------------------------------------------------------------------
    // General Errors
    // -------------------------------------------------------------------------

    INTERNAL_ERROR: 'An unexpected error occurred',

    DIRECTORY_UNAVAILABLE: 'The user directory is temporarily unavailable',

    METHOD_NOT_ALLOWED: 'Method not allowed',
} as const;

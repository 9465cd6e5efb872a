/**
 * Account Service - HTTP Status Codes
 *
 * @see RFC 9110 - HTTP Semantics
 */

export const HttpStatus = {
    /** Request succeeded */
    OK: 200,
    /** Resource created successfully */
    CREATED: 201,
    /** Request succeeded with no content to return */
    NO_CONTENT: 204,
    /** Redirect to the identity provider */
    FOUND: 302,
    /** Malformed request syntax or invalid parameters */
    BAD_REQUEST: 400,
    /** Authentication required or credentials invalid */
    UNAUTHORIZED: 401,
    /** Resource not found */
    NOT_FOUND: 404,
    /** HTTP method not allowed for this endpoint */
    METHOD_NOT_ALLOWED: 405,
    /** Unique constraint violated */
    CONFLICT: 409,
    /** Client closed the request before a response was produced (nginx convention) */
    CLIENT_CLOSED_REQUEST: 499,
    /** Unexpected server error */
    INTERNAL_SERVER_ERROR: 500,
    /** Upstream identity provider returned an error */
    BAD_GATEWAY: 502,
    /** Server temporarily unavailable */
    SERVICE_UNAVAILABLE: 503,
    /** Upstream identity provider timed out */
    GATEWAY_TIMEOUT: 504,
} as const;

/** Type representing valid HTTP status code values */
export type HttpStatusCode = typeof HttpStatus[keyof typeof HttpStatus];

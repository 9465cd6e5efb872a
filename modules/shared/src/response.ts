/**
 * Account Service - Standardized HTTP Response Helpers
 *
 * Consistent response formatting for all Lambda functions.
 *
 * Key Requirements:
 * - Responses carrying tokens MUST include Cache-Control: no-store (RFC 6749 Section 5.1)
 * - Error responses use application/json with `error` / `error_description`
 * - Descriptions are fixed strings; internal detail never reaches the body
 * - All responses include the security headers below
 *
 * Note: HTTP API Gateway v2 does not support response header manipulation
 * at the gateway level, so headers are set on every Lambda response.
 */

import type { APIGatewayProxyResultV2 } from 'aws-lambda';
import { AuthErrors, GeneralErrors } from './errors/error-codes';
import { ErrorMessages } from './errors/error-messages';
import { HttpStatus } from './errors/http-status';
import type { LoginFailure, LoginFailureKind } from './session/types';
import type { DirectoryFailure } from './storage/types';

// =============================================================================
// Response Headers
// =============================================================================

/**
 * Applied to all responses.
 *
 * - Strict-Transport-Security: 2 years with includeSubDomains and preload (RFC 6797)
 * - X-Content-Type-Options: nosniff
 * - X-Frame-Options: DENY
 * - Referrer-Policy: strict-origin-when-cross-origin
 */
const SECURITY_HEADERS = {
    'Strict-Transport-Security': 'max-age=63072000; includeSubDomains; preload',
    'X-Content-Type-Options': 'nosniff',
    'X-Frame-Options': 'DENY',
    'Referrer-Policy': 'strict-origin-when-cross-origin',
} as const;

const JSON_HEADERS = {
    'Content-Type': 'application/json',
    'Cache-Control': 'no-store',
    'Pragma': 'no-cache',
    'Content-Security-Policy': "default-src 'none'; frame-ancestors 'none'",
    ...SECURITY_HEADERS,
} as const;

const REDIRECT_HEADERS = {
    'Cache-Control': 'no-store',
    'Pragma': 'no-cache',
    ...SECURITY_HEADERS,
} as const;

// =============================================================================
// Success Responses
// =============================================================================

/**
 * Return a successful JSON response.
 *
 * @example
 * ```typescript
 * return success({ token: 'xxx', token_type: 'Bearer' });
 * ```
 */
export function success<T>(body: T, statusCode: number = HttpStatus.OK): APIGatewayProxyResultV2 {
    return {
        statusCode,
        headers: JSON_HEADERS,
        body: JSON.stringify(body),
    };
}

export function created<T>(body: T): APIGatewayProxyResultV2 {
    return success(body, HttpStatus.CREATED);
}

export function noContent(): APIGatewayProxyResultV2 {
    return {
        statusCode: HttpStatus.NO_CONTENT,
        headers: {
            'Cache-Control': 'no-store',
            ...SECURITY_HEADERS,
        },
        body: '',
    };
}

// =============================================================================
// Error Responses
// =============================================================================

export interface ErrorBody {
    error: string;
    error_description?: string;
}

/**
 * Return an error response.
 *
 * @example
 * ```typescript
 * return error(400, 'invalid_request', 'Missing required parameter: code');
 * ```
 */
export function error(
    statusCode: number,
    errorCode: string,
    description?: string,
    extraHeaders: Record<string, string> = {}
): APIGatewayProxyResultV2 {
    const body: ErrorBody = {
        error: errorCode,
    };

    if (description) {
        body.error_description = description;
    }

    return {
        statusCode,
        headers: { ...JSON_HEADERS, ...extraHeaders },
        body: JSON.stringify(body),
    };
}

export function invalidRequest(description: string): APIGatewayProxyResultV2 {
    return error(HttpStatus.BAD_REQUEST, GeneralErrors.INVALID_REQUEST, description);
}

/**
 * 401 with a WWW-Authenticate challenge (RFC 6750 Section 3).
 */
export function invalidToken(description: string = ErrorMessages.INVALID_TOKEN): APIGatewayProxyResultV2 {
    return error(HttpStatus.UNAUTHORIZED, AuthErrors.INVALID_TOKEN, description, {
        'WWW-Authenticate': 'Bearer error="invalid_token"',
    });
}

export function notFound(description: string = ErrorMessages.USER_NOT_FOUND): APIGatewayProxyResultV2 {
    return error(HttpStatus.NOT_FOUND, GeneralErrors.NOT_FOUND, description);
}

export function conflict(description: string = ErrorMessages.EMAIL_EXISTS): APIGatewayProxyResultV2 {
    return error(HttpStatus.CONFLICT, GeneralErrors.CONFLICT, description);
}

export function methodNotAllowed(allowed: string[]): APIGatewayProxyResultV2 {
    return error(HttpStatus.METHOD_NOT_ALLOWED, GeneralErrors.METHOD_NOT_ALLOWED, ErrorMessages.METHOD_NOT_ALLOWED, {
        Allow: allowed.join(', '),
    });
}

export function serverError(description: string = ErrorMessages.INTERNAL_ERROR): APIGatewayProxyResultV2 {
    return error(HttpStatus.INTERNAL_SERVER_ERROR, GeneralErrors.SERVER_ERROR, description);
}

export function temporarilyUnavailable(
    description: string = ErrorMessages.DIRECTORY_UNAVAILABLE
): APIGatewayProxyResultV2 {
    return error(HttpStatus.SERVICE_UNAVAILABLE, GeneralErrors.TEMPORARILY_UNAVAILABLE, description);
}

export function configurationError(): APIGatewayProxyResultV2 {
    return error(HttpStatus.INTERNAL_SERVER_ERROR, AuthErrors.CONFIGURATION_ERROR, ErrorMessages.CONFIGURATION_ERROR);
}

// ---------------------------------------------------------------------------
// Typed Failure Mapping
// ---------------------------------------------------------------------------

const LOGIN_FAILURE_STATUS: Record<LoginFailureKind, { status: number; code: string }> = {
    invalid_credentials: { status: HttpStatus.UNAUTHORIZED, code: AuthErrors.INVALID_CREDENTIALS },
    invalid_grant: { status: HttpStatus.BAD_REQUEST, code: AuthErrors.INVALID_GRANT },
    exchange_failed: { status: HttpStatus.BAD_GATEWAY, code: AuthErrors.AUTHENTICATION_FAILED },
    profile_fetch_failed: { status: HttpStatus.BAD_GATEWAY, code: AuthErrors.AUTHENTICATION_FAILED },
    network_timeout: { status: HttpStatus.GATEWAY_TIMEOUT, code: AuthErrors.NETWORK_TIMEOUT },
    directory_unavailable: { status: HttpStatus.SERVICE_UNAVAILABLE, code: GeneralErrors.TEMPORARILY_UNAVAILABLE },
    request_cancelled: { status: HttpStatus.CLIENT_CLOSED_REQUEST, code: AuthErrors.REQUEST_CANCELLED },
};

/**
 * Stable status and code for a sign-in failure.
 */
export function loginFailure(failure: LoginFailure): APIGatewayProxyResultV2 {
    const { status, code } = LOGIN_FAILURE_STATUS[failure.kind];
    return error(status, code, failure.message);
}

/**
 * Status and code for a directory failure on the user endpoints.
 *
 * @param deletedMessage - Description for the `deleted` case, which differs by operation
 */
export function directoryFailure(failure: DirectoryFailure, deletedMessage: string): APIGatewayProxyResultV2 {
    switch (failure.kind) {
        case 'not_found':
            return notFound();
        case 'conflict':
            return conflict();
        case 'deleted':
            return invalidRequest(deletedMessage);
        case 'unavailable':
            return temporarilyUnavailable();
    }
}

// =============================================================================
// Redirect Responses
// =============================================================================

/**
 * HTTP 302 Found to an external URL.
 */
export function redirect(url: string): APIGatewayProxyResultV2 {
    return {
        statusCode: HttpStatus.FOUND,
        headers: {
            ...REDIRECT_HEADERS,
            Location: url,
        },
        body: '',
    };
}

/**
 * Account Service - Google Callback Handler
 *
 * Lambda handler for GET /auth/google/callback
 *
 * Flow:
 * 1. Read `code` (and optional `redirect_uri`) from the query string
 * 2. Hand the code to the session issuer, bounded by the Lambda deadline
 * 3. Return the session response, or a stable status/code for the failure
 *
 * Browsers and proxies retry this URL. The issuer redeems each code once and
 * answers repeats from its cache, so a retried callback gets the same session.
 *
 * Responses:
 * - 200 session response
 * - 400 invalid_request (no code) / invalid_grant (code rejected by Google)
 * - 499 request_cancelled (deadline reached before the login finished)
 * - 500 configuration_error
 * - 502 authentication_failed / 504 network_timeout
 */

import type { APIGatewayProxyEventV2, Context } from 'aws-lambda';
import {
    ErrorMessages,
    configurationError,
    createLogger,
    describeError,
    getSessionIssuer,
    invalidRequest,
    isConfigurationError,
    loginFailure,
    methodNotAllowed,
    serverError,
    success,
    withContext,
} from '@account-service/shared';
import type { HttpHandler, SessionIssuer } from '@account-service/shared';

// =============================================================================
// Constants
// =============================================================================

/** Time kept back from the Lambda deadline to write the response */
const DEADLINE_MARGIN_MS = 500;

/**
 * Signal that fires shortly before the invocation is killed.
 */
export function deadlineSignal(context: Context): AbortSignal {
    const remaining = context.getRemainingTimeInMillis() - DEADLINE_MARGIN_MS;
    return AbortSignal.timeout(Math.max(remaining, 0));
}

// =============================================================================
// Lambda Handler
// =============================================================================

export function createCallbackHandler(getIssuer: () => SessionIssuer = getSessionIssuer): HttpHandler {
    return async (event: APIGatewayProxyEventV2, context: Context) => {
        const log = createLogger(event, context);
        const audit = withContext(event, context);

        try {
            if (event.requestContext.http.method !== 'GET') {
                return methodNotAllowed(['GET']);
            }

            const params = event.queryStringParameters ?? {};

            // User declined consent, or Google rejected the request
            if (params.error) {
                log.warn('Google returned an authorization error', { providerError: params.error });
                return invalidRequest(ErrorMessages.PROVIDER_DENIED);
            }

            const code = params.code?.trim();
            if (!code) {
                return invalidRequest(ErrorMessages.MISSING_CODE);
            }

            const result = await getIssuer().loginWithGoogle(code, {
                redirectUri: params.redirect_uri,
                signal: deadlineSignal(context),
                log,
                audit,
            });

            if (!result.ok) {
                return loginFailure(result.error);
            }
            return success(result.value);
        } catch (err) {
            if (isConfigurationError(err)) {
                log.error('Google sign-in is not configured', { setting: err.setting });
                return configurationError();
            }
            log.error('Callback handler error', describeError(err));
            return serverError();
        }
    };
}

export const handler = createCallbackHandler();

/**
 * Account Service - Password Login Handler
 *
 * Lambda handler for POST /auth/login
 *
 * Flow:
 * 1. Parse the JSON body { email, password }
 * 2. Delegate to the session issuer
 * 3. Return the session response, or a stable status/code for the failure
 *
 * Responses:
 * - 200 session response
 * - 400 invalid_request (malformed body)
 * - 401 invalid_credentials (unknown email or wrong password; indistinguishable)
 * - 503 temporarily_unavailable (user directory unreachable)
 */

import type { APIGatewayProxyEventV2, Context } from 'aws-lambda';
import {
    ErrorMessages,
    createLogger,
    describeError,
    getSessionIssuer,
    invalidRequest,
    loginFailure,
    methodNotAllowed,
    parseJsonBody,
    serverError,
    success,
    withContext,
} from '@account-service/shared';
import type { HttpHandler, SessionIssuer } from '@account-service/shared';
import { validateLoginRequest } from './validation';

// =============================================================================
// Lambda Handler
// =============================================================================

export function createLoginHandler(getIssuer: () => SessionIssuer = getSessionIssuer): HttpHandler {
    return async (event: APIGatewayProxyEventV2, context: Context) => {
        const log = createLogger(event, context);
        const audit = withContext(event, context);

        try {
            if (event.requestContext.http.method !== 'POST') {
                return methodNotAllowed(['POST']);
            }

            const body = parseJsonBody(event);
            if (!body) {
                return invalidRequest(ErrorMessages.INVALID_JSON);
            }

            const validation = validateLoginRequest(body);
            if (!validation.valid) {
                log.warn('Rejected login request', { reason: validation.error });
                return invalidRequest(validation.error);
            }

            const { email, password } = validation.request;
            const result = await getIssuer().loginWithPassword(email, password, { log, audit });

            if (!result.ok) {
                return loginFailure(result.error);
            }
            return success(result.value);
        } catch (err) {
            log.error('Login handler error', describeError(err));
            return serverError();
        }
    };
}

export const handler = createLoginHandler();

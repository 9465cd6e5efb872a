/**
 * Account Service - Current User Endpoint
 *
 * Lambda handler for GET /auth/me
 *
 * Returns the claims of a valid session token. No directory lookup is made:
 * the token alone is the credential, so degraded (pseudo) identities are
 * answered the same way as directory-backed ones.
 *
 * Authentication (RFC 6750 Section 2.1):
 *   - Authorization header "Bearer <token>"
 *
 * Responses:
 * - 200 { sub, email, first_name, last_name, iat, exp }
 * - 401 invalid_token with WWW-Authenticate (missing, malformed, bad signature, expired)
 *
 * @module userinfo
 * @see https://datatracker.ietf.org/doc/html/rfc6750
 */

import type { APIGatewayProxyEventV2, Context } from 'aws-lambda';
import {
    ErrorMessages,
    authenticateBearer,
    createLogger,
    describeError,
    getTokenCodec,
    invalidToken,
    methodNotAllowed,
    serverError,
    success,
} from '@account-service/shared';
import type { HttpHandler, TokenCodec } from '@account-service/shared';

export function createMeHandler(getCodec: () => TokenCodec = getTokenCodec): HttpHandler {
    return async (event: APIGatewayProxyEventV2, context: Context) => {
        const log = createLogger(event, context);

        try {
            if (event.requestContext.http.method !== 'GET') {
                return methodNotAllowed(['GET']);
            }

            const auth = await authenticateBearer(event.headers?.['authorization'], getCodec());
            if (!auth.valid) {
                log.info('Rejected bearer token', { reason: auth.reason });
                return invalidToken(auth.reason === 'missing' ? ErrorMessages.MISSING_TOKEN : undefined);
            }

            return success(auth.claims);
        } catch (err) {
            log.error('Userinfo handler error', describeError(err));
            return serverError();
        }
    };
}

export const handler = createMeHandler();

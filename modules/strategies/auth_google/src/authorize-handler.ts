/**
 * Account Service - Google Login Redirect
 *
 * Lambda handler for GET /auth/google/login
 *
 * Sends the browser to Google's consent screen. The optional `redirect_uri`
 * query parameter overrides GOOGLE_REDIRECT_URI; the same value must be
 * passed to the callback so the code exchange matches.
 *
 * Responses:
 * - 302 to the Google authorization endpoint
 * - 400 invalid_request (redirect_uri is not an http(s) URL)
 * - 500 configuration_error (client id or secret unset)
 */

import type { APIGatewayProxyEventV2, Context } from 'aws-lambda';
import {
    createLogger,
    configurationError,
    describeError,
    getGoogleOAuthClient,
    invalidRequest,
    isConfigurationError,
    isValidRedirectUri,
    methodNotAllowed,
    redirect,
    serverError,
} from '@account-service/shared';
import type { GoogleOAuthClient, HttpHandler } from '@account-service/shared';

export function createAuthorizeHandler(
    getClient: () => GoogleOAuthClient = getGoogleOAuthClient
): HttpHandler {
    return async (event: APIGatewayProxyEventV2, context: Context) => {
        const log = createLogger(event, context);

        try {
            if (event.requestContext.http.method !== 'GET') {
                return methodNotAllowed(['GET']);
            }

            const redirectUri = event.queryStringParameters?.redirect_uri;
            if (redirectUri !== undefined && !isValidRedirectUri(redirectUri)) {
                return invalidRequest('redirect_uri must be an absolute http(s) URL');
            }

            const { url } = getClient().buildAuthorizationRequest(redirectUri);
            log.info('Redirecting to Google consent screen');
            return redirect(url);
        } catch (err) {
            if (isConfigurationError(err)) {
                log.error('Google sign-in is not configured', { setting: err.setting });
                return configurationError();
            }
            log.error('Authorize handler error', describeError(err));
            return serverError();
        }
    };
}

export const handler = createAuthorizeHandler();

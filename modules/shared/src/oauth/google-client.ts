/**
 * Account Service - Google OAuth Exchange Client
 *
 * Builds the authorization redirect, redeems authorization codes at the token
 * endpoint and fetches the user's profile. Holds no per-attempt state.
 *
 * Failure mapping:
 * - `invalid_grant` from the token endpoint → invalid_grant (user must restart login)
 * - request exceeded `timeoutMs` → network_timeout
 * - any other non-2xx, transport error or unusable body → exchange_failed / profile_fetch_failed
 *
 * Missing client credentials throw ConfigurationError; they are a deployment
 * fault, not a per-request outcome.
 *
 * @see RFC 6749 Section 4.1 - Authorization Code Grant
 * @see https://developers.google.com/identity/protocols/oauth2/web-server
 */

import type { ExternalProfile, OAuthTokenSet } from '../../../shared_types/session';
import type { GoogleConfig } from '../config';
import { generateSecureRandom } from '../crypto';
import { ConfigurationError } from '../errors/configuration-error';
import { ErrorMessages } from '../errors/error-messages';
import { err, ok } from '../result';
import type { Result } from '../result';
import { normalizeRedirectUri } from '../validation/redirect-uri';
import type { AuthorizationRequest, FetchLike, OAuthFailure } from './types';

// =============================================================================
// Constants
// =============================================================================

export const GOOGLE_SCOPES = [
    'openid',
    'https://www.googleapis.com/auth/userinfo.email',
    'https://www.googleapis.com/auth/userinfo.profile',
] as const;

/** Bytes of entropy in the state parameter */
const STATE_BYTES = 16;

interface ClientCredentials {
    clientId: string;
    clientSecret: string;
}

// =============================================================================
// Client
// =============================================================================

export class GoogleOAuthClient {
    private readonly config: GoogleConfig;
    private readonly fetchImpl: FetchLike;

    constructor(config: GoogleConfig, fetchImpl: FetchLike = fetch) {
        this.config = config;
        this.fetchImpl = fetchImpl;
    }

    /**
     * @throws ConfigurationError when client id or secret is unset
     */
    assertConfigured(): ClientCredentials {
        const { clientId, clientSecret } = this.config;
        if (!clientId) {
            throw new ConfigurationError('GOOGLE_CLIENT_ID');
        }
        if (!clientSecret) {
            throw new ConfigurationError('GOOGLE_CLIENT_SECRET');
        }
        return { clientId, clientSecret };
    }

    /**
     * Redirect URI used for both legs of the flow, trailing slashes stripped.
     */
    resolveRedirectUri(redirectUri?: string): string {
        return normalizeRedirectUri(redirectUri || this.config.redirectUri);
    }

    /**
     * Build the provider URL that starts a login.
     */
    buildAuthorizationRequest(redirectUri?: string): AuthorizationRequest {
        const { clientId } = this.assertConfigured();
        const state = generateSecureRandom(STATE_BYTES);

        const url = new URL(this.config.authUrl);
        url.searchParams.set('response_type', 'code');
        url.searchParams.set('client_id', clientId);
        url.searchParams.set('redirect_uri', this.resolveRedirectUri(redirectUri));
        url.searchParams.set('scope', GOOGLE_SCOPES.join(' '));
        url.searchParams.set('state', state);

        return { url: url.toString(), state };
    }

    /**
     * Redeem an authorization code. A code can be redeemed once; a second
     * attempt yields invalid_grant.
     */
    async exchangeCode(code: string, redirectUri?: string): Promise<Result<OAuthTokenSet, OAuthFailure>> {
        const { clientId, clientSecret } = this.assertConfigured();

        const form = new URLSearchParams({
            grant_type: 'authorization_code',
            code,
            client_id: clientId,
            client_secret: clientSecret,
            redirect_uri: this.resolveRedirectUri(redirectUri),
        });

        let response: Response;
        let body: unknown;
        try {
            response = await this.fetchImpl(this.config.tokenUrl, {
                method: 'POST',
                headers: {
                    'Content-Type': 'application/x-www-form-urlencoded',
                    Accept: 'application/json',
                },
                body: form.toString(),
                signal: AbortSignal.timeout(this.config.timeoutMs),
            });
            body = await readJson(response);
        } catch (error) {
            return err(transportFailure('exchange_failed', error));
        }

        if (!response.ok) {
            if (isRecord(body) && body.error === 'invalid_grant') {
                return err({
                    kind: 'invalid_grant',
                    message: ErrorMessages.INVALID_GRANT,
                    detail: `token endpoint returned ${response.status} invalid_grant`,
                });
            }
            return err({
                kind: 'exchange_failed',
                message: ErrorMessages.AUTHENTICATION_FAILED,
                detail: `token endpoint returned ${response.status}${describeProviderError(body)}`,
            });
        }

        const tokens = toTokenSet(body);
        if (!tokens) {
            return err({
                kind: 'exchange_failed',
                message: ErrorMessages.AUTHENTICATION_FAILED,
                detail: 'token response missing access_token or id_token',
            });
        }

        return ok(tokens);
    }

    /**
     * Fetch the signed-in user's profile with a provider access token.
     */
    async fetchProfile(accessToken: string): Promise<Result<ExternalProfile, OAuthFailure>> {
        let response: Response;
        let body: unknown;
        try {
            response = await this.fetchImpl(this.config.userinfoUrl, {
                method: 'GET',
                headers: {
                    Authorization: `Bearer ${accessToken}`,
                    Accept: 'application/json',
                },
                signal: AbortSignal.timeout(this.config.timeoutMs),
            });
            body = await readJson(response);
        } catch (error) {
            return err(transportFailure('profile_fetch_failed', error));
        }

        if (!response.ok) {
            return err({
                kind: 'profile_fetch_failed',
                message: ErrorMessages.AUTHENTICATION_FAILED,
                detail: `userinfo endpoint returned ${response.status}`,
            });
        }

        const profile = toProfile(body);
        if (!profile) {
            return err({
                kind: 'profile_fetch_failed',
                message: ErrorMessages.AUTHENTICATION_FAILED,
                detail: 'userinfo response missing email',
            });
        }

        return ok(profile);
    }
}

// =============================================================================
// Response Parsing
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a JSON body; a non-JSON body becomes null rather than an error so the
 * status code still decides the outcome.
 */
async function readJson(response: Response): Promise<unknown> {
    const text = await response.text();
    if (text.length === 0) {
        return null;
    }
    try {
        const parsed: unknown = JSON.parse(text);
        return parsed;
    } catch {
        return null;
    }
}

function toTokenSet(body: unknown): OAuthTokenSet | null {
    if (!isRecord(body)) {
        return null;
    }
    const { access_token, id_token, refresh_token } = body;
    if (typeof access_token !== 'string' || access_token.length === 0) {
        return null;
    }
    if (typeof id_token !== 'string' || id_token.length === 0) {
        return null;
    }

    const tokens: OAuthTokenSet = { accessToken: access_token, idToken: id_token };
    if (typeof refresh_token === 'string') {
        tokens.refreshToken = refresh_token;
    }
    return tokens;
}

function toProfile(body: unknown): ExternalProfile | null {
    if (!isRecord(body)) {
        return null;
    }
    const { email, given_name, family_name } = body;
    if (typeof email !== 'string' || email.length === 0) {
        return null;
    }
    return {
        email,
        givenName: typeof given_name === 'string' ? given_name : '',
        familyName: typeof family_name === 'string' ? family_name : '',
    };
}

function describeProviderError(body: unknown): string {
    if (isRecord(body) && typeof body.error === 'string') {
        return ` ${body.error}`;
    }
    return '';
}

// =============================================================================
// Transport Errors
// =============================================================================

/** AbortSignal.timeout rejects fetch with a DOMException named TimeoutError */
function isTimeout(error: unknown): boolean {
    return isRecord(error) && error.name === 'TimeoutError';
}

function transportFailure(
    kind: 'exchange_failed' | 'profile_fetch_failed',
    error: unknown
): OAuthFailure {
    if (isTimeout(error)) {
        return {
            kind: 'network_timeout',
            message: ErrorMessages.NETWORK_TIMEOUT,
            detail: 'identity provider request timed out',
        };
    }
    return {
        kind,
        message: ErrorMessages.AUTHENTICATION_FAILED,
        detail: error instanceof Error ? error.message : String(error),
    };
}

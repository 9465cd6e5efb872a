/**
 * Account Service - Redirect URI Normalization
 *
 * The redirect URI sent in the authorization request and the one sent in the
 * token exchange must be byte-identical, or Google answers
 * `redirect_uri_mismatch`. Both pass through this function.
 */

/**
 * Strip trailing slashes and surrounding whitespace.
 *
 * @example
 * ```typescript
 * normalizeRedirectUri('http://localhost:8001/auth/google/callback//') // 'http://localhost:8001/auth/google/callback'
 * ```
 */
export function normalizeRedirectUri(uri: string): string {
    return uri.trim().replace(/\/+$/, '');
}

/**
 * Absolute http(s) URL check for caller-supplied redirect URIs.
 */
export function isValidRedirectUri(uri: unknown): uri is string {
    if (typeof uri !== 'string' || uri.trim().length === 0) {
        return false;
    }

    try {
        const parsed = new URL(uri.trim());
        return parsed.protocol === 'https:' || parsed.protocol === 'http:';
    } catch {
        return false;
    }
}

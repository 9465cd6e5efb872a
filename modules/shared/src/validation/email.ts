/**
 * Account Service - Email Validation
 *
 * Format checks for registration and login input. The directory matches
 * emails exactly as stored, so callers only trim before passing them on.
 *
 * @see RFC 5321 Section 4.5.3.1 - Size limits
 */

// =============================================================================
// Constants
// =============================================================================

/** Column limit of the user table; tighter than RFC 5321's 254 */
export const MAX_EMAIL_LENGTH = 255;

/** Maximum local part length per RFC 5321 Section 4.5.3.1.1 */
const MAX_LOCAL_PART_LENGTH = 64;

/**
 * Local part: letters, digits and `._+-`, not starting with a separator.
 * Domain: dot-separated labels without leading/trailing hyphens, alphabetic TLD.
 */
const EMAIL_REGEX = /^[a-zA-Z0-9][a-zA-Z0-9._+-]*@[a-zA-Z0-9](?:[a-zA-Z0-9-]*[a-zA-Z0-9])?(?:\.[a-zA-Z0-9](?:[a-zA-Z0-9-]*[a-zA-Z0-9])?)*\.[a-zA-Z]{2,}$/;

// =============================================================================
// Email Validation
// =============================================================================

/**
 * Validate an email address. Surrounding whitespace is tolerated.
 *
 * @example
 * ```typescript
 * if (isValidEmail(body.email)) {
 *   // body.email is string here
 * }
 * ```
 */
export function isValidEmail(email: unknown): email is string {
    if (typeof email !== 'string' || email.length > MAX_EMAIL_LENGTH) {
        return false;
    }

    const trimmed = email.trim();
    const atIndex = trimmed.lastIndexOf('@');
    if (atIndex <= 0) {
        return false;
    }

    const localPart = trimmed.slice(0, atIndex);
    if (localPart.length > MAX_LOCAL_PART_LENGTH || localPart.includes('..') || localPart.endsWith('.')) {
        return false;
    }

    return EMAIL_REGEX.test(trimmed);
}

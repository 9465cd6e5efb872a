/**
 * Account Service - Password Login Input Validation
 *
 * Presence and format checks only; whether the credentials are correct is
 * the session issuer's decision.
 */

import { ErrorMessages, isValidEmail } from '@account-service/shared';
import type { LoginRequestValidation } from './types';

/** Upper bound on accepted password length, well above any real password */
export const MAX_PASSWORD_LENGTH = 1024;

export function validateLoginRequest(body: Record<string, unknown>): LoginRequestValidation {
    const { email, password } = body;

    if (typeof email !== 'string' || typeof password !== 'string' || email.length === 0 || password.length === 0) {
        return { valid: false, error: ErrorMessages.MISSING_CREDENTIALS };
    }
    if (!isValidEmail(email)) {
        return { valid: false, error: 'email must be a valid email address' };
    }
    if (password.length > MAX_PASSWORD_LENGTH) {
        return { valid: false, error: `password must be at most ${MAX_PASSWORD_LENGTH} characters` };
    }

    return { valid: true, request: { email: email.trim(), password } };
}

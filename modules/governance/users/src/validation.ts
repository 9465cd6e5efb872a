/**
 * User Management - Request Validation
 *
 * Field limits follow the column sizes of the users table:
 * first_name/last_name 100, email 255.
 *
 * @module governance/users/validation
 */

import { MAX_EMAIL_LENGTH, err, isValidEmail, ok } from '@account-service/shared';
import type { Result } from '@account-service/shared';
import type { FilterValidation, RequestValidation, UserCreateRequest, UserUpdateRequest } from './types';

// =============================================================================
// Constants
// =============================================================================

export const MAX_NAME_LENGTH = 100;

/** Upper bound on plaintext passwords accepted for hashing */
export const MAX_PASSWORD_LENGTH = 1024;

type FieldResult<T> = Result<T, string>;

// =============================================================================
// Field Parsers
// =============================================================================

function parseFirstName(value: unknown): FieldResult<string> {
    if (typeof value !== 'string' || value.trim() === '') {
        return err('first_name is required');
    }
    if (value.length > MAX_NAME_LENGTH) {
        return err(`first_name must be at most ${MAX_NAME_LENGTH} characters`);
    }
    return ok(value.trim());
}

/** Absent, null, empty or whitespace-only last names become null */
function parseLastName(value: unknown): FieldResult<string | null> {
    if (value === undefined || value === null) {
        return ok(null);
    }
    if (typeof value !== 'string') {
        return err('last_name must be a string');
    }
    if (value.length > MAX_NAME_LENGTH) {
        return err(`last_name must be at most ${MAX_NAME_LENGTH} characters`);
    }
    return ok(value.trim() === '' ? null : value.trim());
}

function parseEmail(value: unknown): FieldResult<string> {
    if (typeof value === 'string' && value.length > MAX_EMAIL_LENGTH) {
        return err(`email must be at most ${MAX_EMAIL_LENGTH} characters`);
    }
    if (!isValidEmail(value)) {
        return err('email must be a valid email address');
    }
    return ok(value.trim());
}

function parsePassword(value: unknown): FieldResult<string> {
    if (typeof value !== 'string' || value === '') {
        return err('password is required');
    }
    if (value.length > MAX_PASSWORD_LENGTH) {
        return err(`password must be at most ${MAX_PASSWORD_LENGTH} characters`);
    }
    return ok(value);
}

// =============================================================================
// Request Validators
// =============================================================================

/**
 * Validate a POST /users body: first_name, email and password are required.
 */
export function validateCreateUser(body: Record<string, unknown>): RequestValidation<UserCreateRequest> {
    const firstName = parseFirstName(body.first_name);
    if (!firstName.ok) return { valid: false, error: firstName.error };

    const lastName = parseLastName(body.last_name);
    if (!lastName.ok) return { valid: false, error: lastName.error };

    const email = parseEmail(body.email);
    if (!email.ok) return { valid: false, error: email.error };

    const password = parsePassword(body.password);
    if (!password.ok) return { valid: false, error: password.error };

    return {
        valid: true,
        request: {
            firstName: firstName.value,
            lastName: lastName.value,
            email: email.value,
            password: password.value,
        },
    };
}

/**
 * Validate a PUT /users/{id} body. Every field is optional; `last_name: null`
 * clears the last name.
 */
export function validateUpdateUser(body: Record<string, unknown>): RequestValidation<UserUpdateRequest> {
    const request: UserUpdateRequest = {};

    if (body.first_name !== undefined) {
        const firstName = parseFirstName(body.first_name);
        if (!firstName.ok) return { valid: false, error: firstName.error };
        request.firstName = firstName.value;
    }

    if (body.last_name !== undefined) {
        const lastName = parseLastName(body.last_name);
        if (!lastName.ok) return { valid: false, error: lastName.error };
        request.lastName = lastName.value;
    }

    if (body.email !== undefined) {
        const email = parseEmail(body.email);
        if (!email.ok) return { valid: false, error: email.error };
        request.email = email.value;
    }

    if (body.password !== undefined) {
        const password = parsePassword(body.password);
        if (!password.ok) return { valid: false, error: password.error };
        request.password = password.value;
    }

    return { valid: true, request };
}

/**
 * Parse GET /users query parameters into a directory filter.
 * `is_deleted` accepts only "true" or "false".
 */
export function parseUserFilter(query: Record<string, string | undefined>): FilterValidation {
    const { first_name, last_name, email, is_deleted } = query;

    let isDeleted: boolean | undefined;
    if (is_deleted !== undefined) {
        if (is_deleted !== 'true' && is_deleted !== 'false') {
            return { valid: false, error: 'is_deleted must be true or false' };
        }
        isDeleted = is_deleted === 'true';
    }

    return {
        valid: true,
        filter: {
            firstName: first_name,
            lastName: last_name,
            email,
            isDeleted,
        },
    };
}

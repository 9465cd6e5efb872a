/**
 * Account Service - User Field Helpers
 *
 * Shared by both directory implementations:
 * - list filters: text fields match case-insensitive substrings, `isDeleted` is exact
 * - partial updates: undefined fields are left untouched
 */

import type { UpdateUserFields, UserFilter, UserRecord } from '../../../shared_types/user';

function containsIgnoreCase(haystack: string | null, needle: string | undefined): boolean {
    if (needle === undefined || needle === '') {
        return true;
    }
    return haystack !== null && haystack.toLowerCase().includes(needle.toLowerCase());
}

export function matchesUserFilter(record: UserRecord, filter: UserFilter = {}): boolean {
    if (filter.isDeleted !== undefined && record.isDeleted !== filter.isDeleted) {
        return false;
    }
    return (
        containsIgnoreCase(record.firstName, filter.firstName) &&
        containsIgnoreCase(record.lastName, filter.lastName) &&
        containsIgnoreCase(record.email, filter.email)
    );
}

/**
 * Drop keys whose value is undefined so a partial update leaves them untouched.
 * `lastName: null` is kept: it clears the field.
 */
export function definedFields(fields: UpdateUserFields): UpdateUserFields {
    const result: UpdateUserFields = {};
    if (fields.email !== undefined) result.email = fields.email;
    if (fields.firstName !== undefined) result.firstName = fields.firstName;
    if (fields.lastName !== undefined) result.lastName = fields.lastName;
    if (fields.passwordHash !== undefined) result.passwordHash = fields.passwordHash;
    return result;
}

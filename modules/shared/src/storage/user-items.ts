/**
 * Account Service - User Item Mapping
 *
 * Key builders and conversions between DynamoDB items and UserRecord.
 *
 * Key Pattern:
 *   Profile:    PK=USER#<id>     SK=PROFILE  GSI1PK=EMAIL#<email>  GSI1SK=USER | DELETED#<deletedAt>
 *   Email lock: PK=EMAIL#<email>  SK=USER
 *
 * Emails are keyed exactly as stored; differing case means a different key.
 *
 * @module storage/user-items
 */

import type { EmailLockItem, UserItem, UserRecord } from '../../../shared_types/user';

// =============================================================================
// Keys
// =============================================================================

export const USER_PROFILE_SK = 'PROFILE';
export const EMAIL_LOCK_SK = 'USER';
export const ACTIVE_GSI1SK = 'USER';

export function userKey(id: string): { PK: `USER#${string}`; SK: 'PROFILE' } {
    return { PK: `USER#${id}`, SK: USER_PROFILE_SK };
}

export function emailKey(email: string): { PK: `EMAIL#${string}`; SK: 'USER' } {
    return { PK: `EMAIL#${email}`, SK: EMAIL_LOCK_SK };
}

export function emailIndexKey(email: string): `EMAIL#${string}` {
    return `EMAIL#${email}`;
}

// =============================================================================
// Record → Item
// =============================================================================

export function toUserItem(record: UserRecord): UserItem {
    return {
        ...userKey(record.id),
        entityType: 'USER',
        GSI1PK: emailIndexKey(record.email),
        GSI1SK: record.isDeleted && record.deletedAt ? `DELETED#${record.deletedAt}` : ACTIVE_GSI1SK,
        id: record.id,
        email: record.email,
        firstName: record.firstName,
        lastName: record.lastName,
        passwordHash: record.passwordHash,
        isDeleted: record.isDeleted,
        deletedAt: record.deletedAt,
        createdAt: record.createdAt,
        updatedAt: record.updatedAt,
    };
}

export function toEmailLockItem(email: string, userId: string, createdAt: string): EmailLockItem {
    return {
        ...emailKey(email),
        entityType: 'EMAIL_LOCK',
        userId,
        createdAt,
    };
}

// =============================================================================
// Item → Record
// =============================================================================

function isNullableString(value: unknown): value is string | null {
    return value === null || value === undefined || typeof value === 'string';
}

/**
 * Runtime check that a raw DynamoDB item is a user profile.
 * Returns null for lock items and for profiles missing required attributes.
 */
export function toUserRecord(item: Record<string, unknown> | undefined): UserRecord | null {
    if (!item || item.entityType !== 'USER') {
        return null;
    }

    const { id, email, firstName, lastName, passwordHash, isDeleted, deletedAt, createdAt, updatedAt } = item;

    if (
        typeof id !== 'string' ||
        typeof email !== 'string' ||
        typeof firstName !== 'string' ||
        typeof passwordHash !== 'string' ||
        typeof createdAt !== 'string' ||
        typeof updatedAt !== 'string'
    ) {
        return null;
    }
    if (!isNullableString(lastName) || !isNullableString(deletedAt)) {
        return null;
    }

    return {
        id,
        email,
        firstName,
        lastName: lastName ?? null,
        passwordHash,
        isDeleted: isDeleted === true,
        deletedAt: deletedAt ?? null,
        createdAt,
        updatedAt,
    };
}

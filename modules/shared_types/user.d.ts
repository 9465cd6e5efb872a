/**
 * Account Service - User Entity Types
 *
 * User profile records, the DynamoDB items that store them, and the
 * JSON view returned by the user management endpoints.
 *
 * Key Pattern:
 *   PK: USER#<id>
 *   SK: PROFILE
 *   GSI1PK: EMAIL#<email>
 *   GSI1SK: USER (active) | DELETED#<deletedAt> (soft-deleted)
 *
 * Email uniqueness lock:
 *   PK: EMAIL#<email>
 *   SK: USER
 */

import type { BaseItem } from './base';

// =============================================================================
// Directory Record
// =============================================================================

/**
 * A user profile as the rest of the service sees it.
 * At most one non-deleted record exists per email (compared exactly).
 */
export interface UserRecord {
    id: string;
    /** Email as supplied at registration; matched exactly, case included */
    email: string;
    firstName: string;
    lastName: string | null;
    /** Argon2id PHC string, or the OAuth sentinel for Google-provisioned users */
    passwordHash: string;
    isDeleted: boolean;
    /** ISO 8601, set once on soft delete */
    deletedAt: string | null;
    createdAt: string;
    updatedAt: string;
}

export interface CreateUserFields {
    email: string;
    firstName: string;
    lastName?: string | null;
    passwordHash: string;
}

export interface UpdateUserFields {
    email?: string;
    firstName?: string;
    lastName?: string | null;
    passwordHash?: string;
}

/** Case-insensitive substring filters; `isDeleted` matches exactly */
export interface UserFilter {
    firstName?: string;
    lastName?: string;
    email?: string;
    isDeleted?: boolean;
}

// =============================================================================
// DynamoDB Items
// =============================================================================

export interface UserItem extends BaseItem {
    PK: `USER#${string}`;
    SK: 'PROFILE';
    entityType: 'USER';
    GSI1PK: `EMAIL#${string}`;
    GSI1SK: 'USER' | `DELETED#${string}`;

    id: string;
    email: string;
    firstName: string;
    lastName: string | null;
    passwordHash: string;
    isDeleted: boolean;
    deletedAt: string | null;
    updatedAt: string;
}

/** Holds an email while a non-deleted user owns it */
export interface EmailLockItem extends BaseItem {
    PK: `EMAIL#${string}`;
    SK: 'USER';
    entityType: 'EMAIL_LOCK';
    userId: string;
}

// =============================================================================
// API View
// =============================================================================

/** JSON shape of a user on the wire. The password hash is never included. */
export interface UserView {
    user_id: string;
    first_name: string;
    last_name: string | null;
    email: string;
    is_deleted: boolean;
    deleted_at: string | null;
    created_at: string;
    updated_at: string;
}

/**
 * Account Service - User Directory Port
 *
 * The persistence collaborator consumed by the session issuer and the user
 * management handlers. Every method reports expected failures as values;
 * implementations convert driver exceptions into `unavailable`.
 *
 * @module storage/types
 */

import type {
    CreateUserFields,
    UpdateUserFields,
    UserFilter,
    UserRecord,
} from '../../../shared_types/user';
import type { Result } from '../result';

// =============================================================================
// Failures
// =============================================================================

export type DirectoryFailureKind =
    /** Backend unreachable, throttled past retries, or returned an unexpected error */
    | 'unavailable'
    /** A non-deleted record already holds the email */
    | 'conflict'
    | 'not_found'
    /** The record exists but is soft-deleted */
    | 'deleted';

export interface DirectoryFailure {
    kind: DirectoryFailureKind;
    /** Internal description, for logs */
    message: string;
}

export type DirectoryResult<T> = Result<T, DirectoryFailure>;

// =============================================================================
// Directory Port
// =============================================================================

export interface FindByEmailOptions {
    /** Also match soft-deleted records; the most recently created wins */
    includeDeleted?: boolean;
}

export interface UserDirectory {
    /** Exact, case-sensitive match on the stored email; non-deleted only unless asked */
    findByEmail(email: string, options?: FindByEmailOptions): Promise<DirectoryResult<UserRecord | null>>;

    /** Includes soft-deleted records */
    findById(id: string): Promise<DirectoryResult<UserRecord | null>>;

    create(fields: CreateUserFields): Promise<DirectoryResult<UserRecord>>;

    update(id: string, fields: UpdateUserFields): Promise<DirectoryResult<UserRecord>>;

    softDelete(id: string): Promise<DirectoryResult<void>>;

    list(filter?: UserFilter): Promise<DirectoryResult<UserRecord[]>>;
}

// =============================================================================
// Storage Configuration
// =============================================================================

export interface DynamoDirectoryConfig {
    /** DynamoDB table name (injected from environment) */
    tableName: string;
    /** Timestamp source; defaults to the system clock */
    clock?: () => Date;
}

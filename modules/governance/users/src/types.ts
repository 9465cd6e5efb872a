/**
 * User Management - Types
 *
 * @module governance/users/types
 */

import type { AuditLogger, Logger, SecretHasher, UserDirectory } from '@account-service/shared';
import type { UpdateUserFields, UserFilter } from '../../../shared_types/user';

// =============================================================================
// Validated Requests
// =============================================================================

/** POST /users body after validation; the password is still plaintext */
export interface UserCreateRequest {
    firstName: string;
    lastName: string | null;
    email: string;
    password: string;
}

/** PUT /users/{id} body after validation; absent keys are left untouched */
export interface UserUpdateRequest extends Omit<UpdateUserFields, 'passwordHash'> {
    password?: string;
}

export type RequestValidation<T> =
    | { valid: true; request: T }
    | { valid: false; error: string };

export type FilterValidation =
    | { valid: true; filter: UserFilter }
    | { valid: false; error: string };

// =============================================================================
// Handler Dependencies
// =============================================================================

export interface UsersDeps {
    directory: UserDirectory;
    hasher: SecretHasher;
}

/** Per-request loggers */
export interface RequestScope {
    log: Logger;
    audit: AuditLogger;
}

/**
 * User Management - Entity Mapper
 *
 * Maps directory records to the JSON view. The password hash never leaves here.
 *
 * @module governance/users/mapper
 */

import type { UpdateUserFields, UserRecord, UserView } from '../../../shared_types/user';
import type { UserUpdateRequest } from './types';

export function toUserView(record: UserRecord): UserView {
    return {
        user_id: record.id,
        first_name: record.firstName,
        last_name: record.lastName,
        email: record.email,
        is_deleted: record.isDeleted,
        deleted_at: record.deletedAt,
        created_at: record.createdAt,
        updated_at: record.updatedAt,
    };
}

/**
 * Wire names of the fields present in an update, for the audit trail.
 */
export function updatedFieldNames(request: UserUpdateRequest): string[] {
    const names: string[] = [];
    if (request.firstName !== undefined) names.push('first_name');
    if (request.lastName !== undefined) names.push('last_name');
    if (request.email !== undefined) names.push('email');
    if (request.password !== undefined) names.push('password');
    return names;
}

/**
 * Directory update fields; a new password arrives already hashed.
 */
export function toUpdateFields(request: UserUpdateRequest, passwordHash?: string): UpdateUserFields {
    const fields: UpdateUserFields = {
        firstName: request.firstName,
        lastName: request.lastName,
        email: request.email,
    };
    if (passwordHash !== undefined) {
        fields.passwordHash = passwordHash;
    }
    return fields;
}

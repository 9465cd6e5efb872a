/**
 * User Management - DELETE /users/{id}
 *
 * Soft delete: the record stays readable with is_deleted: true and its email
 * becomes free for a new registration.
 *
 * @module governance/users/delete-user
 */

import type { APIGatewayProxyResultV2 } from 'aws-lambda';
import { ErrorMessages, directoryFailure, noContent } from '@account-service/shared';
import type { RequestScope, UsersDeps } from './types';

export async function handleDeleteUser(
    userId: string,
    deps: UsersDeps,
    scope: RequestScope
): Promise<APIGatewayProxyResultV2> {
    const result = await deps.directory.softDelete(userId);
    if (!result.ok) {
        scope.log.warn('User delete rejected', { userId, kind: result.error.kind, reason: result.error.message });
        return directoryFailure(result.error, ErrorMessages.USER_ALREADY_DELETED);
    }

    scope.audit.userDeleted({ type: 'ANONYMOUS' }, userId);

    return noContent();
}

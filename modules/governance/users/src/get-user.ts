/**
 * User Management - GET /users/{id}
 *
 * Soft-deleted users are returned with is_deleted: true.
 *
 * @module governance/users/get-user
 */

import type { APIGatewayProxyResultV2 } from 'aws-lambda';
import { ErrorMessages, directoryFailure, notFound, success } from '@account-service/shared';
import type { RequestScope, UsersDeps } from './types';
import { toUserView } from './mapper';

export async function handleGetUser(
    userId: string,
    deps: UsersDeps,
    scope: RequestScope
): Promise<APIGatewayProxyResultV2> {
    const result = await deps.directory.findById(userId);
    if (!result.ok) {
        scope.log.warn('Directory lookup failed', { userId, kind: result.error.kind, reason: result.error.message });
        return directoryFailure(result.error, ErrorMessages.USER_NOT_FOUND);
    }

    if (!result.value) {
        return notFound();
    }

    return success(toUserView(result.value));
}

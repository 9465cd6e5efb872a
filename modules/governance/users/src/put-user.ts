/**
 * User Management - PUT /users/{id}
 *
 * Partial update: only the fields present in the body change. A new password
 * is hashed before it reaches the directory.
 *
 * Errors:
 * - 404 unknown id
 * - 400 the user is soft-deleted
 * - 409 the new email belongs to another active user
 *
 * @module governance/users/put-user
 */

import type { APIGatewayProxyResultV2 } from 'aws-lambda';
import { ErrorMessages, directoryFailure, invalidRequest, success } from '@account-service/shared';
import type { RequestScope, UsersDeps } from './types';
import { validateUpdateUser } from './validation';
import { toUpdateFields, toUserView, updatedFieldNames } from './mapper';

export async function handlePutUser(
    userId: string,
    body: Record<string, unknown>,
    deps: UsersDeps,
    scope: RequestScope
): Promise<APIGatewayProxyResultV2> {
    const validation = validateUpdateUser(body);
    if (!validation.valid) {
        return invalidRequest(validation.error);
    }

    const request = validation.request;
    const passwordHash = request.password === undefined ? undefined : await deps.hasher.hash(request.password);

    const result = await deps.directory.update(userId, toUpdateFields(request, passwordHash));
    if (!result.ok) {
        scope.log.warn('User update rejected', { userId, kind: result.error.kind, reason: result.error.message });
        return directoryFailure(result.error, ErrorMessages.USER_DELETED_UPDATE);
    }

    scope.audit.userUpdated({ type: 'ANONYMOUS' }, {
        userId,
        updatedFields: updatedFieldNames(request),
    });

    return success(toUserView(result.value));
}

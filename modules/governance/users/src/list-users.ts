/**
 * User Management - GET /users
 *
 * Lists users, optionally filtered by case-insensitive substrings of
 * first_name, last_name and email, and by exact is_deleted.
 *
 * @module governance/users/list-users
 */

import type { APIGatewayProxyResultV2 } from 'aws-lambda';
import { ErrorMessages, directoryFailure, invalidRequest, success } from '@account-service/shared';
import type { RequestScope, UsersDeps } from './types';
import { parseUserFilter } from './validation';
import { toUserView } from './mapper';

export async function handleListUsers(
    query: Record<string, string | undefined>,
    deps: UsersDeps,
    scope: RequestScope
): Promise<APIGatewayProxyResultV2> {
    const parsed = parseUserFilter(query);
    if (!parsed.valid) {
        return invalidRequest(parsed.error);
    }

    const result = await deps.directory.list(parsed.filter);
    if (!result.ok) {
        scope.log.warn('Directory list failed', { kind: result.error.kind, reason: result.error.message });
        return directoryFailure(result.error, ErrorMessages.USER_NOT_FOUND);
    }

    return success(result.value.map(toUserView));
}

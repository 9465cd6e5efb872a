/**
 * User Management - POST /users
 *
 * Registers a user with a password.
 *
 * Flow:
 * 1. Validate the body (first_name, email, password required)
 * 2. Hash the password with Argon2id
 * 3. Create the directory record (409 when the email is taken)
 * 4. Return 201 with the user view
 *
 * @module governance/users/post-user
 */

import type { APIGatewayProxyResultV2 } from 'aws-lambda';
import { ErrorMessages, created, directoryFailure, invalidRequest } from '@account-service/shared';
import type { RequestScope, UsersDeps } from './types';
import { validateCreateUser } from './validation';
import { toUserView } from './mapper';

export async function handlePostUser(
    body: Record<string, unknown>,
    deps: UsersDeps,
    scope: RequestScope
): Promise<APIGatewayProxyResultV2> {
    const validation = validateCreateUser(body);
    if (!validation.valid) {
        return invalidRequest(validation.error);
    }

    const { password, ...profile } = validation.request;
    const passwordHash = await deps.hasher.hash(password);

    const result = await deps.directory.create({ ...profile, passwordHash });
    if (!result.ok) {
        scope.log.warn('User registration rejected', { kind: result.error.kind, reason: result.error.message });
        return directoryFailure(result.error, ErrorMessages.USER_NOT_FOUND);
    }

    scope.audit.userProvisioned({ type: 'ANONYMOUS' }, {
        userId: result.value.id,
        method: 'password',
    });

    return created(toUserView(result.value));
}

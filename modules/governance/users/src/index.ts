/**
 * User Management - Lambda Handler
 *
 * Routes the user resource endpoints:
 * - GET /users - List users (substring filters, is_deleted)
 * - POST /users - Register a user with a password
 * - GET /users/{id} - Read a user
 * - PUT /users/{id} - Partially update a user
 * - DELETE /users/{id} - Soft-delete a user
 *
 * Passwords are hashed with Argon2id before they reach the directory and are
 * never returned.
 *
 * @module governance/users
 */

import type { APIGatewayProxyEventV2, APIGatewayProxyResultV2, Context } from 'aws-lambda';
import {
    ErrorMessages,
    createLogger,
    describeError,
    getSecretHasher,
    getUserDirectory,
    invalidRequest,
    methodNotAllowed,
    parseJsonBody,
    serverError,
    withContext,
} from '@account-service/shared';
import type { HttpHandler } from '@account-service/shared';
import type { RequestScope, UsersDeps } from './types';
import { handleListUsers } from './list-users';
import { handleGetUser } from './get-user';
import { handlePostUser } from './post-user';
import { handlePutUser } from './put-user';
import { handleDeleteUser } from './delete-user';

export { toUserView } from './mapper';
export { validateCreateUser, validateUpdateUser, parseUserFilter } from './validation';
export type { UsersDeps } from './types';

const COLLECTION_METHODS = ['GET', 'POST'];
const ITEM_METHODS = ['GET', 'PUT', 'DELETE'];

function defaultDeps(): UsersDeps {
    return {
        directory: getUserDirectory(),
        hasher: getSecretHasher(),
    };
}

async function route(
    event: APIGatewayProxyEventV2,
    deps: UsersDeps,
    scope: RequestScope
): Promise<APIGatewayProxyResultV2> {
    const method = event.requestContext.http.method;
    const userId = event.pathParameters?.id;

    if (userId === undefined) {
        switch (method) {
            case 'GET':
                return handleListUsers(event.queryStringParameters ?? {}, deps, scope);
            case 'POST': {
                const body = parseJsonBody(event);
                if (!body) {
                    return invalidRequest(ErrorMessages.INVALID_JSON);
                }
                return handlePostUser(body, deps, scope);
            }
            default:
                return methodNotAllowed(COLLECTION_METHODS);
        }
    }

    switch (method) {
        case 'GET':
            return handleGetUser(userId, deps, scope);
        case 'PUT': {
            const body = parseJsonBody(event);
            if (!body) {
                return invalidRequest(ErrorMessages.INVALID_JSON);
            }
            return handlePutUser(userId, body, deps, scope);
        }
        case 'DELETE':
            return handleDeleteUser(userId, deps, scope);
        default:
            return methodNotAllowed(ITEM_METHODS);
    }
}

export function createUsersHandler(getDeps: () => UsersDeps = defaultDeps): HttpHandler {
    return async (event: APIGatewayProxyEventV2, context: Context) => {
        const log = createLogger(event, context);
        const audit = withContext(event, context);

        try {
            log.info('Users request received', {
                method: event.requestContext.http.method,
                path: event.requestContext.http.path,
            });
            return await route(event, getDeps(), { log, audit });
        } catch (err) {
            log.error('Users handler error', describeError(err));
            return serverError();
        }
    };
}

export const handler = createUsersHandler();

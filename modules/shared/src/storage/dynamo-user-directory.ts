/**
 * Account Service - DynamoDB User Directory
 *
 * UserDirectory over the single table. Email uniqueness among non-deleted
 * users is enforced by a lock item written in the same transaction as the
 * profile, so two concurrent registrations cannot both succeed.
 *
 * Error handling:
 * - Transient SDK errors are retried (withRetry)
 * - A cancelled transaction on the lock item becomes `conflict`
 * - Anything else becomes `unavailable`; callers decide whether to degrade
 *
 * @module storage/dynamo-user-directory
 */

import { TransactionCanceledException } from '@aws-sdk/client-dynamodb';
import {
    GetCommand,
    QueryCommand,
    ScanCommand,
    TransactWriteCommand,
} from '@aws-sdk/lib-dynamodb';
import type { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import type {
    CreateUserFields,
    UpdateUserFields,
    UserFilter,
    UserRecord,
} from '../../../shared_types/user';
import { Logger } from '../audit-logger';
import { generateUserId } from '../crypto';
import { err, ok } from '../result';
import { DEFAULT_RETRY_CONFIG, withRetry } from './retry';
import type { RetryConfig } from './retry';
import type {
    DirectoryFailure,
    DirectoryResult,
    DynamoDirectoryConfig,
    FindByEmailOptions,
    UserDirectory,
} from './types';
import { definedFields, matchesUserFilter } from './user-fields';
import {
    ACTIVE_GSI1SK,
    emailIndexKey,
    emailKey,
    toEmailLockItem,
    toUserItem,
    toUserRecord,
    userKey,
} from './user-items';

export class DynamoUserDirectory implements UserDirectory {
    private readonly client: DynamoDBDocumentClient;
    private readonly tableName: string;
    private readonly clock: () => Date;
    private readonly log = new Logger('user-directory');

    constructor(client: DynamoDBDocumentClient, config: DynamoDirectoryConfig) {
        this.client = client;
        this.tableName = config.tableName;
        this.clock = config.clock ?? (() => new Date());
    }

    private retrying<T>(operation: string, call: () => Promise<T>): Promise<T> {
        const policy: RetryConfig = {
            ...DEFAULT_RETRY_CONFIG,
            onRetry: (error, attempt, delayMs) => {
                this.log.warn('Retrying DynamoDB call', {
                    operation,
                    attempt,
                    delayMs,
                    error: error instanceof Error ? error.name : String(error),
                });
            },
        };
        return withRetry(call, policy);
    }

    async findByEmail(email: string, options: FindByEmailOptions = {}): Promise<DirectoryResult<UserRecord | null>> {
        try {
            const result = await this.retrying('findByEmail', () => this.client.send(
                new QueryCommand({
                    TableName: this.tableName,
                    IndexName: 'GSI1',
                    KeyConditionExpression: options.includeDeleted
                        ? 'GSI1PK = :pk'
                        : 'GSI1PK = :pk AND GSI1SK = :sk',
                    ExpressionAttributeValues: options.includeDeleted
                        ? { ':pk': emailIndexKey(email) }
                        : { ':pk': emailIndexKey(email), ':sk': ACTIVE_GSI1SK },
                })
            ));

            const records = (result.Items ?? [])
                .map(item => toUserRecord(item))
                .filter((record): record is UserRecord => record !== null);

            return ok(pickPreferred(records));
        } catch (error) {
            return err(unavailable('findByEmail', error));
        }
    }

    async findById(id: string): Promise<DirectoryResult<UserRecord | null>> {
        try {
            const result = await this.retrying('findById', () => this.client.send(
                new GetCommand({
                    TableName: this.tableName,
                    Key: userKey(id),
                    ConsistentRead: true,
                })
            ));
            return ok(toUserRecord(result.Item));
        } catch (error) {
            return err(unavailable('findById', error));
        }
    }

    async create(fields: CreateUserFields): Promise<DirectoryResult<UserRecord>> {
        const now = this.clock().toISOString();
        const record: UserRecord = {
            id: generateUserId(),
            email: fields.email,
            firstName: fields.firstName,
            lastName: fields.lastName ?? null,
            passwordHash: fields.passwordHash,
            isDeleted: false,
            deletedAt: null,
            createdAt: now,
            updatedAt: now,
        };

        try {
            await this.retrying('create', () => this.client.send(
                new TransactWriteCommand({
                    TransactItems: [
                        {
                            Put: {
                                TableName: this.tableName,
                                Item: toEmailLockItem(record.email, record.id, now),
                                ConditionExpression: 'attribute_not_exists(PK)',
                            },
                        },
                        {
                            Put: {
                                TableName: this.tableName,
                                Item: toUserItem(record),
                                ConditionExpression: 'attribute_not_exists(PK)',
                            },
                        },
                    ],
                })
            ));
            return ok(record);
        } catch (error) {
            if (isConditionFailure(error, 0)) {
                return err({ kind: 'conflict', message: 'email already registered' });
            }
            return err(unavailable('create', error));
        }
    }

    async update(id: string, fields: UpdateUserFields): Promise<DirectoryResult<UserRecord>> {
        const current = await this.findExisting(id);
        if (!current.ok) {
            return current;
        }

        const previous = current.value;
        const updated: UserRecord = {
            ...previous,
            ...definedFields(fields),
            updatedAt: this.clock().toISOString(),
        };
        const emailChanged = updated.email !== previous.email;

        const profilePut = {
            Put: {
                TableName: this.tableName,
                Item: toUserItem(updated),
                ConditionExpression: 'attribute_exists(PK) AND isDeleted = :false',
                ExpressionAttributeValues: { ':false': false },
            },
        };

        const transactItems = emailChanged
            ? [
                {
                    Put: {
                        TableName: this.tableName,
                        Item: toEmailLockItem(updated.email, id, updated.updatedAt),
                        ConditionExpression: 'attribute_not_exists(PK)',
                    },
                },
                profilePut,
                {
                    Delete: {
                        TableName: this.tableName,
                        Key: emailKey(previous.email),
                    },
                },
            ]
            : [profilePut];

        try {
            await this.retrying('update', () => this.client.send(
                new TransactWriteCommand({ TransactItems: transactItems })
            ));
            return ok(updated);
        } catch (error) {
            if (emailChanged && isConditionFailure(error, 0)) {
                return err({ kind: 'conflict', message: 'email already registered' });
            }
            if (isConditionFailure(error, emailChanged ? 1 : 0)) {
                return err({ kind: 'deleted', message: `user ${id} was deleted concurrently` });
            }
            return err(unavailable('update', error));
        }
    }

    async softDelete(id: string): Promise<DirectoryResult<void>> {
        const current = await this.findExisting(id);
        if (!current.ok) {
            return current;
        }

        const now = this.clock().toISOString();

        try {
            await this.retrying('softDelete', () => this.client.send(
                new TransactWriteCommand({
                    TransactItems: [
                        {
                            Update: {
                                TableName: this.tableName,
                                Key: userKey(id),
                                UpdateExpression:
                                    'SET isDeleted = :true, deletedAt = :now, updatedAt = :now, GSI1SK = :deletedSk',
                                ConditionExpression: 'attribute_exists(PK) AND isDeleted = :false',
                                ExpressionAttributeValues: {
                                    ':true': true,
                                    ':false': false,
                                    ':now': now,
                                    ':deletedSk': `DELETED#${now}`,
                                },
                            },
                        },
                        {
                            Delete: {
                                TableName: this.tableName,
                                Key: emailKey(current.value.email),
                            },
                        },
                    ],
                })
            ));
            return ok(undefined);
        } catch (error) {
            if (isConditionFailure(error, 0)) {
                return err({ kind: 'deleted', message: `user ${id} is already deleted` });
            }
            return err(unavailable('softDelete', error));
        }
    }

    async list(filter?: UserFilter): Promise<DirectoryResult<UserRecord[]>> {
        const records: UserRecord[] = [];
        let startKey: Record<string, unknown> | undefined;

        try {
            do {
                const page = await this.retrying('list', () => this.client.send(
                    new ScanCommand({
                        TableName: this.tableName,
                        FilterExpression: 'entityType = :user',
                        ExpressionAttributeValues: { ':user': 'USER' },
                        ExclusiveStartKey: startKey,
                    })
                ));

                for (const item of page.Items ?? []) {
                    const record = toUserRecord(item);
                    if (record && matchesUserFilter(record, filter)) {
                        records.push(record);
                    }
                }
                startKey = page.LastEvaluatedKey;
            } while (startKey);
        } catch (error) {
            return err(unavailable('list', error));
        }

        records.sort((a, b) => a.createdAt.localeCompare(b.createdAt));
        return ok(records);
    }

    /**
     * Load a record that must exist and not be deleted.
     */
    private async findExisting(id: string): Promise<DirectoryResult<UserRecord>> {
        const found = await this.findById(id);
        if (!found.ok) {
            return found;
        }
        if (!found.value) {
            return err({ kind: 'not_found', message: `no user ${id}` });
        }
        if (found.value.isDeleted) {
            return err({ kind: 'deleted', message: `user ${id} is deleted` });
        }
        return ok(found.value);
    }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Active record first; otherwise the most recently created deleted one.
 */
function pickPreferred(records: UserRecord[]): UserRecord | null {
    const active = records.find(record => !record.isDeleted);
    if (active) {
        return active;
    }
    let latest: UserRecord | null = null;
    for (const record of records) {
        if (!latest || record.createdAt > latest.createdAt) {
            latest = record;
        }
    }
    return latest;
}

/**
 * True when the transaction was cancelled because the condition on the
 * item at `index` failed.
 */
export function isConditionFailure(error: unknown, index: number): boolean {
    if (!(error instanceof TransactionCanceledException)) {
        return false;
    }
    return error.CancellationReasons?.[index]?.Code === 'ConditionalCheckFailed';
}

function unavailable(operation: string, error: unknown): DirectoryFailure {
    const detail = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
    return { kind: 'unavailable', message: `${operation} failed: ${detail}` };
}

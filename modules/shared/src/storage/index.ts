/**
 * Account Service - Storage Module
 *
 * User directory port and its DynamoDB and in-memory implementations.
 *
 * @module storage
 */

export type {
    DirectoryFailure,
    DirectoryFailureKind,
    DirectoryResult,
    DynamoDirectoryConfig,
    FindByEmailOptions,
    UserDirectory,
} from './types';

export {
    withRetry,
    isRetryableError,
    calculateDelay,
    sleep,
    DEFAULT_RETRY_CONFIG,
} from './retry';

export type { RetryConfig } from './retry';

export { DynamoUserDirectory, isConditionFailure } from './dynamo-user-directory';

export { InMemoryUserDirectory } from './memory-user-directory';

export type { MemoryDirectoryOptions } from './memory-user-directory';

export { matchesUserFilter, definedFields } from './user-fields';

export {
    toUserItem,
    toUserRecord,
    toEmailLockItem,
    userKey,
    emailKey,
    emailIndexKey,
} from './user-items';

export { createUserDirectory, getUserDirectory, resetUserDirectory } from './create-directory';

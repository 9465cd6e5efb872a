/**
 * Account Service - User Directory Selection
 *
 * Picks the UserDirectory implementation from USER_DIRECTORY and keeps one
 * instance per process, so the in-memory backend is shared by every handler
 * loaded in the same runtime.
 */

import { getDirectoryConfig } from '../config';
import type { DirectoryConfig } from '../config';
import { getDocClient } from '../dynamo-client';
import { DynamoUserDirectory } from './dynamo-user-directory';
import { InMemoryUserDirectory } from './memory-user-directory';
import type { UserDirectory } from './types';

let directory: UserDirectory | null = null;

export function createUserDirectory(config: DirectoryConfig): UserDirectory {
    if (config.backend === 'memory') {
        return new InMemoryUserDirectory();
    }
    if (!config.tableName) {
        throw new Error('TABLE_NAME is required for the dynamodb user directory');
    }
    return new DynamoUserDirectory(getDocClient(), { tableName: config.tableName });
}

export function getUserDirectory(): UserDirectory {
    if (!directory) {
        directory = createUserDirectory(getDirectoryConfig());
    }
    return directory;
}

/**
 * Drop the process-wide instance (useful for testing).
 */
export function resetUserDirectory(): void {
    directory = null;
}

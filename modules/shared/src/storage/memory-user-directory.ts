/**
 * Account Service - In-Memory User Directory
 *
 * Process-local UserDirectory with sequential string ids ("1", "2", ...).
 * Used by tests and by local runs with USER_DIRECTORY=memory.
 * Returned records are copies; mutating them does not affect the store.
 */

import type {
    CreateUserFields,
    UpdateUserFields,
    UserFilter,
    UserRecord,
} from '../../../shared_types/user';
import { err, ok } from '../result';
import type { DirectoryResult, FindByEmailOptions, UserDirectory } from './types';
import { definedFields, matchesUserFilter } from './user-fields';

export interface MemoryDirectoryOptions {
    clock?: () => Date;
}

export class InMemoryUserDirectory implements UserDirectory {
    private readonly users = new Map<string, UserRecord>();
    private readonly clock: () => Date;
    private nextId = 1;

    constructor(options: MemoryDirectoryOptions = {}) {
        this.clock = options.clock ?? (() => new Date());
    }

    async findByEmail(email: string, options: FindByEmailOptions = {}): Promise<DirectoryResult<UserRecord | null>> {
        let match: UserRecord | null = null;

        for (const user of this.users.values()) {
            if (user.email !== email) {
                continue;
            }
            if (!user.isDeleted) {
                return ok({ ...user });
            }
            // insertion order is creation order, so a later deleted match is newer
            if (options.includeDeleted) {
                match = user;
            }
        }

        return ok(match ? { ...match } : null);
    }

    async findById(id: string): Promise<DirectoryResult<UserRecord | null>> {
        const user = this.users.get(id);
        return ok(user ? { ...user } : null);
    }

    async create(fields: CreateUserFields): Promise<DirectoryResult<UserRecord>> {
        if (this.activeOwnerOf(fields.email) !== undefined) {
            return err({ kind: 'conflict', message: 'email already registered' });
        }

        const now = this.clock().toISOString();
        const user: UserRecord = {
            id: String(this.nextId++),
            email: fields.email,
            firstName: fields.firstName,
            lastName: fields.lastName ?? null,
            passwordHash: fields.passwordHash,
            isDeleted: false,
            deletedAt: null,
            createdAt: now,
            updatedAt: now,
        };
        this.users.set(user.id, user);

        return ok({ ...user });
    }

    async update(id: string, fields: UpdateUserFields): Promise<DirectoryResult<UserRecord>> {
        const user = this.users.get(id);
        if (!user) {
            return err({ kind: 'not_found', message: `no user ${id}` });
        }
        if (user.isDeleted) {
            return err({ kind: 'deleted', message: `user ${id} is deleted` });
        }
        if (fields.email !== undefined) {
            const owner = this.activeOwnerOf(fields.email);
            if (owner !== undefined && owner !== id) {
                return err({ kind: 'conflict', message: 'email already registered' });
            }
        }

        const updated: UserRecord = {
            ...user,
            ...definedFields(fields),
            updatedAt: this.clock().toISOString(),
        };
        this.users.set(id, updated);

        return ok({ ...updated });
    }

    async softDelete(id: string): Promise<DirectoryResult<void>> {
        const user = this.users.get(id);
        if (!user) {
            return err({ kind: 'not_found', message: `no user ${id}` });
        }
        if (user.isDeleted) {
            return err({ kind: 'deleted', message: `user ${id} is already deleted` });
        }

        const now = this.clock().toISOString();
        this.users.set(id, { ...user, isDeleted: true, deletedAt: now, updatedAt: now });

        return ok(undefined);
    }

    async list(filter?: UserFilter): Promise<DirectoryResult<UserRecord[]>> {
        const matches = [...this.users.values()]
            .filter(user => matchesUserFilter(user, filter))
            .map(user => ({ ...user }));
        return ok(matches);
    }

    private activeOwnerOf(email: string): string | undefined {
        for (const user of this.users.values()) {
            if (!user.isDeleted && user.email === email) {
                return user.id;
            }
        }
        return undefined;
    }
}

/**
 * Account Service - Secret Hasher
 *
 * Argon2id password hashing via hash-wasm.
 * Output is a PHC string (`$argon2id$v=19$m=...,t=...,p=...$salt$hash`) that
 * embeds salt and parameters, so verification needs no other input and
 * parameters can be raised later without invalidating stored hashes.
 *
 * @see https://cheatsheetseries.owasp.org/cheatsheets/Password_Storage_Cheat_Sheet.html
 */

import { argon2id, argon2Verify } from 'hash-wasm';
import { generateSalt } from './crypto';

// =============================================================================
// Argon2id Configuration (OWASP Recommendations)
// =============================================================================

export interface Argon2Params {
    parallelism: number;
    iterations: number;
    /** KiB */
    memorySize: number;
    hashLength: number;
    saltLength: number;
}

export const ARGON2_DEFAULTS: Argon2Params = {
    parallelism: 1,
    iterations: 3,
    memorySize: 65536, // 64 MB
    hashLength: 32,
    saltLength: 16,
};

/**
 * Stored in place of a hash for users provisioned through Google.
 * Not a PHC string, so it never verifies.
 */
export const OAUTH_PASSWORD_SENTINEL = 'oauth_google';

// =============================================================================
// Secret Hasher
// =============================================================================

export class SecretHasher {
    private readonly params: Argon2Params;

    constructor(params: Partial<Argon2Params> = {}) {
        this.params = { ...ARGON2_DEFAULTS, ...params };
    }

    /**
     * Hash a plaintext secret with a fresh random salt.
     * Hashing the same input twice yields different strings.
     */
    async hash(plaintext: string): Promise<string> {
        const { saltLength, ...cost } = this.params;

        return argon2id({
            password: plaintext,
            salt: generateSalt(saltLength),
            ...cost,
            outputType: 'encoded',
        });
    }

    /**
     * Check a plaintext against a stored hash using the parameters embedded in it.
     * Returns false for malformed hashes (including the OAuth sentinel).
     */
    async verify(plaintext: string, hash: string): Promise<boolean> {
        if (!hash.startsWith('$argon2')) {
            return false;
        }

        try {
            return await argon2Verify({ password: plaintext, hash });
        } catch {
            // hash-wasm throws on unparseable PHC strings
            return false;
        }
    }
}

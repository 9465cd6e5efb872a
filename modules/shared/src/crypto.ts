/**
 * Account Service - Cryptographic Utilities
 *
 * Hashing, encoding and secure random generation shared by the
 * credential core. Random values come from the Node.js CSPRNG.
 *
 * Thread Safety:
 * - No shared mutable state exists in this module
 *
 * @see RFC 4648 Section 5 - Base64url Encoding
 */

import { createHash, randomBytes, randomUUID } from 'node:crypto';

// =============================================================================
// Constants
// =============================================================================

/** Hash algorithm used for token and identity hashing */
const HASH_ALGORITHM = 'sha256';

/** Default entropy bytes for secure random generation */
const DEFAULT_ENTROPY_BYTES = 32;

/** Prefix marking identities minted while the user directory was unreachable */
export const PSEUDO_IDENTITY_PREFIX = 'pseudo_';

/** Hex characters of the email digest kept in a pseudo identity (96 bits) */
const PSEUDO_IDENTITY_HEX_LENGTH = 24;

// =============================================================================
// Hashing
// =============================================================================

/**
 * SHA-256 of a value, hex encoded (64 characters).
 *
 * @example
 * ```typescript
 * hashToken('abc') // 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad'
 * ```
 */
export function hashToken(token: string): string {
    return createHash(HASH_ALGORITHM).update(token).digest('hex');
}

/**
 * Deterministic subject for a user that could not be resolved in the directory.
 *
 * The same email always maps to the same identity, so repeat degraded logins
 * by one person agree with each other. Emails differing only in case are
 * distinct accounts and get distinct identities. The `pseudo_` prefix lets
 * consumers tell these apart from directory ids.
 */
export function derivePseudoIdentity(email: string): string {
    const digest = hashToken(email);
    return `${PSEUDO_IDENTITY_PREFIX}${digest.slice(0, PSEUDO_IDENTITY_HEX_LENGTH)}`;
}

export function isPseudoIdentity(sub: string): boolean {
    return sub.startsWith(PSEUDO_IDENTITY_PREFIX);
}

// =============================================================================
// Base64URL Encoding
// =============================================================================

/**
 * Encode a buffer to base64url format (RFC 4648 Section 5).
 * Base64url is URL-safe: '+' → '-', '/' → '_', no padding.
 */
export function base64UrlEncode(data: Buffer | string): string {
    const buffer = typeof data === 'string' ? Buffer.from(data) : data;
    return buffer
        .toString('base64')
        .replace(/\+/g, '-')
        .replace(/\//g, '_')
        .replace(/=+$/, '');
}

// =============================================================================
// Secure Random Generation
// =============================================================================

/**
 * Generate a cryptographically secure random string.
 * Used for the OAuth `state` parameter.
 *
 * @param byteLength - Number of random bytes (default: 32, providing 256 bits of entropy)
 * @returns Base64url-encoded random string
 *
 * @example
 * ```typescript
 * const state = generateSecureRandom(16);     // 22 characters
 * ```
 */
export function generateSecureRandom(byteLength = DEFAULT_ENTROPY_BYTES): string {
    return base64UrlEncode(randomBytes(byteLength));
}

/**
 * Random salt bytes for password hashing.
 */
export function generateSalt(byteLength: number): Uint8Array {
    return new Uint8Array(randomBytes(byteLength));
}

/**
 * Identifier for a new directory record.
 */
export function generateUserId(): string {
    return randomUUID();
}

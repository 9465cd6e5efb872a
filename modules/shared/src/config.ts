/**
 * Account Service - Configuration
 *
 * Centralized environment configuration with validation.
 * Loaders are cached after first use for Lambda warm starts.
 * Invalid values throw at load time; missing Google credentials do not,
 * they surface as a ConfigurationError when a Google flow starts.
 */

import type { SessionAlgorithm } from '../../shared_types/session';

// =============================================================================
// Configuration Defaults
// =============================================================================

const DEFAULTS = {
    JWT_ALGORITHM: 'HS256',
    JWT_ACCESS_TOKEN_EXPIRE_MINUTES: 30,
    GOOGLE_REDIRECT_URI: 'http://localhost:8001/auth/google/callback',
    GOOGLE_AUTH_URL: 'https://accounts.google.com/o/oauth2/auth',
    GOOGLE_TOKEN_URL: 'https://oauth2.googleapis.com/token',
    GOOGLE_USERINFO_URL: 'https://www.googleapis.com/oauth2/v2/userinfo',
    OAUTH_HTTP_TIMEOUT_MS: 10000,
    IDEMPOTENCY_CACHE_MAX_ENTRIES: 1000,
    PASSWORD_CHECK_MODE: 'verify',
    USER_DIRECTORY: 'dynamodb',
} as const;

export const SESSION_ALGORITHMS: readonly SessionAlgorithm[] = ['HS256', 'HS384', 'HS512'];

/**
 * `verify` checks the stored Argon2id hash.
 * `existence` accepts any password for a known email (legacy behaviour).
 */
export type PasswordCheckMode = 'verify' | 'existence';

export type DirectoryBackend = 'dynamodb' | 'memory';

// =============================================================================
// Environment Validation
// =============================================================================

/**
 * Validates that a required environment variable is present.
 * @throws Error if the variable is missing
 */
export function requireEnv(name: string): string {
    const value = process.env[name];
    if (!value) {
        throw new Error(`Missing required environment variable: ${name}`);
    }
    return value;
}

/**
 * Gets an optional environment variable with a default value.
 */
export function optionalEnv(name: string, defaultValue: string): string {
    return process.env[name] || defaultValue;
}

/**
 * Gets an optional numeric environment variable with a default value.
 */
export function optionalNumericEnv(name: string, defaultValue: number): number {
    const value = process.env[name];
    if (!value) {
        return defaultValue;
    }
    const parsed = parseInt(value, 10);
    if (isNaN(parsed)) {
        throw new Error(`Invalid numeric value for ${name}: ${value}`);
    }
    return parsed;
}

/**
 * Gets an optional environment variable restricted to a fixed set of values.
 */
export function optionalEnumEnv<T extends string>(
    name: string,
    allowed: readonly T[],
    defaultValue: T
): T {
    const value = process.env[name];
    if (!value) {
        return defaultValue;
    }
    const match = allowed.find(candidate => candidate === value);
    if (match === undefined) {
        throw new Error(`Invalid value for ${name}: ${value} (expected one of ${allowed.join(', ')})`);
    }
    return match;
}

function requirePositive(name: string, value: number): number {
    if (value <= 0) {
        throw new Error(`${name} must be a positive integer, got ${value}`);
    }
    return value;
}

// =============================================================================
// Configuration Types
// =============================================================================

export interface TokenConfig {
    secret: string;
    algorithm: SessionAlgorithm;
    /** Default lifetime of issued tokens in seconds */
    ttlSeconds: number;
}

export interface GoogleConfig {
    clientId?: string;
    clientSecret?: string;
    redirectUri: string;
    authUrl: string;
    tokenUrl: string;
    userinfoUrl: string;
    timeoutMs: number;
}

export interface IssuerConfig {
    passwordCheckMode: PasswordCheckMode;
    cacheMaxEntries: number;
}

export interface DirectoryConfig {
    backend: DirectoryBackend;
    /** Required when backend is dynamodb */
    tableName?: string;
}

// =============================================================================
// Configuration Loaders
// =============================================================================

let tokenConfigCache: TokenConfig | null = null;
let googleConfigCache: GoogleConfig | null = null;
let issuerConfigCache: IssuerConfig | null = null;
let directoryConfigCache: DirectoryConfig | null = null;

export function getTokenConfig(): TokenConfig {
    if (tokenConfigCache) {
        return tokenConfigCache;
    }

    const minutes = requirePositive(
        'JWT_ACCESS_TOKEN_EXPIRE_MINUTES',
        optionalNumericEnv('JWT_ACCESS_TOKEN_EXPIRE_MINUTES', DEFAULTS.JWT_ACCESS_TOKEN_EXPIRE_MINUTES)
    );

    tokenConfigCache = {
        secret: requireEnv('JWT_SECRET_KEY'),
        algorithm: optionalEnumEnv('JWT_ALGORITHM', SESSION_ALGORITHMS, DEFAULTS.JWT_ALGORITHM),
        ttlSeconds: minutes * 60,
    };

    return tokenConfigCache;
}

export function getGoogleConfig(): GoogleConfig {
    if (googleConfigCache) {
        return googleConfigCache;
    }

    googleConfigCache = {
        clientId: process.env.GOOGLE_CLIENT_ID || undefined,
        clientSecret: process.env.GOOGLE_CLIENT_SECRET || undefined,
        redirectUri: optionalEnv('GOOGLE_REDIRECT_URI', DEFAULTS.GOOGLE_REDIRECT_URI),
        authUrl: optionalEnv('GOOGLE_AUTH_URL', DEFAULTS.GOOGLE_AUTH_URL),
        tokenUrl: optionalEnv('GOOGLE_TOKEN_URL', DEFAULTS.GOOGLE_TOKEN_URL),
        userinfoUrl: optionalEnv('GOOGLE_USERINFO_URL', DEFAULTS.GOOGLE_USERINFO_URL),
        timeoutMs: requirePositive(
            'OAUTH_HTTP_TIMEOUT_MS',
            optionalNumericEnv('OAUTH_HTTP_TIMEOUT_MS', DEFAULTS.OAUTH_HTTP_TIMEOUT_MS)
        ),
    };

    return googleConfigCache;
}

export function getIssuerConfig(): IssuerConfig {
    if (issuerConfigCache) {
        return issuerConfigCache;
    }

    issuerConfigCache = {
        passwordCheckMode: optionalEnumEnv<PasswordCheckMode>(
            'PASSWORD_CHECK_MODE',
            ['verify', 'existence'],
            DEFAULTS.PASSWORD_CHECK_MODE
        ),
        cacheMaxEntries: requirePositive(
            'IDEMPOTENCY_CACHE_MAX_ENTRIES',
            optionalNumericEnv('IDEMPOTENCY_CACHE_MAX_ENTRIES', DEFAULTS.IDEMPOTENCY_CACHE_MAX_ENTRIES)
        ),
    };

    return issuerConfigCache;
}

export function getDirectoryConfig(): DirectoryConfig {
    if (directoryConfigCache) {
        return directoryConfigCache;
    }

    const backend = optionalEnumEnv<DirectoryBackend>(
        'USER_DIRECTORY',
        ['dynamodb', 'memory'],
        DEFAULTS.USER_DIRECTORY
    );

    directoryConfigCache = {
        backend,
        tableName: backend === 'dynamodb' ? requireEnv('TABLE_NAME') : process.env.TABLE_NAME,
    };

    return directoryConfigCache;
}

/**
 * Clear configuration cache (useful for testing).
 */
export function clearConfigCache(): void {
    tokenConfigCache = null;
    googleConfigCache = null;
    issuerConfigCache = null;
    directoryConfigCache = null;
}

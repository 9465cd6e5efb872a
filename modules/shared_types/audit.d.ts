/**
 * Account Service - Audit Schema
 *
 * Structured audit logging interfaces.
 * All audit events are JSON-formatted for CloudWatch.
 *
 * This file defines the contract for the AuditLogger utility class.
 * Every entry carries timestamp, actor, action and source IP.
 */

// =============================================================================
// Audit Actions
// =============================================================================

/**
 * Enumeration of all auditable actions in the system.
 */
export type AuditAction =
    // Sign-in
    | 'LOGIN_SUCCESS'
    | 'LOGIN_FAILURE'
    | 'LOGIN_DEGRADED'
    | 'TOKEN_ISSUED'
    // Google authorization-code flow
    | 'AUTH_CODE_EXCHANGED'
    | 'AUTH_CODE_REPLAYED'
    // User management
    | 'USER_PROVISIONED'
    | 'USER_UPDATED'
    | 'USER_DELETED';

// =============================================================================
// Actor Types
// =============================================================================

/**
 * Represents the entity performing the audited action.
 */
export type AuditActor =
    | { type: 'USER'; sub: string }
    | { type: 'SYSTEM'; process?: string }
    | { type: 'ANONYMOUS' };

/** Sign-in method recorded on login events */
export type LoginMethod = 'password' | 'google';

// =============================================================================
// Action-Specific Detail Types
// =============================================================================

/** Details for LOGIN_SUCCESS */
export interface LoginSuccessDetails {
    method: LoginMethod;
    email: string;
    /** False when the password was not checked (existence-only mode) */
    passwordChecked?: boolean;
}

/** Details for LOGIN_FAILURE */
export interface LoginFailureDetails {
    method: LoginMethod;
    email?: string;
    reason: string;
}

/** Details for LOGIN_DEGRADED: a token was issued without a directory record */
export interface LoginDegradedDetails {
    method: LoginMethod;
    email: string;
    pseudoSub: string;
    reason: string;
}

/** Details for TOKEN_ISSUED */
export interface TokenIssuedDetails {
    method: LoginMethod;
    /** Token expiration time (ISO 8601) */
    expiresAt: string;
}

export interface UserProvisionedDetails {
    userId: string;
    /** `password` for registration, `google` for first sign-in */
    method: LoginMethod;
}

export interface UserUpdatedDetails {
    userId: string;
    /** Wire names of the fields the request changed */
    updatedFields: string[];
}

/**
 * Details carried by each action. Adding an action means adding it here.
 */
export interface AuditDetailsByAction {
    LOGIN_SUCCESS: LoginSuccessDetails;
    LOGIN_FAILURE: LoginFailureDetails;
    LOGIN_DEGRADED: LoginDegradedDetails;
    TOKEN_ISSUED: TokenIssuedDetails;
    AUTH_CODE_EXCHANGED: { email: string };
    AUTH_CODE_REPLAYED: Record<string, never>;
    USER_PROVISIONED: UserProvisionedDetails;
    USER_UPDATED: UserUpdatedDetails;
    USER_DELETED: { userId: string };
}

// =============================================================================
// Audit Events and Log Lines
// =============================================================================

/**
 * What a caller records: one member per action, with its own details type.
 */
export type AuditEvent = {
    [A in AuditAction]: {
        action: A;
        actor: AuditActor;
        details: AuditDetailsByAction[A];
    };
}[AuditAction];

/**
 * Line written for an audit event.
 *
 * @example
 * ```typescript
 * const entry: AuditLogEntry = {
 *   level: 'AUDIT',
 *   timestamp: '2025-01-01T00:00:00.000Z',
 *   requestId: 'c6af9ac6-7b61-11e6-9a41-93e8deadbeef',
 *   ip: '203.0.113.10',
 *   action: 'LOGIN_SUCCESS',
 *   actor: { type: 'USER', sub: '42' },
 *   details: { method: 'password', email: 'a@b.com' }
 * };
 * ```
 */
export type AuditLogEntry = AuditEvent & {
    /** Always 'AUDIT', so audit lines can be filtered from application logs. */
    level: 'AUDIT';
    /** ISO 8601 timestamp in UTC. */
    timestamp: string;
    /** Lambda request id, or `system-<ms>` outside a request */
    requestId: string;
    /** Client IP, or `internal` outside a request */
    ip: string;
    userAgent?: string;
};

// =============================================================================
// Audit Logger Interface (Contract for Implementation)
// =============================================================================

/**
 * Contract for the AuditLogger utility class.
 */
export interface AuditLogger {
    /** Write one audit line; request id and IP come from the logger's context. */
    record(event: AuditEvent): void;
}

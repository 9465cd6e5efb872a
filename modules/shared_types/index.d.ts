/**
 * Account Service - Shared Type Definitions
 *
 * Central export for all shared type definitions.
 *
 * - base: Foundation types for DynamoDB key patterns
 * - user: User records, DynamoDB items and the wire view
 * - session: Token claims and the sign-in response
 * - audit: Audit logging interfaces
 */

export type { PKPrefix, SKValue, EntityType, BaseItem } from './base';

export type {
    UserRecord,
    CreateUserFields,
    UpdateUserFields,
    UserFilter,
    UserItem,
    EmailLockItem,
    UserView,
} from './user';

export type {
    SessionAlgorithm,
    SubjectClaims,
    SessionClaims,
    SessionUser,
    SessionResponse,
    OAuthTokenSet,
    ExternalProfile,
} from './session';

export type {
    AuditAction,
    AuditActor,
    AuditDetailsByAction,
    AuditEvent,
    AuditLogEntry,
    AuditLogger,
    LoginMethod,
} from './audit';

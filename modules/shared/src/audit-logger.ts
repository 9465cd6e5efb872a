/**
 * Account Service - Audit Logger
 *
 * Two JSON-lines writers on stdout, which Lambda ships to CloudWatch:
 * - AuditLogger: one `level: "AUDIT"` line per sign-in, token or user change
 * - Logger: application diagnostics at DEBUG/INFO/WARN/ERROR
 *
 * Passwords, provider tokens and issued tokens are never written.
 * Query audit lines in Logs Insights with `filter level = "AUDIT"`.
 */

import type { APIGatewayProxyEventV2, Context } from 'aws-lambda';
import type {
    AuditActor,
    AuditEvent,
    AuditLogEntry,
    AuditLogger as AuditSink,
    LoginDegradedDetails,
    LoginFailureDetails,
    LoginSuccessDetails,
    TokenIssuedDetails,
    UserProvisionedDetails,
    UserUpdatedDetails,
} from '../../shared_types/audit';

// =============================================================================
// Request Context Interface
// =============================================================================

export interface AuditContext {
    /** AWS Request ID for tracing */
    requestId: string;
    /** Source IP address */
    ip: string;
    /** User agent string, or the process name outside a request */
    userAgent?: string;
}

// =============================================================================
// Audit Logger Implementation
// =============================================================================

export class AuditLogger implements AuditSink {
    private readonly context: AuditContext;

    constructor(context: AuditContext) {
        this.context = context;
    }

    record(event: AuditEvent): void {
        const entry: AuditLogEntry = {
            level: 'AUDIT',
            timestamp: new Date().toISOString(),
            requestId: this.context.requestId,
            ip: this.context.ip,
            ...event,
        };
        if (this.context.userAgent) {
            entry.userAgent = this.context.userAgent;
        }

        console.log(JSON.stringify(entry));
    }

    // ---------------------------------------------------------------------------
    // Sign-in
    // ---------------------------------------------------------------------------

    loginSuccess(actor: AuditActor, details: LoginSuccessDetails): void {
        this.record({ action: 'LOGIN_SUCCESS', actor, details });
    }

    loginFailure(details: LoginFailureDetails): void {
        this.record({ action: 'LOGIN_FAILURE', actor: { type: 'ANONYMOUS' }, details });
    }

    /**
     * A token issued under a pseudo identity because the user directory
     * could not be reached. The pseudo subject is the actor.
     */
    loginDegraded(details: LoginDegradedDetails): void {
        this.record({ action: 'LOGIN_DEGRADED', actor: { type: 'USER', sub: details.pseudoSub }, details });
    }

    tokenIssued(actor: AuditActor, details: TokenIssuedDetails): void {
        this.record({ action: 'TOKEN_ISSUED', actor, details });
    }

    authCodeExchanged(details: { email: string }): void {
        this.record({ action: 'AUTH_CODE_EXCHANGED', actor: { type: 'ANONYMOUS' }, details });
    }

    /** A callback answered from the idempotency cache */
    authCodeReplayed(actor: AuditActor): void {
        this.record({ action: 'AUTH_CODE_REPLAYED', actor, details: {} });
    }

    // ---------------------------------------------------------------------------
    // User Management
    // ---------------------------------------------------------------------------

    userProvisioned(actor: AuditActor, details: UserProvisionedDetails): void {
        this.record({ action: 'USER_PROVISIONED', actor, details });
    }

    userUpdated(actor: AuditActor, details: UserUpdatedDetails): void {
        this.record({ action: 'USER_UPDATED', actor, details });
    }

    userDeleted(actor: AuditActor, userId: string): void {
        this.record({ action: 'USER_DELETED', actor, details: { userId } });
    }
}

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Extract audit context from an API Gateway HTTP API v2 request.
 *
 * @example
 * ```typescript
 * export const handler = async (event: APIGatewayProxyEventV2, context: Context) => {
 *   const audit = withContext(event, context);
 *   audit.loginSuccess({ type: 'USER', sub: '42' }, { method: 'password', email: 'a@b.com' });
 * };
 * ```
 */
export function withContext(
    event: APIGatewayProxyEventV2,
    lambdaContext?: Context
): AuditLogger {
    // HTTP API v2 headers are lowercase
    const forwardedFor = event.headers?.['x-forwarded-for'];
    const ip = forwardedFor
        ? forwardedFor.split(',')[0].trim()
        : event.requestContext?.http?.sourceIp || 'unknown';

    const requestId =
        lambdaContext?.awsRequestId ||
        event.requestContext?.requestId ||
        event.headers?.['x-request-id'] ||
        'unknown';

    const userAgent = event.headers?.['user-agent'];

    return new AuditLogger({
        requestId,
        ip,
        userAgent,
    });
}

/**
 * Create an AuditLogger for system/background processes.
 */
export function createSystemLogger(processName: string): AuditLogger {
    return new AuditLogger({
        requestId: `system-${Date.now()}`,
        ip: 'internal',
        userAgent: processName,
    });
}

// =============================================================================
// General Logger (Non-Audit Structured Logging)
// =============================================================================

/** Log levels for structured logging */
export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

interface LogEntry {
    level: LogLevel;
    timestamp: string;
    requestId: string;
    message: string;
    data?: Record<string, unknown>;
}

/**
 * General-purpose structured logger for non-audit events.
 */
export class Logger {
    private readonly requestId: string;

    constructor(requestId: string) {
        this.requestId = requestId;
    }

    private write(level: LogLevel, message: string, data?: Record<string, unknown>): void {
        const entry: LogEntry = {
            level,
            timestamp: new Date().toISOString(),
            requestId: this.requestId,
            message,
            ...(data && { data }),
        };

        console.log(JSON.stringify(entry));
    }

    debug(message: string, data?: Record<string, unknown>): void {
        this.write('DEBUG', message, data);
    }

    info(message: string, data?: Record<string, unknown>): void {
        this.write('INFO', message, data);
    }

    warn(message: string, data?: Record<string, unknown>): void {
        this.write('WARN', message, data);
    }

    error(message: string, data?: Record<string, unknown>): void {
        this.write('ERROR', message, data);
    }
}

/**
 * Create a Logger from API Gateway HTTP API v2 event context.
 */
export function createLogger(
    event: APIGatewayProxyEventV2,
    lambdaContext?: Context
): Logger {
    const requestId =
        lambdaContext?.awsRequestId ||
        event.requestContext?.requestId ||
        'unknown';

    return new Logger(requestId);
}

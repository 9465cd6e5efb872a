/**
 * Account Service - Session Issuer
 *
 * Turns a proof of identity into a signed session token.
 *
 * Password flow:
 *   1. Find the non-deleted user by email
 *   2. Check the password (or only existence, in legacy mode)
 *   3. Issue a token for the directory id
 *
 * Google flow:
 *   1. Fail fast when Google credentials are not configured
 *   2. Answer a previously seen code from the idempotency cache
 *   3. Otherwise, once per code: exchange → fetch profile → find or provision user → issue
 *   4. If the directory fails, issue for a deterministic pseudo identity instead
 *   5. Cache the response for the code, on either path
 */

import type {
    ExternalProfile,
    SessionResponse,
    SessionUser,
    SubjectClaims,
} from '../../../shared_types/session';
import type { UserRecord } from '../../../shared_types/user';
import { AuditLogger, Logger, createSystemLogger } from '../audit-logger';
import type { PasswordCheckMode } from '../config';
import { derivePseudoIdentity } from '../crypto';
import { ErrorMessages } from '../errors/error-messages';
import type { GoogleOAuthClient } from '../oauth/google-client';
import type { OAuthFailure } from '../oauth/types';
import { OAUTH_PASSWORD_SENTINEL } from '../password';
import type { SecretHasher } from '../password';
import { err, ok } from '../result';
import type { DirectoryFailure, DirectoryResult, UserDirectory } from '../storage/types';
import type { TokenCodec } from '../token-codec';
import type {
    GoogleLoginOptions,
    IssuerStats,
    LoginContext,
    LoginFailure,
    LoginResult,
    SessionCache,
    SessionIssuerDeps,
} from './types';

const SYSTEM_PROCESS = 'session-issuer';

interface ResolvedIdentity {
    claims: SubjectClaims;
    user: SessionUser;
}

interface RequestLoggers {
    log: Logger;
    audit: AuditLogger;
}

export class SessionIssuer {
    private readonly directory: UserDirectory;
    private readonly codec: TokenCodec;
    private readonly hasher: SecretHasher;
    private readonly oauth: GoogleOAuthClient;
    private readonly cache: SessionCache;
    private readonly passwordCheckMode: PasswordCheckMode;
    private readonly systemLog = new Logger(SYSTEM_PROCESS);
    private readonly systemAudit = createSystemLogger(SYSTEM_PROCESS);

    readonly stats: IssuerStats = { degradedLogins: 0, replayedCodes: 0 };

    constructor(deps: SessionIssuerDeps) {
        this.directory = deps.directory;
        this.codec = deps.codec;
        this.hasher = deps.hasher;
        this.oauth = deps.oauth;
        this.cache = deps.cache;
        this.passwordCheckMode = deps.passwordCheckMode ?? 'verify';
    }

    // =========================================================================
    // Password Flow
    // =========================================================================

    async loginWithPassword(email: string, password: string, context: LoginContext = {}): Promise<LoginResult> {
        const { log, audit } = this.loggers(context);

        const found = await guardDirectory(() => this.directory.findByEmail(email));
        if (!found.ok) {
            log.error('User directory lookup failed', { reason: found.error.message });
            audit.loginFailure({ method: 'password', email, reason: 'directory_unavailable' });
            return err({ kind: 'directory_unavailable', message: ErrorMessages.DIRECTORY_UNAVAILABLE });
        }

        const user = found.value;
        if (!user) {
            audit.loginFailure({ method: 'password', email, reason: 'unknown_email' });
            return err(invalidCredentials());
        }

        if (this.passwordCheckMode === 'verify') {
            const matches = await this.hasher.verify(password, user.passwordHash);
            if (!matches) {
                audit.loginFailure({ method: 'password', email, reason: 'invalid_password' });
                return err(invalidCredentials());
            }
        } else {
            log.warn('Password not checked: PASSWORD_CHECK_MODE=existence', {
                event: 'PASSWORD_CHECK_SKIPPED',
                userId: user.id,
            });
        }

        const response = await this.issueFor(fromRecord(user), 'password', audit);
        audit.loginSuccess(
            { type: 'USER', sub: user.id },
            { method: 'password', email: user.email, passwordChecked: this.passwordCheckMode === 'verify' }
        );
        log.info('Password login succeeded', { userId: user.id });

        return ok(response);
    }

    // =========================================================================
    // Google Flow
    // =========================================================================

    /**
     * Complete a Google login for an authorization code.
     *
     * @throws ConfigurationError when Google credentials are not configured
     */
    async loginWithGoogle(code: string, options: GoogleLoginOptions = {}): Promise<LoginResult> {
        this.oauth.assertConfigured();

        const loggers = this.loggers(options);
        const { signal } = options;

        if (signal?.aborted) {
            return err(requestCancelled());
        }

        const cached = this.cache.get(code);
        if (cached) {
            this.stats.replayedCodes++;
            loggers.log.info('Authorization code replayed, returning cached session', { userId: cached.user.id });
            loggers.audit.authCodeReplayed({ type: 'USER', sub: cached.user.id });
            return ok(cached);
        }

        const work = this.cache.resolve(code, () => this.completeGoogleLogin(code, options.redirectUri, loggers));
        if (!signal) {
            return work;
        }
        return raceAbort(work, signal, loggers.log);
    }

    private async completeGoogleLogin(
        code: string,
        redirectUri: string | undefined,
        { log, audit }: RequestLoggers
    ): Promise<LoginResult> {
        const exchanged = await this.oauth.exchangeCode(code, redirectUri);
        if (!exchanged.ok) {
            return this.oauthFailed(exchanged.error, { log, audit });
        }

        const profile = await this.oauth.fetchProfile(exchanged.value.accessToken);
        if (!profile.ok) {
            return this.oauthFailed(profile.error, { log, audit });
        }

        audit.authCodeExchanged({ email: profile.value.email });

        const identity = await this.resolveGoogleIdentity(profile.value, { log, audit });
        const response = await this.issueFor(identity, 'google', audit);

        audit.loginSuccess(
            { type: 'USER', sub: identity.claims.sub },
            { method: 'google', email: identity.claims.email }
        );
        log.info('Google login succeeded', { userId: identity.claims.sub });

        return ok(response);
    }

    /**
     * Directory record for the profile's email, provisioned on first login.
     * Any directory failure degrades to a pseudo identity.
     */
    private async resolveGoogleIdentity(
        profile: ExternalProfile,
        loggers: RequestLoggers
    ): Promise<ResolvedIdentity> {
        const found = await guardDirectory(() => this.directory.findByEmail(profile.email));
        if (!found.ok) {
            return this.degrade(profile, found.error, loggers);
        }
        if (found.value) {
            return fromRecord(found.value);
        }

        const created = await guardDirectory(() => this.directory.create({
            email: profile.email,
            firstName: profile.givenName,
            lastName: profile.familyName || null,
            passwordHash: OAUTH_PASSWORD_SENTINEL,
        }));

        if (created.ok) {
            loggers.audit.userProvisioned({ type: 'SYSTEM', process: SYSTEM_PROCESS }, {
                userId: created.value.id,
                method: 'google',
            });
            return fromRecord(created.value);
        }

        if (created.error.kind === 'conflict') {
            // a concurrent login for the same email won the insert
            const again = await guardDirectory(() => this.directory.findByEmail(profile.email));
            if (again.ok && again.value) {
                return fromRecord(again.value);
            }
        }

        return this.degrade(profile, created.error, loggers);
    }

    private degrade(
        profile: ExternalProfile,
        failure: DirectoryFailure,
        { log, audit }: RequestLoggers
    ): ResolvedIdentity {
        const pseudoSub = derivePseudoIdentity(profile.email);
        const reason = failure.message;
        this.stats.degradedLogins++;

        // a conflict whose re-read still misses means the directory answered
        log.warn('User directory could not resolve the user, issuing token for pseudo identity', {
            event: failure.kind === 'conflict' ? 'DIRECTORY_CONFLICT' : 'DIRECTORY_UNAVAILABLE',
            kind: failure.kind,
            pseudoSub,
            reason,
        });
        audit.loginDegraded({ method: 'google', email: profile.email, pseudoSub, reason });

        return {
            claims: {
                sub: pseudoSub,
                email: profile.email,
                first_name: profile.givenName,
                last_name: profile.familyName,
            },
            user: {
                id: pseudoSub,
                email: profile.email,
                first_name: profile.givenName,
                last_name: profile.familyName,
            },
        };
    }

    private oauthFailed(failure: OAuthFailure, { log, audit }: RequestLoggers): LoginResult {
        log.warn('Google login failed', { kind: failure.kind, detail: failure.detail });
        audit.loginFailure({ method: 'google', reason: failure.kind });
        return err({ kind: failure.kind, message: failure.message });
    }

    // =========================================================================
    // Shared
    // =========================================================================

    private async issueFor(
        identity: ResolvedIdentity,
        method: 'password' | 'google',
        audit: AuditLogger
    ): Promise<SessionResponse> {
        const issued = await this.codec.issueWithExpiry(identity.claims);

        audit.tokenIssued(
            { type: 'USER', sub: identity.claims.sub },
            { method, expiresAt: new Date(issued.exp * 1000).toISOString() }
        );

        return {
            token: issued.token,
            token_type: 'Bearer',
            expires_in: issued.exp - issued.iat,
            user: identity.user,
        };
    }

    private loggers(context: LoginContext): RequestLoggers {
        return {
            log: context.log ?? this.systemLog,
            audit: context.audit ?? this.systemAudit,
        };
    }
}

// =============================================================================
// Helpers
// =============================================================================

function fromRecord(user: UserRecord): ResolvedIdentity {
    const lastName = user.lastName ?? '';
    return {
        claims: {
            sub: user.id,
            email: user.email,
            first_name: user.firstName,
            last_name: lastName,
        },
        user: {
            id: user.id,
            email: user.email,
            first_name: user.firstName,
            last_name: lastName,
        },
    };
}

function invalidCredentials(): LoginFailure {
    return { kind: 'invalid_credentials', message: ErrorMessages.INVALID_CREDENTIALS };
}

function requestCancelled(): LoginFailure {
    return { kind: 'request_cancelled', message: ErrorMessages.REQUEST_CANCELLED };
}

/**
 * Directory implementations report failures as results, but a broken
 * implementation may still throw. Treat both the same.
 */
async function guardDirectory<T>(call: () => Promise<DirectoryResult<T>>): Promise<DirectoryResult<T>> {
    try {
        return await call();
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return err({ kind: 'unavailable', message });
    }
}

/**
 * Settle with the work's result, or with request_cancelled as soon as
 * `signal` aborts. The work promise is always observed; a failure that
 * arrives after cancellation is logged.
 */
function raceAbort(work: Promise<LoginResult>, signal: AbortSignal, log: Logger): Promise<LoginResult> {
    return new Promise<LoginResult>((resolve, reject) => {
        const abort = () => {
            log.warn('Caller cancelled Google login; exchange continues in background');
            resolve(err(requestCancelled()));
        };
        signal.addEventListener('abort', abort, { once: true });

        work.then(
            result => {
                signal.removeEventListener('abort', abort);
                resolve(result);
            },
            error => {
                signal.removeEventListener('abort', abort);
                if (signal.aborted) {
                    log.error('Background Google login failed after cancellation', {
                        error: error instanceof Error ? error.message : String(error),
                    });
                }
                reject(error);
            }
        );
    });
}

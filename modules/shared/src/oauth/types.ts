/**
 * Account Service - OAuth Client Types
 */

/** Minimal fetch signature; global fetch satisfies it */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type OAuthFailureKind =
    | 'invalid_grant'
    | 'exchange_failed'
    | 'profile_fetch_failed'
    | 'network_timeout';

export interface OAuthFailure {
    kind: OAuthFailureKind;
    /** Safe to show to the caller */
    message: string;
    /** Provider status or transport error, for logs only */
    detail?: string;
}

export interface AuthorizationRequest {
    /** Fully-formed provider URL to redirect the browser to */
    url: string;
    /** Random value echoed back by the provider on the callback */
    state: string;
}

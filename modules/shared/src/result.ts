/**
 * Account Service - Result Type
 *
 * Discriminated union returned across the directory and identity-provider
 * boundaries, where failure is an expected outcome rather than a bug.
 */

export type Ok<T> = { ok: true; value: T };
export type Err<E> = { ok: false; error: E };
export type Result<T, E> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
    return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
    return { ok: false, error };
}

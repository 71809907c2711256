/**
 * Result: tagged success/failure value used by the registry and dispatcher.
 *
 * Failures that callers are expected to handle (provider missing, not
 * configured, bad parameters, downstream failure) travel as `Err` values.
 * Exceptions stay reserved for programmer errors.
 */

export type Result<T, E> = Ok<T> | Err<E>;

export interface Ok<T> {
    readonly ok: true;
    readonly value: T;
}

export interface Err<E> {
    readonly ok: false;
    readonly error: E;
}

export function ok<T>(value: T): Ok<T> {
    return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
    return { ok: false, error };
}

/**
 * Outcome of an operation whose failures are expected and recoverable by
 * the caller (validation, uniqueness, credential checks).
 *
 * Services return these instead of throwing; controllers translate the
 * error kind into the matching HTTP exception.
 */
export type Result<T, E> = Ok<T> | Err<E>;

export interface Ok<T> {
  ok: true;
  value: T;
}

export interface Err<E> {
  ok: false;
  error: E;
}

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

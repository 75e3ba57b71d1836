/**
 * Result type for typed error handling
 * Represents either a successful value or an error, so expected failures
 * travel as values instead of thrown exceptions.
 */

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

/**
 * A Result type that represents either success (Ok) or failure (Err)
 */
export type Result<T, E> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

/**
 * Unwrap a result, returning the value or throwing the error
 * Use sparingly - prefer narrowing on result.ok
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) {
    return result.value;
  }
  throw result.error;
}

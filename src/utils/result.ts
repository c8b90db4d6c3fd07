/**
 * Outcome of an operation that can fail in an expected way.
 *
 * Expected failures travel as `{ success: false, error }`; anything thrown is
 * unexpected and propagates to the caller untouched.
 */
export type Ok<T> = { success: true; data: T };
export type Err<E> = { success: false; error: E };
export type Result<T, E> = Ok<T> | Err<E>;

export function ok<T>(data: T): Ok<T> {
  return { success: true, data };
}

export function err<E>(error: E): Err<E> {
  return { success: false, error };
}

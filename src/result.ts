/**
 * Result
 *
 * Tagged success/failure value for operations whose failure is an expected
 * outcome rather than an exception.
 */

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E }

export function Ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value }
}

export function Err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error }
}

/**
 * Explicit success/failure values for operations whose failure is an expected
 * outcome rather than an exception (outbound lookups, optional stores).
 */

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function success<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function failure<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

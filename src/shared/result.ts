/**
 * src/shared/result.ts
 *
 * WHY:
 * - Expected failures (bad credentials, revoked token, duplicate email) are values, not exceptions.
 * - Flows return Result; controllers translate the failure into an AppError at the HTTP boundary.
 *
 * RULES:
 * - Exceptions stay reserved for invariant violations and infrastructure faults.
 */

export type Ok<T> = { readonly ok: true; readonly value: T };
export type Err<E> = { readonly ok: false; readonly error: E };
export type Result<T, E> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

/** `const` keeps literal reasons ('invalid_credentials') from widening to string. */
export function err<const E>(error: E): Err<E> {
  return { ok: false, error };
}

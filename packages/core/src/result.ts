/**
 * Result values
 *
 * Pipeline stages report expected failures as values so the caller can apply
 * FAILURE_POLICY instead of relying on which catch block ran.
 */

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): { readonly ok: true; readonly value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { readonly ok: false; readonly error: E } {
  return { ok: false, error };
}

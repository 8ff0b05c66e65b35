import type { OcmeterError } from './errors';

/**
 * Outcome of a load that can fail on operator input (a config file, a price
 * list). The error side is always an {@link OcmeterError} subclass.
 */
export type Result<T, E extends OcmeterError = OcmeterError> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E extends OcmeterError>(error: E): Result<never, E> {
  return { ok: false, error };
}

/** Returns the value or rethrows the carried error. For command entry points and tests. */
export function unwrap<T, E extends OcmeterError>(result: Result<T, E>): T {
  if (result.ok) return result.value;
  throw result.error;
}

import type { GeoDistanceError } from '../models/errors/geo-error';

/**
 * Outcome of a validation or calculation step. Callers branch on `ok`
 * instead of catching.
 */
export type Result<T, E = GeoDistanceError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

import { EARTH_RADIUS } from '../constants/units';
import { CalculationError } from '../models/errors/geo-error';
import type { Coordinates, DistanceUnit } from '../types/coordinates';
import { err, ok, type Result } from '../types/result';

export function toRadians(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

/**
 * Calculates the great-circle distance between two coordinates
 * using the Haversine formula. Returns the unrounded distance in `unit`.
 */
export function haversineDistance(a: Coordinates, b: Coordinates, unit: DistanceUnit): number {
  const lat1 = toRadians(a.latitude);
  const lat2 = toRadians(b.latitude);
  const dLat = lat2 - lat1;
  const dLon = toRadians(b.longitude) - toRadians(a.longitude);

  const h =
    Math.sin(dLat / 2) ** 2 +
    Math.cos(lat1) * Math.cos(lat2) * Math.sin(dLon / 2) ** 2;

  return EARTH_RADIUS[unit] * 2 * Math.asin(Math.sqrt(h));
}

/**
 * Rounds to 2 decimal places. The epsilon nudge keeps binary half-way
 * values such as 1.005 rounding up.
 */
export function roundDistance(distance: number): number {
  return Math.round((distance + Number.EPSILON) * 100) / 100;
}

/**
 * Haversine distance rounded to 2 decimal places. A non-finite result
 * comes back as a calculation_error rather than NaN.
 */
export function calculateDistance(
  a: Coordinates,
  b: Coordinates,
  unit: DistanceUnit
): Result<number, CalculationError> {
  let distance: number;

  try {
    distance = haversineDistance(a, b, unit);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(new CalculationError(`Distance calculation failed: ${message}`, { a, b, unit }));
  }

  if (!Number.isFinite(distance)) {
    return err(
      new CalculationError('Distance calculation produced a non-finite result', { a, b, unit })
    );
  }

  return ok(roundDistance(distance));
}

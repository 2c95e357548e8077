/**
 * Distance Calculator
 *
 * Holds two points and a unit of measurement and reports the Haversine
 * distance between them. Every mutation is validated before state changes.
 *
 * Error signalling:
 *   - A failed validation throws a GeoDistanceError subclass
 *   - The same error is kept as the last error until the next successful call
 *   - The constructor throws, so no unusable instance is ever returned
 *
 * Usage:
 *   const calculator = new DistanceCalculator(
 *     { latitude: 40.7128, longitude: -74.006 },
 *     { latitude: 51.5074, longitude: -0.1278 },
 *     'km'
 *   );
 *   calculator.getDistance(); // 5570.22
 */

import { DEFAULT_UNIT } from '../constants/units';
import type { GeoDistanceError } from '../models/errors/geo-error';
import type { Coordinates, CoordinatesInput, DistanceUnit } from '../types/coordinates';
import type { Result } from '../types/result';
import { calculateDistance } from '../utils/geo';
import { createChildLogger } from '../utils/logger';
import { validateCoordinates, validateUnit } from '../utils/validators';

const log = createChildLogger({ component: 'DistanceCalculator' });

export class DistanceCalculator {
  private pointA: Coordinates;
  private pointB: Coordinates;
  private unit: DistanceUnit;
  private lastError: GeoDistanceError | null = null;

  constructor(pointA: CoordinatesInput, pointB: CoordinatesInput, unit: string = DEFAULT_UNIT) {
    this.pointA = this.unwrap(validateCoordinates(pointA, 'Point A'));
    this.pointB = this.unwrap(validateCoordinates(pointB, 'Point B'));
    this.unit = this.unwrap(validateUnit(unit));
  }

  getPointA(): Coordinates {
    return { ...this.pointA };
  }

  getPointB(): Coordinates {
    return { ...this.pointB };
  }

  getUnit(): DistanceUnit {
    return this.unit;
  }

  getLastError(): GeoDistanceError | null {
    return this.lastError;
  }

  setPointA(pointA: CoordinatesInput): true {
    this.pointA = this.unwrap(validateCoordinates(pointA, 'Point A'));
    return true;
  }

  setPointB(pointB: CoordinatesInput): true {
    this.pointB = this.unwrap(validateCoordinates(pointB, 'Point B'));
    return true;
  }

  setUnit(unit: string): true {
    this.unit = this.unwrap(validateUnit(unit));
    return true;
  }

  /**
   * Distance from Point A to Point B in the current unit, rounded to 2 decimals.
   */
  getDistance(): number {
    return this.distanceTo(this.pointB);
  }

  /**
   * Whether `point` lies within `radius` (in the current unit) of Point A.
   * Point B is not consulted or modified.
   */
  isWithinRadius(point: CoordinatesInput, radius: number): boolean {
    const target = this.unwrap(validateCoordinates(point, 'Target point'));

    return this.distanceTo(target) <= radius;
  }

  private distanceTo(target: Coordinates): number {
    const distance = this.unwrap(calculateDistance(this.pointA, target, this.unit));

    log.debug('Distance calculated', {
      from: this.pointA,
      to: target,
      unit: this.unit,
      distance,
    });

    return distance;
  }

  /**
   * Records the outcome as the last error and throws on failure.
   */
  private unwrap<T>(result: Result<T>): T {
    if (!result.ok) {
      this.lastError = result.error;
      log.debug('Geo distance operation failed', result.error.toJSON());
      throw result.error;
    }

    this.lastError = null;
    return result.value;
  }
}

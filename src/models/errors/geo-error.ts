/**
 * Geo Distance Error Hierarchy
 *
 * Typed error classes for every failure the calculator can report.
 * All errors extend GeoDistanceError with a programmatic code and optional details.
 */

export type CoordinateErrorCode = 'invalid_coordinates' | 'invalid_latitude' | 'invalid_longitude';

export type GeoErrorCode =
  | CoordinateErrorCode
  | 'invalid_unit'
  | 'calculation_error';

export interface CoordinateErrorDetails {
  point: string;
  field?: 'latitude' | 'longitude';
}

export class GeoDistanceError extends Error {
  public readonly code: GeoErrorCode;
  public readonly details?: unknown;

  constructor(message: string, code: GeoErrorCode, details?: unknown) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = details;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): { code: GeoErrorCode; message: string; details?: unknown } {
    return { code: this.code, message: this.message, details: this.details };
  }
}

export class CoordinateValidationError extends GeoDistanceError {
  declare readonly code: CoordinateErrorCode;
  declare readonly details: CoordinateErrorDetails;

  constructor(message: string, code: CoordinateErrorCode, details: CoordinateErrorDetails) {
    super(message, code, details);
  }
}

export class UnitValidationError extends GeoDistanceError {
  constructor(message: string, details?: unknown) {
    super(message, 'invalid_unit', details);
  }
}

export class CalculationError extends GeoDistanceError {
  constructor(message: string, details?: unknown) {
    super(message, 'calculation_error', details);
  }
}

export function isGeoDistanceError(error: unknown): error is GeoDistanceError {
  return error instanceof GeoDistanceError;
}

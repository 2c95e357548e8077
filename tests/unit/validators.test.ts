/**
 * Unit Tests: Input Validation
 *
 * Coverage:
 *   - Validation order (existence → type → range)
 *   - Labelled error messages and details
 *   - Unit checks
 */

import { describe, it, expect } from '@jest/globals';
import {
  isSupportedUnit,
  validateCoordinates,
  validateUnit,
} from '../../src/utils/validators';
import type { Result } from '../../src/types/result';
import type { GeoDistanceError } from '../../src/models/errors/geo-error';

function failure<T>(result: Result<T, GeoDistanceError>): GeoDistanceError {
  if (result.ok) {
    throw new Error('Expected validation to fail');
  }
  return result.error;
}

describe('validateCoordinates()', () => {
  it('accepts a valid point and drops unknown keys', () => {
    expect(
      validateCoordinates({ latitude: 40.7128, longitude: -74.006, name: 'New York' }, 'Point A')
    ).toEqual({ ok: true, value: { latitude: 40.7128, longitude: -74.006 } });
  });

  it('accepts the boundary values', () => {
    expect(validateCoordinates({ latitude: 90, longitude: 180 }, 'Point A').ok).toBe(true);
    expect(validateCoordinates({ latitude: -90, longitude: -180 }, 'Point A').ok).toBe(true);
  });

  it('rejects a missing key as invalid_coordinates', () => {
    const error = failure(validateCoordinates({ latitude: 10 }, 'Point A'));

    expect(error.code).toBe('invalid_coordinates');
    expect(error.message).toBe("Point A must contain 'latitude' and 'longitude' keys");
    expect(error.details).toEqual({ point: 'Point A' });
  });

  it('treats null keys and non-object points as missing', () => {
    expect(failure(validateCoordinates({ latitude: null, longitude: 0 }, 'Point B')).code).toBe(
      'invalid_coordinates'
    );
    expect(failure(validateCoordinates(undefined, 'Point B')).code).toBe('invalid_coordinates');
    expect(failure(validateCoordinates('40,-74', 'Point B')).code).toBe('invalid_coordinates');
  });

  it('checks existence before range', () => {
    expect(failure(validateCoordinates({ latitude: 95 }, 'Point A')).code).toBe(
      'invalid_coordinates'
    );
  });

  it('rejects an out-of-range latitude', () => {
    const error = failure(validateCoordinates({ latitude: 95, longitude: 0 }, 'Point B'));

    expect(error.code).toBe('invalid_latitude');
    expect(error.message).toBe('Point B latitude must be between -90 and 90 degrees');
    expect(error.details).toEqual({ point: 'Point B', field: 'latitude' });
  });

  it('rejects non-numeric latitudes', () => {
    expect(failure(validateCoordinates({ latitude: '40.7', longitude: 0 }, 'Point A')).code).toBe(
      'invalid_latitude'
    );
    expect(
      failure(validateCoordinates({ latitude: Number.NaN, longitude: 0 }, 'Point A')).code
    ).toBe('invalid_latitude');
  });

  it('checks latitude before longitude', () => {
    expect(failure(validateCoordinates({ latitude: 95, longitude: 200 }, 'Point A')).code).toBe(
      'invalid_latitude'
    );
  });

  it('rejects an out-of-range longitude', () => {
    const error = failure(validateCoordinates({ latitude: 0, longitude: 200 }, 'Point A'));

    expect(error.code).toBe('invalid_longitude');
    expect(error.message).toBe('Point A longitude must be between -180 and 180 degrees');
    expect(error.details).toEqual({ point: 'Point A', field: 'longitude' });
  });

  it('rejects an infinite longitude', () => {
    expect(
      failure(validateCoordinates({ latitude: 0, longitude: Number.POSITIVE_INFINITY }, 'Point A'))
        .code
    ).toBe('invalid_longitude');
  });
});

describe('validateUnit()', () => {
  it('accepts supported units', () => {
    expect(validateUnit('mi')).toEqual({ ok: true, value: 'mi' });
    expect(validateUnit('km')).toEqual({ ok: true, value: 'km' });
  });

  it('rejects anything else with the supported list', () => {
    for (const unit of ['furlongs', 'MI', '', 42]) {
      const error = failure(validateUnit(unit));
      expect(error.code).toBe('invalid_unit');
      expect(error.message).toBe('Invalid unit. Supported units are: mi, km');
    }
  });

  it('narrows with isSupportedUnit', () => {
    expect(isSupportedUnit('km')).toBe(true);
    expect(isSupportedUnit('nm')).toBe(false);
  });
});

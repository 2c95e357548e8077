/**
 * Input Validators
 *
 * Each validator returns a Result instead of throwing. Point checks run in
 * a fixed order: key existence (both keys), then latitude type and range,
 * then longitude type and range.
 */

import { z } from 'zod';
import { CoordinateValidationError, UnitValidationError } from '../models/errors/geo-error';
import { coordinateMessages, coordinatesSchema, unitSchema } from '../schemas/coordinates.schema';
import { SUPPORTED_UNITS } from '../constants/units';
import type { Coordinates, DistanceUnit } from '../types/coordinates';
import { err, ok, type Result } from '../types/result';

/**
 * A missing (or null) key, or a point that is not an object at all.
 */
function isMissingIssue(issue: z.ZodIssue): boolean {
  if (issue.path.length === 0) {
    return true;
  }

  return (
    issue.code === z.ZodIssueCode.invalid_type &&
    (issue.received === z.ZodParsedType.undefined || issue.received === z.ZodParsedType.null)
  );
}

export function validateCoordinates(
  point: unknown,
  label: string
): Result<Coordinates, CoordinateValidationError> {
  const parsed = coordinatesSchema(label).safeParse(point);

  if (parsed.success) {
    return ok({ latitude: parsed.data.latitude, longitude: parsed.data.longitude });
  }

  const messages = coordinateMessages(label);
  const { issues } = parsed.error;

  if (issues.some(isMissingIssue)) {
    return err(
      new CoordinateValidationError(messages.missing, 'invalid_coordinates', { point: label })
    );
  }

  if (issues.some((issue) => issue.path[0] === 'latitude')) {
    return err(
      new CoordinateValidationError(messages.latitude, 'invalid_latitude', {
        point: label,
        field: 'latitude',
      })
    );
  }

  return err(
    new CoordinateValidationError(messages.longitude, 'invalid_longitude', {
      point: label,
      field: 'longitude',
    })
  );
}

export function validateUnit(unit: unknown): Result<DistanceUnit, UnitValidationError> {
  const parsed = unitSchema.safeParse(unit);

  if (!parsed.success) {
    return err(
      new UnitValidationError(parsed.error.issues[0]?.message ?? 'Invalid unit', {
        received: unit,
        supported: [...SUPPORTED_UNITS],
      })
    );
  }

  return ok(parsed.data);
}

export function isSupportedUnit(unit: unknown): unit is DistanceUnit {
  return unitSchema.safeParse(unit).success;
}

import { z } from 'zod';
import { SUPPORTED_UNITS } from '../constants/units';

export const coordinateMessages = (label: string) => ({
  missing: `${label} must contain 'latitude' and 'longitude' keys`,
  latitude: `${label} latitude must be between -90 and 90 degrees`,
  longitude: `${label} longitude must be between -180 and 180 degrees`,
});

export const UNIT_MESSAGE = `Invalid unit. Supported units are: ${SUPPORTED_UNITS.join(', ')}`;

/**
 * Builds the point schema for a labelled point ("Point A", "Point B", ...)
 * so that issue messages name the point that failed.
 */
export function coordinatesSchema(label: string) {
  const messages = coordinateMessages(label);

  return z.object(
    {
      latitude: z
        .number({ required_error: messages.missing, invalid_type_error: messages.latitude })
        .min(-90, messages.latitude)
        .max(90, messages.latitude),
      longitude: z
        .number({ required_error: messages.missing, invalid_type_error: messages.longitude })
        .min(-180, messages.longitude)
        .max(180, messages.longitude),
    },
    { required_error: messages.missing, invalid_type_error: messages.missing }
  );
}

export const unitSchema = z.enum(SUPPORTED_UNITS, {
  errorMap: () => ({ message: UNIT_MESSAGE }),
});

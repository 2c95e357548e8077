import type { SUPPORTED_UNITS } from '../constants/units';

export interface Coordinates {
  latitude: number;
  longitude: number;
}

/**
 * Caller-supplied point before validation. Either key may be missing or
 * hold a non-numeric value.
 */
export interface CoordinatesInput {
  latitude?: unknown;
  longitude?: unknown;
}

export type DistanceUnit = (typeof SUPPORTED_UNITS)[number];

import type { DistanceUnit } from '../types/coordinates';

export const SUPPORTED_UNITS = ['mi', 'km'] as const;

/**
 * Mean Earth radius per unit of measurement.
 */
export const EARTH_RADIUS: Record<DistanceUnit, number> = {
  mi: 3959,
  km: 6371,
};

export const DEFAULT_UNIT: DistanceUnit = 'mi';

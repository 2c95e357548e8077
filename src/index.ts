// Calculator
export { DistanceCalculator } from './services/distance-calculator';

// Types
export type { Coordinates, CoordinatesInput, DistanceUnit } from './types/coordinates';
export { ok, err, type Result } from './types/result';

// Constants
export { DEFAULT_UNIT, EARTH_RADIUS, SUPPORTED_UNITS } from './constants/units';

// Errors
export * from './models/errors/geo-error';

// Schemas
export * from './schemas/coordinates.schema';

// Utils
export { calculateDistance, haversineDistance, roundDistance, toRadians } from './utils/geo';
export { isSupportedUnit, validateCoordinates, validateUnit } from './utils/validators';
export { createChildLogger, logger } from './utils/logger';

// Config
export { config, loadConfig, LOG_LEVELS, type AppConfig, type LogLevel } from './config/env';

/**
 * Structured Logger
 *
 * Winston-based logger with:
 * - JSON format for production, colorized console for development
 * - Silent console under test
 * - Child loggers carrying component context
 *
 * Defaults to `warn` so a host application only hears about problems
 * unless it raises LOG_LEVEL.
 */

import winston from 'winston';
import { config } from '../config/env';

const { combine, timestamp, json, printf, colorize, errors } = winston.format;

/**
 * Custom format for development (readable console output)
 */
const devFormat = printf(({ level, message, timestamp, ...metadata }) => {
  let msg = `${timestamp} [${level}]: ${message}`;

  // Filter out service and environment from metadata display
  const { service, environment, ...rest } = metadata;

  if (Object.keys(rest).length > 0) {
    msg += ` ${JSON.stringify(rest)}`;
  }

  return msg;
});

const isDevelopment = config.nodeEnv !== 'production';
const isTest = config.nodeEnv === 'test';

export const logger = winston.createLogger({
  level: config.logLevel,
  format: combine(
    errors({ stack: true }),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' })
  ),
  defaultMeta: {
    service: 'geodistance',
    environment: config.nodeEnv,
  },
  transports: [
    new winston.transports.Console({
      format: isDevelopment ? combine(colorize(), devFormat) : json(),
      silent: isTest, // Suppress console logs during tests
    }),
  ],
  exitOnError: false,
});

if (config.ignored.length > 0) {
  logger.warn('Ignoring unsupported environment values', { variables: config.ignored });
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(context: Record<string, unknown>): winston.Logger {
  return logger.child(context);
}

/**
 * Environment Configuration
 *
 * Reads process.env once at load time. Only the logger is configurable.
 * Unrecognised values fall back to defaults instead of failing the import.
 */

import { z } from 'zod';

export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: z.string().optional(),
});

const logLevelSchema = z.enum(LOG_LEVELS);

export interface AppConfig {
  nodeEnv: string;
  logLevel: LogLevel;
  /** Variables that were set but ignored, e.g. an unknown LOG_LEVEL */
  ignored: string[];
}

export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const { NODE_ENV, LOG_LEVEL } = envSchema.parse(env);
  const ignored: string[] = [];

  let logLevel: LogLevel = 'warn';
  if (LOG_LEVEL) {
    const level = logLevelSchema.safeParse(LOG_LEVEL.toLowerCase());
    if (level.success) {
      logLevel = level.data;
    } else {
      ignored.push('LOG_LEVEL');
    }
  }

  return { nodeEnv: NODE_ENV, logLevel, ignored };
}

export const config = loadConfig(process.env);

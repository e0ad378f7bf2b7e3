/**
 * Runtime configuration from environment variables
 *
 * - MOTORCALC_LOG_LEVEL: debug | info | warn | error | silent (default warn)
 * - MOTORCALC_PRECISION: decimals used when printing results, 0-12 (default 4)
 */

import { z } from 'zod';
import { ConfigurationError } from './motors/errors.js';
import { LOG_LEVELS, type LogLevel } from './utils/logger.js';

export interface MotorModelConfig {
  logLevel: LogLevel;
  precision: number;
}

export const DEFAULT_CONFIG: Readonly<MotorModelConfig> = Object.freeze({
  logLevel: 'warn',
  precision: 4
});

const ConfigSchema = z.object({
  logLevel: z.enum(LOG_LEVELS).default(DEFAULT_CONFIG.logLevel),
  precision: z.coerce.number().int().min(0).max(12).default(DEFAULT_CONFIG.precision)
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): MotorModelConfig {
  const result = ConfigSchema.safeParse({
    logLevel: env.MOTORCALC_LOG_LEVEL || undefined,
    precision: env.MOTORCALC_PRECISION || undefined
  });

  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.map(String).join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }

  return result.data;
}

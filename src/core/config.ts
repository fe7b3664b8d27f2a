/**
 * Configuration management
 * Resolves the bind configuration and log level from the injected environment
 */

import { z } from 'zod';
import type { BindConfiguration, EnvSource, LogLevel } from './types.js';
import { ConfigurationError } from './errors.js';
import { logger } from './logger.js';

export const PORT_ENV_VAR = 'PORT';
export const LOG_LEVEL_ENV_VAR = 'LOG_LEVEL';
export const DEFAULT_PORT = 8000;
export const WILDCARD_HOST = '0.0.0.0';
export const MAX_PORT = 65535;

const LOG_LEVEL_NAMES = ['DEBUG', 'INFO', 'WARN', 'ERROR'] as const;

export const portSchema = z
  .string()
  .trim()
  .regex(/^\d+$/, 'must be a positive integer')
  .transform((value) => Number(value))
  .pipe(
    z
      .number()
      .int()
      .min(1, 'must be a positive integer')
      .max(MAX_PORT, `must not exceed ${MAX_PORT}`)
  );

const logLevelSchema = z.string().trim().toUpperCase().pipe(z.enum(LOG_LEVEL_NAMES));

export interface ResolveBindOptions {
  /** Name of the variable carrying the port */
  portEnvVar?: string;
  defaultPort?: number;
}

/**
 * Parse a port value, throwing ConfigurationError naming its source
 */
export function parsePort(raw: string, source: string = PORT_ENV_VAR): number {
  const result = portSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigurationError(`Invalid ${source} "${raw}": ${issue?.message ?? 'invalid value'}`, {
      details: { variable: source, value: raw },
    });
  }
  return result.data;
}

/**
 * Resolve where the service listens.
 *
 * Absent or blank variable falls back to the default port; anything else
 * must parse, there is no silent fallback for malformed values.
 */
export function resolveBindConfiguration(
  env: EnvSource,
  options: ResolveBindOptions = {}
): BindConfiguration {
  const variable = options.portEnvVar ?? PORT_ENV_VAR;
  const defaultPort = options.defaultPort ?? DEFAULT_PORT;
  const raw = env[variable];

  let port = defaultPort;
  if (raw !== undefined && raw.trim() !== '') {
    port = parsePort(raw, variable);
  } else {
    logger.debug('Port variable not set, using default', { variable, port: defaultPort });
  }

  return Object.freeze({ host: WILDCARD_HOST, port });
}

/**
 * Resolve bootstrap verbosity. Unknown values keep INFO.
 */
export function resolveLogLevel(env: EnvSource): LogLevel {
  const raw = env[LOG_LEVEL_ENV_VAR];
  if (raw === undefined || raw.trim() === '') {
    return 'INFO';
  }

  const result = logLevelSchema.safeParse(raw);
  if (!result.success) {
    logger.warn('Ignoring unknown log level', { variable: LOG_LEVEL_ENV_VAR, value: raw });
    return 'INFO';
  }
  return result.data;
}

export const config = {
  resolveBindConfiguration,
  resolveLogLevel,
  parsePort,
};

export default config;

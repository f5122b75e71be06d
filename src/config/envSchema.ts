import { z } from 'zod';

import { getEnvString, parseBoolEnv, parseEnumEnv, parseIntEnv } from './parseEnv.js';

export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const rawEnvSchema = z.object({
  NODE_ENV: z.string().optional(),

  // Exporter bind address: must parse as an IP literal, anything else is fatal at start-up
  METRICS_HOST: z.string().ip({ message: 'METRICS_HOST must be an IPv4 or IPv6 address' }).optional(),
  METRICS_PORT: z.string().optional(),

  // Constant labels attached to every instrument
  METRICS_DATACENTER: z.string().optional(),
  METRICS_SERVICE: z.string().optional(),
  METRICS_SERVER: z.string().optional(),

  METRICS_DEFAULT_COLLECTORS: z.string().optional(),

  LOG_LEVEL: z.string().optional(),
  LOG_FILE_ENABLED: z.string().optional(),
  LOG_FILE_RETENTION_HOURS: z.string().optional()
});

const portSchema = z.coerce
  .number({ invalid_type_error: 'METRICS_PORT must be a number' })
  .int('METRICS_PORT must be an integer')
  .min(0, 'METRICS_PORT must be between 0 and 65535')
  .max(65535, 'METRICS_PORT must be between 0 and 65535');

export interface Env {
  nodeEnv: string;
  metricsHost: string;
  metricsPort: number;
  metricsDatacenter: string;
  metricsService: string;
  metricsServer: string;
  metricsDefaultCollectors: boolean;
  logLevel: LogLevel;
  logFileEnabled: boolean;
  logFileRetentionHours: number;
}

/**
 * Validate and normalise the process environment.
 * Throws a ZodError on an unparseable bind address or port.
 */
export function loadEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = rawEnvSchema.parse(source);

  return {
    nodeEnv: getEnvString(parsed.NODE_ENV, 'development'),

    metricsHost: parsed.METRICS_HOST ?? '0.0.0.0',
    metricsPort: portSchema.parse(getEnvString(parsed.METRICS_PORT, '8878')),
    metricsDatacenter: getEnvString(parsed.METRICS_DATACENTER, 'development'),
    metricsService: getEnvString(parsed.METRICS_SERVICE, '1.rebalancer.localhost'),
    metricsServer: getEnvString(parsed.METRICS_SERVER, '127.0.0.1'),
    metricsDefaultCollectors: parseBoolEnv(parsed.METRICS_DEFAULT_COLLECTORS, true),

    logLevel: parseEnumEnv(parsed.LOG_LEVEL, LOG_LEVELS, 'info'),
    logFileEnabled: parseBoolEnv(parsed.LOG_FILE_ENABLED, false),
    logFileRetentionHours: parseIntEnv(parsed.LOG_FILE_RETENTION_HOURS, 24, 1, 24 * 30)
  };
}

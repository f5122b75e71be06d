import dotenv from 'dotenv';

import { loadEnv, type Env } from './envSchema.js';
import type { MetricsConfig } from '../metrics/types.js';

dotenv.config();

let _env: Env | null = null;

// Parsed on first access so dotenv has populated process.env
function env(): Env {
  if (!_env) _env = loadEnv(process.env);
  return _env;
}

export const config = {
  get nodeEnv() { return env().nodeEnv; },

  get metricsDefaultCollectors() { return env().metricsDefaultCollectors; },

  get logLevel() { return env().logLevel; },
  get logFileEnabled() { return env().logFileEnabled; },
  get logFileRetentionHours() { return env().logFileRetentionHours; },

  /**
   * Exporter address plus the label values every instrument carries.
   */
  get metrics(): MetricsConfig {
    const e = env();
    return {
      host: e.metricsHost,
      port: e.metricsPort,
      datacenter: e.metricsDatacenter,
      service: e.metricsService,
      server: e.metricsServer
    };
  }
};

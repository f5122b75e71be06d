import type { Server } from 'http';

import { config } from './config/index.js';
import { createAppLogger, setLogger } from './logger.js';
import { enableDefaultMetrics, registerMetrics, startServer } from './metrics/index.js';

/**
 * Read config, install the logger, register metrics and bind the exporter.
 * Every start-up error (invalid env, duplicate metric, bind failure) rejects.
 */
export async function startExporter(): Promise<Server> {
  const logger = createAppLogger({
    level: config.logLevel,
    fileEnabled: config.logFileEnabled,
    fileRetentionHours: config.logFileRetentionHours
  });
  setLogger(logger);

  const metricsConfig = config.metrics;

  if (config.metricsDefaultCollectors) {
    enableDefaultMetrics();
  }

  registerMetrics(metricsConfig);

  logger.info(`Build info: commit=${process.env.GIT_COMMIT_SHA || 'unknown'} node=${process.version}`);
  logger.info(
    `[config] datacenter=${metricsConfig.datacenter} service=${metricsConfig.service} server=${metricsConfig.server}`
  );

  return startServer(metricsConfig.host, metricsConfig.port, logger);
}

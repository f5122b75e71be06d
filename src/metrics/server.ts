import { createServer, type Server } from 'http';
import { isIP } from 'net';

import express from 'express';
import type { Registry } from 'prom-client';
import type { Logger } from 'winston';

import { MetricsStartupError } from './errors.js';
import { metricsRegistry } from './registry.js';

export interface StartServerOptions {
  /** Registry to expose; defaults to the process-wide one */
  registry?: Registry;
}

/**
 * Scrape handler: any method, any path returns the text exposition of every
 * metric in `registry`. Read-only with respect to instrument state.
 */
export function createMetricsApp(registry: Registry, logger: Logger): express.Express {
  const app = express();
  app.disable('x-powered-by');

  app.use(async (req, res) => {
    try {
      const body = await registry.metrics();
      // writeHead rather than res.send(): send() would re-serialise the content type
      res.writeHead(200, { 'Content-Type': registry.contentType });
      res.end(body);
    } catch (err) {
      logger.error('metrics encode failed', {
        method: req.method,
        path: req.path,
        error: err instanceof Error ? err.message : String(err)
      });
      res.destroy();
    }
  });

  return app;
}

/**
 * Bind the metrics server. Resolves once listening; the server then runs
 * until the process exits. An unparseable address or a bind failure rejects.
 */
export function startServer(
  address: string,
  port: number,
  logger: Logger,
  options: StartServerOptions = {}
): Promise<Server> {
  if (isIP(address) === 0) {
    return Promise.reject(new MetricsStartupError(`invalid metrics server address: ${address}`));
  }

  const server = createServer(createMetricsApp(options.registry ?? metricsRegistry, logger));

  return new Promise((resolve, reject) => {
    const onBindError = (err: Error) => {
      reject(new MetricsStartupError(`failed to bind metrics server to ${address}:${port}`, err));
    };

    server.once('error', onBindError);
    server.listen(port, address, () => {
      server.off('error', onBindError);
      server.on('error', (err) => logger.error('metrics server error', { error: err.message }));

      const bound = server.address();
      logger.info('listening', {
        address,
        port: bound !== null && typeof bound === 'object' ? bound.port : port
      });
      resolve(server);
    });
  });
}

import { getLogger } from './logger.js';
import { startExporter } from './startup.js';

const shutdown = (signal: string) => {
  getLogger().info(`Received ${signal}, shutting down`);
  process.exit(0);
};
['SIGINT', 'SIGTERM'].forEach((sig) => process.on(sig, () => shutdown(sig)));

startExporter().catch((err: unknown) => {
  getLogger().error('[startup] fatal', { error: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});

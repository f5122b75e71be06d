/**
 * Central Metrics Registry
 *
 * prom-client's global registry. Instruments created anywhere in the process
 * without an explicit `registers` option land here too, so a scrape of this
 * registry covers all of them.
 */

import { Registry, collectDefaultMetrics, register } from 'prom-client';

export const metricsRegistry: Registry = register;

const withDefaultMetrics = new WeakSet<Registry>();

/**
 * Add the Node.js process collectors (heap, event loop lag, GC...) to a registry.
 * Safe to call multiple times for the same registry.
 */
export function enableDefaultMetrics(registry: Registry = metricsRegistry): void {
  if (withDefaultMetrics.has(registry)) return;
  collectDefaultMetrics({ register: registry });
  withDefaultMetrics.add(registry);
}

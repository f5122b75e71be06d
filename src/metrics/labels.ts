import { hostname as osHostname } from 'os';

import type { LabelSet, MetricsConfig } from './types.js';

export const UNKNOWN_HOSTNAME = 'unknown';

/**
 * Local hostname for the `zonename` label. A failed or empty lookup yields
 * "unknown"; start-up never aborts here.
 */
export function resolveHostname(lookup: () => string = osHostname): string {
  try {
    const name = lookup();
    return name.length > 0 ? name : UNKNOWN_HOSTNAME;
  } catch {
    return UNKNOWN_HOSTNAME;
  }
}

export function buildLabelSet(config: MetricsConfig, zonename: string): Readonly<LabelSet> {
  return Object.freeze({
    service: config.service,
    server: config.server,
    datacenter: config.datacenter,
    zonename
  });
}

/**
 * Holder for the label set published at start-up, so instrumentation created
 * later can carry the same labels. Empty until registerMetrics() publishes.
 */
export class SharedLabels {
  private labels: Readonly<LabelSet> | null = null;

  publish(labels: LabelSet): void {
    this.labels = Object.freeze({ ...labels });
  }

  /** Copy of the published labels, or undefined before initialisation */
  get(): LabelSet | undefined {
    return this.labels ? { ...this.labels } : undefined;
  }

  isInitialized(): boolean {
    return this.labels !== null;
  }
}

export const sharedLabels = new SharedLabels();

/**
 * Labels published to the process-wide holder.
 */
export function getConstLabels(): LabelSet | undefined {
  return sharedLabels.get();
}

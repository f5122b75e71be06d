import { Counter, Histogram, type Registry } from 'prom-client';

import { getLogger } from '../logger.js';
import { MetricsStartupError } from './errors.js';
import { SharedLabels, buildLabelSet, resolveHostname, sharedLabels as processLabels } from './labels.js';
import { metricsRegistry } from './registry.js';
import type { Metric, MetricKind, MetricsConfig, MetricsMap } from './types.js';

export const REQUEST_COUNT = 'request_count';
export const OBJECT_COUNT = 'object_count';
export const ERROR_COUNT = 'error_count';
export const BYTES_COUNT = 'bytes_count';
export const ASSIGNMENT_TIME = 'assignment_time';

export type MetricName =
  | typeof REQUEST_COUNT
  | typeof OBJECT_COUNT
  | typeof ERROR_COUNT
  | typeof BYTES_COUNT
  | typeof ASSIGNMENT_TIME;

/** Bucket every counter-vec increment lands in, whatever else is named */
export const TOTAL_BUCKET = 'total';

export interface RegisterMetricsOptions {
  /** Defaults to the process-wide registry */
  registry?: Registry;
  /** Defaults to the process-wide label holder */
  sharedLabels?: SharedLabels;
  /** Hostname lookup for the zonename label */
  hostname?: () => string;
}

type MetricOf<K extends MetricKind> = Extract<Metric, { kind: K }>;

function isKind<K extends MetricKind>(metric: Metric, kind: K): metric is MetricOf<K> {
  return metric.kind === kind;
}

function register<T>(name: string, create: () => T): T {
  try {
    return create();
  } catch (err) {
    throw new MetricsStartupError(`failed to register ${name} metric`, err);
  }
}

/**
 * Create (register) the well-known metrics, each carrying the constant labels
 * derived from `config` and the local hostname.
 *
 * @throws MetricsStartupError when a metric name is already registered
 */
export function registerMetrics(config: MetricsConfig, options: RegisterMetricsOptions = {}): MetricsMap {
  const registry = options.registry ?? metricsRegistry;
  const labels = buildLabelSet(config, resolveHostname(options.hostname));

  const metrics: MetricsMap = new Map();

  // Requests received, broken down by request type (e.g. req=GET, req=POST).
  metrics.set(REQUEST_COUNT, {
    kind: 'counterVec',
    instrument: register(REQUEST_COUNT, () => new Counter({
      name: REQUEST_COUNT,
      help: 'Total number of requests handled.',
      labelNames: ['req'],
      registers: [registry]
    }))
  });

  // Objects processed, successfully or not.
  metrics.set(OBJECT_COUNT, {
    kind: 'counterVec',
    instrument: register(OBJECT_COUNT, () => new Counter({
      name: OBJECT_COUNT,
      help: 'Total number of objects processed.',
      labelNames: ['type'],
      registers: [registry]
    }))
  });

  // Errors by kind. Keep the set of kinds small: anything unexpected should
  // go into a generic bucket rather than a new one per message.
  metrics.set(ERROR_COUNT, {
    kind: 'counterVec',
    instrument: register(ERROR_COUNT, () => new Counter({
      name: ERROR_COUNT,
      help: 'Errors encountered.',
      labelNames: ['error'],
      registers: [registry]
    }))
  });

  metrics.set(BYTES_COUNT, {
    kind: 'counter',
    instrument: register(BYTES_COUNT, () => new Counter({
      name: BYTES_COUNT,
      help: 'Bytes transferred.',
      registers: [registry]
    }))
  });

  metrics.set(ASSIGNMENT_TIME, {
    kind: 'histogram',
    instrument: register(ASSIGNMENT_TIME, () => new Histogram({
      name: ASSIGNMENT_TIME,
      help: 'Assignment completion time',
      registers: [registry]
    }))
  });

  // Only once every registration has succeeded. Default labels apply to every
  // metric in the registry at exposition time, including ones registered later.
  registry.setDefaultLabels({ ...labels });
  (options.sharedLabels ?? processLabels).publish(labels);

  return metrics;
}

/**
 * Look up `key` expecting an instrument of `kind`. Missing keys and kind
 * mismatches are logged once and yield undefined.
 */
function resolve<K extends MetricKind>(metrics: MetricsMap, key: string, kind: K): MetricOf<K> | undefined {
  const metric = metrics.get(key);
  if (metric === undefined) {
    getLogger().error(`Invalid metric: ${key}`, { metric: key });
    return undefined;
  }
  const actual = metric.kind;
  if (!isKind(metric, kind)) {
    getLogger().error(`Invalid metric: ${key}`, { metric: key, expected: kind, actual });
    return undefined;
  }
  return metric;
}

function isCount(key: string, value: number): boolean {
  if (Number.isSafeInteger(value) && value >= 0) return true;
  getLogger().error('Invalid metric value', { metric: key, value });
  return false;
}

export function getMetric(metrics: MetricsMap, key: string): Metric | undefined {
  return metrics.get(key);
}

export function gaugeInc(metrics: MetricsMap, key: string): void {
  resolve(metrics, key, 'gauge')?.instrument.inc();
}

export function gaugeDec(metrics: MetricsMap, key: string): void {
  resolve(metrics, key, 'gauge')?.instrument.dec();
}

export function gaugeSet(metrics: MetricsMap, key: string, value: number): void {
  const metric = resolve(metrics, key, 'gauge');
  if (metric && isCount(key, value)) {
    metric.instrument.set(value);
  }
}

export function counterIncBy(metrics: MetricsMap, key: string, value: number): void {
  const metric = resolve(metrics, key, 'counter');
  if (metric && isCount(key, value)) {
    metric.instrument.inc(value);
  }
}

export function counterVecInc(metrics: MetricsMap, key: string, bucket?: string): void {
  counterVecIncBy(metrics, key, bucket, 1);
}

/**
 * Add `value` to the total bucket and, when given, to `bucket` as well; a
 * bucket is a subset of the total. Buckets come into existence on first use.
 */
export function counterVecIncBy(
  metrics: MetricsMap,
  key: string,
  bucket: string | undefined,
  value: number
): void {
  const metric = resolve(metrics, key, 'counterVec');
  if (!metric || !isCount(key, value)) return;

  metric.instrument.labels(TOTAL_BUCKET).inc(value);
  if (bucket !== undefined) {
    metric.instrument.labels(bucket).inc(value);
  }
}

export function histogramObserve(metrics: MetricsMap, key: string, value: number): void {
  const metric = resolve(metrics, key, 'histogram');
  if (!metric) return;

  if (!Number.isFinite(value)) {
    getLogger().error('Invalid metric value', { metric: key, value });
    return;
  }
  metric.instrument.observe(value);
}

export { metricsRegistry as registry, enableDefaultMetrics } from './registry.js';
export { SharedLabels, sharedLabels, getConstLabels, resolveHostname, buildLabelSet, UNKNOWN_HOSTNAME } from './labels.js';
export { MetricsStartupError } from './errors.js';
export { createMetricsApp, startServer } from './server.js';
export type { StartServerOptions } from './server.js';
export type { LabelSet, Metric, MetricKind, MetricsConfig, MetricsMap } from './types.js';

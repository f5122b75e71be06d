import type { Counter, Gauge, Histogram } from 'prom-client';

/**
 * Exporter address plus the identifiers every instrument is labelled with.
 */
export interface MetricsConfig {
  /** Exporter bind address (IP literal) */
  host: string;
  /** Exporter port */
  port: number;
  datacenter: string;
  service: string;
  server: string;
}

/**
 * Constant labels attached to every instrument.
 */
export interface LabelSet {
  service: string;
  server: string;
  datacenter: string;
  zonename: string;
}

/**
 * A registered instrument. Update operations switch on `kind`; an operation
 * applied to the wrong variant is logged and ignored.
 */
export type Metric =
  | { kind: 'counter'; instrument: Counter }
  | { kind: 'counterVec'; instrument: Counter<string> }
  | { kind: 'gauge'; instrument: Gauge }
  | { kind: 'histogram'; instrument: Histogram };

export type MetricKind = Metric['kind'];

export type MetricsMap = Map<string, Metric>;

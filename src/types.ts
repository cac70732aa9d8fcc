/**
 * Exposition-side type definitions: metric families as the registry gathers
 * them and the serializer writes them.
 */

/**
 * Label types - key-value pairs for metric dimensions
 */
export type Labels = Record<string, string>;

/**
 * Prometheus metric types
 */
export enum MetricType {
  Counter = 'counter',
  Gauge = 'gauge',
  Histogram = 'histogram',
}

/**
 * A single scalar sample.
 */
export interface MetricValue {
  /** Label key-value pairs identifying this series */
  labels: Labels;
  value: number;
}

/**
 * One cumulative histogram bucket.
 */
export interface HistogramBucket {
  /** Upper bound, `Infinity` for the last bucket */
  le: number;
  /** Observations less than or equal to `le` */
  count: number;
}

/**
 * Histogram sample with cumulative buckets ending in `+Inf`.
 */
export interface HistogramValue {
  labels: Labels;
  buckets: HistogramBucket[];
  sum: number;
  count: number;
}

export interface ScalarFamily {
  /** Metric name (must match [a-zA-Z_:][a-zA-Z0-9_:]*) */
  name: string;
  help: string;
  type: MetricType.Counter | MetricType.Gauge;
  metrics: MetricValue[];
}

export interface HistogramFamily {
  name: string;
  help: string;
  type: MetricType.Histogram;
  metrics: HistogramValue[];
}

/**
 * Metric family - every series sharing one metric name.
 */
export type MetricFamily = ScalarFamily | HistogramFamily;

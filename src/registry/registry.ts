import { CollectionError, GatherError } from '../errors';
import { isValidMetricName } from '../labels';
import { formatLabels } from '../serialization';
import { MetricType } from '../types';
import type { Labels, MetricFamily, MetricValue } from '../types';

export interface RegistryConfig {
  /** Labels added to every series that does not already carry the key */
  defaultLabels?: Labels;
}

/**
 * Options for a native counter or gauge.
 */
export interface MetricOptions {
  /** Metric name (must match [a-zA-Z_:][a-zA-Z0-9_:]*) */
  name: string;
  help: string;
  /** Constant labels of the single series */
  labels?: Labels;
}

/**
 * Produces metric families on every gather.
 */
export interface Collector {
  collect(): MetricFamily[];
}

export interface Counter {
  inc(value?: number): void;
  get(): number;
}

export interface Gauge {
  set(value: number): void;
  inc(value?: number): void;
  dec(value?: number): void;
  get(): number;
}

class CounterImpl implements Counter {
  private value = 0;

  constructor(
    readonly name: string,
    readonly help: string,
    private readonly labels: Labels
  ) {}

  inc(value: number = 1): void {
    if (value < 0) {
      throw new Error('Counter cannot be decreased');
    }
    this.value += value;
  }

  get(): number {
    return this.value;
  }

  collect(): MetricFamily {
    return {
      name: this.name,
      help: this.help,
      type: MetricType.Counter,
      metrics: [{ labels: { ...this.labels }, value: this.value }],
    };
  }
}

class GaugeImpl implements Gauge {
  private value = 0;

  constructor(
    readonly name: string,
    readonly help: string,
    private readonly labels: Labels
  ) {}

  set(value: number): void {
    this.value = value;
  }

  inc(value: number = 1): void {
    this.value += value;
  }

  dec(value: number = 1): void {
    this.value -= value;
  }

  get(): number {
    return this.value;
  }

  collect(): MetricFamily {
    return {
      name: this.name,
      help: this.help,
      type: MetricType.Gauge,
      metrics: [{ labels: { ...this.labels }, value: this.value }],
    };
  }
}

/**
 * Central registry gathering native metrics and collectors for exposition.
 *
 * Several exporters and directly instrumented code may share one registry.
 */
export class MetricsRegistry {
  private readonly counters: Map<string, CounterImpl> = new Map();
  private readonly gauges: Map<string, GaugeImpl> = new Map();
  private readonly collectors: Set<Collector> = new Set();
  private readonly defaultLabels: Labels;

  constructor(config: RegistryConfig = {}) {
    this.defaultLabels = config.defaultLabels ?? {};
  }

  /**
   * Register a collector. Registering the same collector again is a no-op.
   */
  register(collector: Collector): void {
    this.collectors.add(collector);
  }

  unregister(collector: Collector): boolean {
    return this.collectors.delete(collector);
  }

  /**
   * Create or get a counter.
   */
  counter(options: MetricOptions): Counter {
    assertMetricName(options.name);

    const existing = this.counters.get(options.name);
    if (existing) {
      return existing;
    }
    if (this.gauges.has(options.name)) {
      throw new Error(`Metric ${options.name} already registered as Gauge`);
    }

    const counter = new CounterImpl(options.name, options.help, options.labels ?? {});
    this.counters.set(options.name, counter);
    return counter;
  }

  /**
   * Create or get a gauge.
   */
  gauge(options: MetricOptions): Gauge {
    assertMetricName(options.name);

    const existing = this.gauges.get(options.name);
    if (existing) {
      return existing;
    }
    if (this.counters.has(options.name)) {
      throw new Error(`Metric ${options.name} already registered as Counter`);
    }

    const gauge = new GaugeImpl(options.name, options.help, options.labels ?? {});
    this.gauges.set(options.name, gauge);
    return gauge;
  }

  /**
   * Gather all metrics for serialization.
   *
   * Families come back sorted by name and series sorted by label values.
   * Inconsistent input (a name gathered with two types or help texts, the
   * same series twice, a failing collector) is left out and reported in a
   * GatherError that carries the consistent families.
   *
   * @throws GatherError
   */
  gather(): MetricFamily[] {
    const errors: Error[] = [];
    const byName = new Map<string, MetricFamily>();

    const sources: MetricFamily[] = [];
    for (const counter of this.counters.values()) sources.push(counter.collect());
    for (const gauge of this.gauges.values()) sources.push(gauge.collect());
    for (const collector of this.collectors) {
      try {
        sources.push(...collector.collect());
      } catch (error) {
        errors.push(
          new CollectionError(
            `collector failed: ${error instanceof Error ? error.message : String(error)}`,
            error instanceof Error ? { cause: error } : undefined
          )
        );
      }
    }

    for (const family of sources) {
      const merged = byName.get(family.name);
      if (!merged) {
        byName.set(family.name, this.withDefaultLabels(copyFamily(family)));
        continue;
      }
      const conflict = describeConflict(merged, family);
      if (conflict) {
        errors.push(new CollectionError(conflict, { metricName: family.name }));
        continue;
      }
      appendMetrics(merged, this.withDefaultLabels(copyFamily(family)));
    }

    const families = [...byName.values()].sort((a, b) => compareStrings(a.name, b.name));
    for (const family of families) {
      errors.push(...dedupeSeries(family));
    }

    if (errors.length > 0) {
      throw new GatherError(errors, families);
    }
    return families;
  }

  /**
   * Clear native metrics and collectors.
   */
  clear(): void {
    this.counters.clear();
    this.gauges.clear();
    this.collectors.clear();
  }

  private withDefaultLabels(family: MetricFamily): MetricFamily {
    for (const metric of family.metrics) {
      for (const [key, value] of Object.entries(this.defaultLabels)) {
        if (!(key in metric.labels)) {
          metric.labels[key] = value;
        }
      }
    }
    return family;
  }
}

function assertMetricName(name: string): void {
  if (!isValidMetricName(name)) {
    throw new Error(`Invalid metric name: "${name}"`);
  }
}

function copyFamily(family: MetricFamily): MetricFamily {
  if (family.type === MetricType.Histogram) {
    return {
      ...family,
      metrics: family.metrics.map((metric) => ({
        ...metric,
        labels: { ...metric.labels },
        buckets: metric.buckets.map((bucket) => ({ ...bucket })),
      })),
    };
  }
  return {
    ...family,
    metrics: family.metrics.map((metric) => ({ ...metric, labels: { ...metric.labels } })),
  };
}

function describeConflict(existing: MetricFamily, incoming: MetricFamily): string | undefined {
  if (existing.type !== incoming.type) {
    return `collected metric "${incoming.name}" has type ${incoming.type} but should have ${existing.type}`;
  }
  if (existing.help !== incoming.help) {
    return `collected metric "${incoming.name}" has help "${incoming.help}" but should have "${existing.help}"`;
  }
  return undefined;
}

function appendMetrics(target: MetricFamily, source: MetricFamily): void {
  if (target.type === MetricType.Histogram && source.type === MetricType.Histogram) {
    target.metrics.push(...source.metrics);
  } else if (target.type !== MetricType.Histogram && source.type !== MetricType.Histogram) {
    target.metrics.push(...source.metrics);
  }
}

/**
 * Sorts the series of a family and drops repeats of a label set.
 */
function dedupeSeries(family: MetricFamily): Error[] {
  const errors: Error[] = [];
  const seen = new Set<string>();

  const keep = <T extends { labels: Labels }>(metrics: T[]): T[] => {
    const kept: T[] = [];
    for (const metric of [...metrics].sort((a, b) => compareLabels(a.labels, b.labels))) {
      const key = formatLabels(metric.labels);
      if (seen.has(key)) {
        errors.push(
          new CollectionError(
            `collected metric ${family.name}${key} was collected before with the same name and label values`,
            { metricName: family.name }
          )
        );
        continue;
      }
      seen.add(key);
      kept.push(metric);
    }
    return kept;
  };

  if (family.type === MetricType.Histogram) {
    family.metrics = keep(family.metrics);
  } else {
    family.metrics = keep<MetricValue>(family.metrics);
  }
  return errors;
}

/**
 * Orders label sets by their values, taken in label name order.
 */
export function compareLabels(a: Labels, b: Labels): number {
  const aKeys = Object.keys(a).sort();
  const bKeys = Object.keys(b).sort();
  const length = Math.min(aKeys.length, bKeys.length);

  for (let i = 0; i < length; i++) {
    const aKey = aKeys[i] ?? '';
    const bKey = bKeys[i] ?? '';
    if (aKey !== bKey) {
      return compareStrings(aKey, bKey);
    }
    const byValue = compareStrings(a[aKey] ?? '', b[bKey] ?? '');
    if (byValue !== 0) {
      return byValue;
    }
  }

  return aKeys.length - bKeys.length;
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

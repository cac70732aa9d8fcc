/**
 * Prometheus exporter - translates view rows into metric families on every
 * scrape.
 *
 * Counts and sums become counters, last values gauges, and distributions
 * histograms whose per-bucket counts are turned into cumulative `le`
 * buckets. Series labels are the row's tags, overlaid by the constant
 * labels, overlaid by the resource labels.
 */

import type { Server } from 'node:http';
import { ExporterConfig } from '../config';
import type { ExporterConfigOptions } from '../config';
import { CollectionError, formatError } from '../errors';
import { MetricsHandler } from '../http/handler';
import { createMetricsServer } from '../http/server';
import { buildMetricName, sanitizeLabelKeys, sanitizeName } from '../labels';
import { createLogger } from '../logging';
import type { Logger } from '../logging';
import { MetricsRegistry } from '../registry';
import type { Collector } from '../registry';
import { MetricType } from '../types';
import type { HistogramBucket, HistogramValue, Labels, MetricFamily, MetricValue } from '../types';
import { AggregationType, distributionSum } from '../view';
import type { DistributionData, Meter, Row, View } from '../view';
import { defaultMeter } from '../view';

export type PrometheusExporterOptions = ExporterConfigOptions & {
  /** Meter whose views are exported (default: the default meter) */
  meter?: Meter;
  /** Registry shared with other collectors; a private one otherwise */
  registry?: MetricsRegistry;
  /** Called with every error met while translating a view */
  onError?: (error: Error) => void;
  logger?: Logger;
};

/**
 * Name, type, help and label keys of one exported metric.
 */
export interface MetricDescriptor {
  readonly name: string;
  readonly help: string;
  readonly type: MetricType;
  /** Sorted, sanitized */
  readonly labelKeys: readonly string[];
}

export class PrometheusExporter implements Collector {
  readonly config: ExporterConfig;
  readonly registry: MetricsRegistry;
  private readonly meter: Meter;
  private readonly logger: Logger;
  private readonly onError: (error: Error) => void;
  private readonly descriptors: Map<string, MetricDescriptor> = new Map();
  private readonly overlay: Labels;

  /**
   * @throws ConfigurationError if an option is invalid
   */
  constructor(options: PrometheusExporterOptions = {}) {
    this.config = ExporterConfig.create(options);
    this.meter = options.meter ?? defaultMeter();
    this.registry = options.registry ?? new MetricsRegistry();
    this.logger = options.logger ?? createLogger({ prefix: 'prometheus-exporter' });
    this.onError =
      options.onError ??
      ((error: Error) => this.logger.error('failed to export view', { error: formatError(error) }));

    // Resource labels are applied after, and so override, constant labels.
    this.overlay = {
      ...sanitizeLabelKeys(this.config.constLabels),
      ...sanitizeLabelKeys(this.config.resource?.labels ?? {}),
    };

    this.registry.register(this);
  }

  /**
   * Translate every registered view of the meter into a metric family.
   * Views without rows are skipped.
   */
  collect(): MetricFamily[] {
    const families: MetricFamily[] = [];
    const live = new Set<string>();

    for (const view of this.meter.views()) {
      try {
        const rows = this.meter.collectedRows(view.name);
        if (rows.length === 0) continue;
        families.push(this.toFamily(view, rows, live));
      } catch (error) {
        this.onError(
          new CollectionError(`cannot export view "${view.name}"`, {
            metricName: view.name,
            cause: error instanceof Error ? error : undefined,
          })
        );
      }
    }

    // Descriptors of unregistered or idle views
    for (const id of this.descriptors.keys()) {
      if (!live.has(id)) this.descriptors.delete(id);
    }

    return families;
  }

  /**
   * Number of (metric name, label keys) descriptors used by the last collection.
   */
  get descriptorCount(): number {
    return this.descriptors.size;
  }

  /**
   * Scrape handler gathering from this exporter's registry.
   */
  handler(): MetricsHandler {
    return new MetricsHandler(this.registry, {
      errorHandling: this.config.errorHandling,
      enableCompression: this.config.enableCompression,
      compressionThreshold: this.config.compressionThreshold,
      logger: this.logger,
    });
  }

  /**
   * node:http server serving `config.path`; the caller starts and stops it.
   */
  createServer(): Server {
    return createMetricsServer(this.handler(), { path: this.config.path });
  }

  /**
   * Starts a server on `config.port` and resolves once it is listening.
   * The caller closes the returned server.
   */
  listen(host?: string): Promise<Server> {
    const server = this.createServer();
    return new Promise((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.config.port, host, () => {
        server.off('error', reject);
        this.logger.info('serving metrics', { port: this.config.port, path: this.config.path });
        resolve(server);
      });
    });
  }

  /**
   * Stop exporting; the registry no longer gathers from this exporter.
   */
  close(): void {
    this.registry.unregister(this);
  }

  /**
   * @throws CollectionError if two tag keys of the view sanitize to one label
   */
  private toFamily(view: View, rows: readonly Row[], live: Set<string>): MetricFamily {
    const tagLabelKeys = view.tagKeys.map((key) => sanitizeName(key.name));
    const collision = tagLabelKeys.find((key, i) => tagLabelKeys.indexOf(key) !== i);
    if (collision !== undefined) {
      throw new CollectionError(`tag keys of view "${view.name}" map to the same label "${collision}"`, {
        metricName: view.name,
      });
    }

    const descriptor = this.descriptor(
      buildMetricName(this.config.namespace, view.name),
      view.description,
      metricType(view),
      [...tagLabelKeys, ...Object.keys(this.overlay)],
      live
    );

    if (descriptor.type === MetricType.Histogram) {
      return {
        name: descriptor.name,
        help: descriptor.help,
        type: MetricType.Histogram,
        metrics: rows.flatMap((row) =>
          row.data.type === AggregationType.Distribution
            ? [toHistogramValue(row.data, this.labelsFor(row, descriptor))]
            : []
        ),
      };
    }

    return {
      name: descriptor.name,
      help: descriptor.help,
      type: descriptor.type === MetricType.Gauge ? MetricType.Gauge : MetricType.Counter,
      metrics: rows.flatMap((row): MetricValue[] =>
        row.data.type === AggregationType.Distribution
          ? []
          : [{ labels: this.labelsFor(row, descriptor), value: row.data.value }]
      ),
    };
  }

  /**
   * Looks up the descriptor for a (name, label keys) pair, creating it once.
   */
  private descriptor(
    name: string,
    help: string,
    type: MetricType,
    labelKeys: string[],
    live: Set<string>
  ): MetricDescriptor {
    const sortedKeys = [...new Set(labelKeys)].sort();
    const id = `${name}\u0000${sortedKeys.join('\u0000')}`;
    live.add(id);

    let descriptor = this.descriptors.get(id);
    if (!descriptor || descriptor.help !== help || descriptor.type !== type) {
      descriptor = Object.freeze({ name, help, type, labelKeys: Object.freeze(sortedKeys) });
      this.descriptors.set(id, descriptor);
    }
    return descriptor;
  }

  /**
   * One label per descriptor key; overlay labels win over tags.
   */
  private labelsFor(row: Row, descriptor: MetricDescriptor): Labels {
    const tagLabels: Labels = {};
    for (const tag of row.tags) {
      tagLabels[sanitizeName(tag.key.name)] = tag.value;
    }

    const labels: Labels = {};
    for (const key of descriptor.labelKeys) {
      labels[key] = this.overlay[key] ?? tagLabels[key] ?? '';
    }
    return labels;
  }
}

function metricType(view: View): MetricType {
  switch (view.aggregation.type) {
    case AggregationType.Count:
    case AggregationType.Sum:
      return MetricType.Counter;
    case AggregationType.LastValue:
      return MetricType.Gauge;
    case AggregationType.Distribution:
      return MetricType.Histogram;
  }
}

/**
 * Converts per-bucket counts into cumulative buckets ending in `+Inf`.
 *
 * @example
 * ```typescript
 * // bounds [1, 5], countPerBucket [1, 2, 4]
 * // => le=1: 1, le=5: 3, le=+Inf: 7
 * ```
 */
export function toHistogramValue(data: DistributionData, labels: Labels): HistogramValue {
  const buckets: HistogramBucket[] = [];
  let cumulative = 0;

  data.bounds.forEach((bound, i) => {
    cumulative += data.countPerBucket[i] ?? 0;
    buckets.push({ le: bound, count: cumulative });
  });
  buckets.push({ le: Number.POSITIVE_INFINITY, count: data.count });

  return {
    labels,
    buckets,
    sum: distributionSum(data),
    count: data.count,
  };
}

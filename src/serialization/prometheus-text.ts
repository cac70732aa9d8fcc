import { MetricType } from '../types';
import type { HistogramValue, Labels, MetricFamily, MetricValue } from '../types';

export const PROMETHEUS_CONTENT_TYPE = 'text/plain; version=0.0.4; charset=utf-8';

/**
 * Serializes metrics to Prometheus text exposition format v0.0.4.
 * See: https://prometheus.io/docs/instrumenting/exposition_formats/
 */
export class PrometheusTextSerializer {
  readonly contentType = PROMETHEUS_CONTENT_TYPE;

  serialize(families: readonly MetricFamily[]): string {
    let output = '';
    for (const family of families) {
      output += this.serializeFamily(family);
    }
    return output;
  }

  private serializeFamily(family: MetricFamily): string {
    let output = `# HELP ${family.name} ${escapeHelpText(family.help)}\n`;
    output += `# TYPE ${family.name} ${family.type}\n`;

    if (family.type === MetricType.Histogram) {
      for (const metric of family.metrics) {
        output += this.serializeHistogram(family.name, metric);
      }
    } else {
      for (const metric of family.metrics) {
        output += this.serializeMetric(family.name, metric);
      }
    }

    return output;
  }

  private serializeMetric(name: string, metric: MetricValue): string {
    return `${name}${formatLabels(metric.labels)} ${formatValue(metric.value)}\n`;
  }

  private serializeHistogram(name: string, histogram: HistogramValue): string {
    let output = '';

    for (const bucket of histogram.buckets) {
      const labels = formatLabelsWithLe(histogram.labels, bucket.le);
      output += `${name}_bucket${labels} ${formatValue(bucket.count)}\n`;
    }

    const baseLabels = formatLabels(histogram.labels);
    output += `${name}_sum${baseLabels} ${formatValue(histogram.sum)}\n`;
    output += `${name}_count${baseLabels} ${formatValue(histogram.count)}\n`;

    return output;
  }
}

/**
 * Escape help text according to Prometheus format.
 * Backslashes and newlines must be escaped.
 */
export function escapeHelpText(text: string): string {
  return text
    .replace(/\\/g, '\\\\')
    .replace(/\n/g, '\\n');
}

/**
 * Escape label value according to Prometheus format.
 * Backslashes, quotes, and newlines must be escaped.
 */
export function escapeLabelValue(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n');
}

/**
 * Format labels as Prometheus label string, keys in sorted order.
 * Returns empty string if no labels, otherwise {label1="value1",label2="value2"}
 */
export function formatLabels(labels: Labels): string {
  const keys = Object.keys(labels);
  if (keys.length === 0) {
    return '';
  }

  keys.sort();

  const labelPairs = keys.map((key) => `${key}="${escapeLabelValue(labels[key] ?? '')}"`);
  return `{${labelPairs.join(',')}}`;
}

/**
 * Format labels with additional 'le' label for histogram buckets.
 */
export function formatLabelsWithLe(labels: Labels, le: number): string {
  return formatLabels({ ...labels, le: formatValue(le) });
}

/**
 * Format a numeric value according to Prometheus format.
 * Handles NaN, +Inf, -Inf, and regular numbers.
 */
export function formatValue(value: number): string {
  if (Number.isNaN(value)) {
    return 'NaN';
  }

  if (!Number.isFinite(value)) {
    return value > 0 ? '+Inf' : '-Inf';
  }

  return value.toString();
}

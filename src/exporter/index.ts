/**
 * Exporters - translate registered views into an exposition format.
 */

export {
  PrometheusExporter,
  toHistogramValue,
  type MetricDescriptor,
  type PrometheusExporterOptions,
} from './prometheus';

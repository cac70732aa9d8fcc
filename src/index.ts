/**
 * View statistics
 *
 * Aggregates recorded measurements into per-tag-combination statistics
 * (counts, sums, last values, distributions) and exposes them to Prometheus.
 */

// Re-export exposition types
export * from './types';

// Re-export tags and measures
export * from './tags';
export * from './stats';

// Re-export views and the meter
export * from './view';

// Re-export the Prometheus exporter
export * from './exporter';

// Re-export registry components
export {
  MetricsRegistry,
  compareLabels,
  type Collector,
  type Counter,
  type Gauge,
  type MetricOptions,
  type RegistryConfig,
} from './registry';

// Re-export serialization components
export {
  PrometheusTextSerializer,
  PROMETHEUS_CONTENT_TYPE,
  escapeHelpText,
  escapeLabelValue,
  formatLabels,
  formatValue,
} from './serialization';

// Re-export HTTP components
export {
  MetricsHandler,
  createMetricsServer,
  handleHealth,
  ERROR_BODY_PREFIX,
  type Gatherer,
  type HandlerConfig,
  type HealthResponse,
  type MetricsRequest,
  type MetricsResponse,
  type ServerOptions,
} from './http';

// Re-export label utilities
export { sanitizeName, buildMetricName, isValidMetricName } from './labels';

// Re-export resources
export {
  mergeResources,
  parseResourceLabels,
  resourceFromEnv,
  ENV_RESOURCE_TYPE,
  ENV_RESOURCE_LABELS,
  type Resource,
} from './resource';

// Re-export configuration
export {
  ExporterConfig,
  ExporterConfigBuilder,
  exporterConfigSchema,
  DEFAULT_METRICS_PATH,
  DEFAULT_METRICS_PORT,
  DEFAULT_COMPRESSION_THRESHOLD,
  type ErrorHandling,
  type ExporterConfigOptions,
} from './config';

// Re-export logging
export {
  ConsoleLogger,
  NoopLogger,
  createLogger,
  type Logger,
  type LogConfig,
  type LogLevel,
} from './logging';

// Re-export error types
export {
  MetricsError,
  ConfigurationError,
  ValidationError,
  NegativeBucketBoundsError,
  RegistrationError,
  ViewNotFoundError,
  CollectionError,
  GatherError,
  isRetryableError,
  isMetricsError,
  getErrorCategory,
  formatError,
  type ErrorCategory,
} from './errors';

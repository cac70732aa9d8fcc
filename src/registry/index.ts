/**
 * The exposition registry: native metrics plus collectors, gathered per scrape.
 */

export {
  MetricsRegistry,
  compareLabels,
  type Collector,
  type Counter,
  type Gauge,
  type MetricOptions,
  type RegistryConfig,
} from './registry';

/**
 * Serialization of gathered metric families.
 */

export {
  PrometheusTextSerializer,
  PROMETHEUS_CONTENT_TYPE,
  escapeHelpText,
  escapeLabelValue,
  formatLabels,
  formatLabelsWithLe,
  formatValue,
} from './prometheus-text';

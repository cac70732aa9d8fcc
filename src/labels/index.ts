/**
 * Label utilities: Prometheus name validation and sanitization.
 */

export { isValidMetricName } from './validation';
export {
  sanitizeName,
  sanitizeLabelKeys,
  buildMetricName,
  MAX_NAME_LENGTH,
} from './sanitization';

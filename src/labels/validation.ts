/**
 * Metric name validation per the Prometheus naming rules.
 */

/**
 * Metric names must match [a-zA-Z_:][a-zA-Z0-9_:]*
 *
 * @example
 * ```typescript
 * isValidMetricName('http_requests_total') // true
 * isValidMetricName('node_cpu:seconds')    // true
 * isValidMetricName('requests-total')      // false
 * ```
 */
export function isValidMetricName(name: string): boolean {
  return /^[a-zA-Z_:][a-zA-Z0-9_:]*$/.test(name);
}

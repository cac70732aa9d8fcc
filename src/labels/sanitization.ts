/**
 * Name sanitization for metric names and label keys.
 */

/**
 * Names longer than this are truncated before sanitization.
 */
export const MAX_NAME_LENGTH = 100;

/**
 * Turns an arbitrary view name or tag key into a Prometheus-compatible name.
 *
 * Every character other than an ASCII letter or digit becomes `_`. A name
 * starting with a digit is prefixed with `key_`, one starting with `_` with
 * `key`.
 *
 * @example
 * ```typescript
 * sanitizeName('cash/register') // 'cash_register'
 * sanitizeName('key/1')         // 'key_1'
 * sanitizeName('9lives')        // 'key_9lives'
 * sanitizeName('_private')      // 'key_private'
 * sanitizeName('')              // ''
 * ```
 */
export function sanitizeName(name: string): string {
  if (name.length === 0) {
    return name;
  }

  let sanitized = name.length > MAX_NAME_LENGTH ? name.slice(0, MAX_NAME_LENGTH) : name;
  sanitized = sanitized.replace(/[^a-zA-Z0-9]/g, '_');

  if (/^[0-9]/.test(sanitized)) {
    sanitized = 'key_' + sanitized;
  }
  if (sanitized.startsWith('_')) {
    sanitized = 'key' + sanitized;
  }

  return sanitized;
}

/**
 * Sanitizes every key of a label set. On keys that collide after
 * sanitization the later entry wins.
 */
export function sanitizeLabelKeys(labels: Record<string, string>): Record<string, string> {
  const sanitized: Record<string, string> = {};
  for (const [key, value] of Object.entries(labels)) {
    sanitized[sanitizeName(key)] = value;
  }
  return sanitized;
}

/**
 * Joins a namespace and a name and sanitizes the result.
 *
 * @example
 * ```typescript
 * buildMetricName('app', 'http/latency') // 'app_http_latency'
 * buildMetricName('', 'http/latency')    // 'http_latency'
 * ```
 */
export function buildMetricName(namespace: string | undefined, name: string): string {
  return sanitizeName(namespace ? `${namespace}_${name}` : name);
}

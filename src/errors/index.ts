/**
 * Error types for view aggregation and exposition.
 *
 * Registration problems are the only errors surfaced synchronously to
 * application code. Recording never throws; export problems are reported
 * in-band in the scrape response.
 */

/**
 * Error category for classification
 */
export type ErrorCategory =
  | 'configuration'
  | 'validation'
  | 'registration'
  | 'collection';

/**
 * Base error class for all metrics errors
 */
export abstract class MetricsError extends Error {
  abstract readonly category: ErrorCategory;
  abstract readonly isRetryable: boolean;
  readonly statusCode?: number;

  constructor(
    message: string,
    options?: { statusCode?: number | undefined; cause?: Error | undefined }
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = this.constructor.name;
    if (options?.statusCode !== undefined) {
      this.statusCode = options.statusCode;
    }
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Configuration error - invalid exporter or environment configuration
 */
export class ConfigurationError extends MetricsError {
  readonly category = 'configuration' as const;
  readonly isRetryable = false;

  constructor(message: string, options?: { cause?: Error | undefined }) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
  }
}

/**
 * Validation error - invalid tag keys, tag values or view names
 */
export class ValidationError extends MetricsError {
  readonly category = 'validation' as const;
  readonly isRetryable = false;
  readonly field?: string;

  constructor(
    message: string,
    options?: { field?: string | undefined; cause?: Error | undefined }
  ) {
    super(message, { statusCode: 400, ...(options?.cause ? { cause: options.cause } : {}) });
    if (options?.field !== undefined) {
      this.field = options.field;
    }
  }
}

/**
 * A distribution was declared with a negative bucket boundary.
 */
export class NegativeBucketBoundsError extends MetricsError {
  readonly category = 'validation' as const;
  readonly isRetryable = false;
  readonly bounds: readonly number[];

  constructor(bounds: readonly number[]) {
    super(`negative bucket bounds not supported: [${bounds.join(', ')}]`);
    this.bounds = [...bounds];
  }
}

/**
 * Registration error - a different view is already bound to the name
 */
export class RegistrationError extends MetricsError {
  readonly category = 'registration' as const;
  readonly isRetryable = false;
  readonly viewName?: string;

  constructor(
    message: string,
    options?: { viewName?: string | undefined; cause?: Error | undefined }
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    if (options?.viewName !== undefined) {
      this.viewName = options.viewName;
    }
  }
}

/**
 * Lookup of data for a view that is not registered
 */
export class ViewNotFoundError extends MetricsError {
  readonly category = 'registration' as const;
  readonly isRetryable = false;
  readonly viewName: string;

  constructor(viewName: string) {
    super(`cannot retrieve data; view "${viewName}" is not registered`, { statusCode: 404 });
    this.viewName = viewName;
  }
}

/**
 * Collection error - failed to collect metric values
 */
export class CollectionError extends MetricsError {
  readonly category = 'collection' as const;
  readonly isRetryable = true;
  readonly metricName?: string;

  constructor(
    message: string,
    options?: { metricName?: string | undefined; statusCode?: number | undefined; cause?: Error | undefined }
  ) {
    const statusCode = options?.statusCode ?? 500;
    super(message, { statusCode, ...(options?.cause ? { cause: options.cause } : {}) });
    if (options?.metricName !== undefined) {
      this.metricName = options.metricName;
    }
  }
}

/**
 * Several collection problems found during one gather.
 *
 * The families that were gathered consistently travel with the error so a
 * caller can still serve them.
 */
export class GatherError<F = unknown> extends MetricsError {
  readonly category = 'collection' as const;
  readonly isRetryable = true;
  readonly errors: readonly Error[];
  readonly families: readonly F[];

  constructor(errors: readonly Error[], families: readonly F[]) {
    super(formatMultiError(errors), { statusCode: 500 });
    this.errors = [...errors];
    this.families = [...families];
  }
}

function formatMultiError(errors: readonly Error[]): string {
  const lines = errors.map((error) => `* ${error.message}`);
  return `${errors.length} error(s) occurred:\n${lines.join('\n')}`;
}

/**
 * Check if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof MetricsError) {
    return error.isRetryable;
  }
  return false;
}

/**
 * Check if an error is a metrics error
 */
export function isMetricsError(error: unknown): error is MetricsError {
  return error instanceof MetricsError;
}

/**
 * Get the error category from an error
 */
export function getErrorCategory(error: unknown): ErrorCategory | undefined {
  if (error instanceof MetricsError) {
    return error.category;
  }
  return undefined;
}

/**
 * Format error for logging
 */
export function formatError(error: unknown): string {
  if (error instanceof MetricsError) {
    const parts = [
      `[${error.category.toUpperCase()}]`,
      error.name,
      ':',
      error.message,
    ];

    if (error.statusCode) {
      parts.push(`(HTTP ${error.statusCode})`);
    }

    return parts.join(' ');
  }

  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }

  return String(error);
}

/**
 * Configuration for the Prometheus exporter and its HTTP endpoint.
 *
 * Options are validated with a zod schema; anything invalid surfaces as a
 * ConfigurationError at construction.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors';
import { isValidMetricName } from '../labels';
import { resourceFromEnv } from '../resource';
import type { Resource } from '../resource';
import type { Labels } from '../types';

export const DEFAULT_METRICS_PATH = '/metrics';
export const DEFAULT_METRICS_PORT = 9464;
export const DEFAULT_COMPRESSION_THRESHOLD = 1024;

export type ErrorHandling = 'http-error' | 'continue';

const resourceSchema = z.object({
  type: z.string().optional(),
  labels: z.record(z.string()).default({}),
});

export const exporterConfigSchema = z.object({
  namespace: z
    .string()
    .refine((value) => value === '' || isValidMetricName(value), {
      message: 'Namespace must match [a-zA-Z_:][a-zA-Z0-9_:]*',
    })
    .default(''),
  constLabels: z.record(z.string()).default({}),
  resource: resourceSchema.optional(),
  errorHandling: z.enum(['http-error', 'continue']).default('http-error'),
  path: z.string().startsWith('/', { message: 'Metrics path must start with "/"' }).default(DEFAULT_METRICS_PATH),
  /** 0 binds an ephemeral port */
  port: z.number().int().min(0).max(65535).default(DEFAULT_METRICS_PORT),
  enableCompression: z.boolean().default(true),
  compressionThreshold: z.number().int().nonnegative().default(DEFAULT_COMPRESSION_THRESHOLD),
});

export type ExporterConfigOptions = z.input<typeof exporterConfigSchema>;

/**
 * Validated exporter configuration
 */
export class ExporterConfig {
  readonly namespace: string;
  readonly constLabels: Labels;
  readonly resource: Resource | undefined;
  readonly errorHandling: ErrorHandling;
  readonly path: string;
  readonly port: number;
  readonly enableCompression: boolean;
  readonly compressionThreshold: number;

  private constructor(values: z.output<typeof exporterConfigSchema>) {
    this.namespace = values.namespace;
    this.constLabels = { ...values.constLabels };
    this.resource = values.resource
      ? { ...(values.resource.type ? { type: values.resource.type } : {}), labels: { ...values.resource.labels } }
      : undefined;
    this.errorHandling = values.errorHandling;
    this.path = values.path;
    this.port = values.port;
    this.enableCompression = values.enableCompression;
    this.compressionThreshold = values.compressionThreshold;
  }

  /**
   * Create configuration from options
   *
   * @throws ConfigurationError if an option is invalid
   */
  static create(options: ExporterConfigOptions = {}): ExporterConfig {
    const result = exporterConfigSchema.safeParse(options);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => {
        const path = issue.path.join('.');
        return path ? `${path}: ${issue.message}` : issue.message;
      });
      throw new ConfigurationError(`Invalid exporter configuration: ${issues.join('; ')}`, {
        cause: result.error,
      });
    }
    return new ExporterConfig(result.data);
  }

  /**
   * Create configuration from environment variables
   *
   * Environment variables:
   * - METRICS_NAMESPACE: Prefix for every metric name
   * - METRICS_CONST_LABELS: JSON object of labels applied to every series
   * - METRICS_PATH: HTTP path for the metrics endpoint
   * - METRICS_PORT: Port to listen on
   * - METRICS_ERROR_HANDLING: 'http-error' or 'continue'
   * - METRICS_ENABLE_COMPRESSION: Enable gzip compression (true/false)
   * - METRICS_COMPRESSION_THRESHOLD: Compression threshold in bytes
   * - RESOURCE_TYPE, RESOURCE_LABELS: Resource describing this process
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): ExporterConfig {
    const options: ExporterConfigOptions = {};

    if (env['METRICS_NAMESPACE']) {
      options.namespace = env['METRICS_NAMESPACE'];
    }

    if (env['METRICS_CONST_LABELS']) {
      options.constLabels = parseLabelsJson('METRICS_CONST_LABELS', env['METRICS_CONST_LABELS']);
    }

    if (env['METRICS_PATH']) {
      options.path = env['METRICS_PATH'];
    }

    if (env['METRICS_PORT']) {
      options.port = parseInteger('METRICS_PORT', env['METRICS_PORT']);
    }

    const errorHandling = env['METRICS_ERROR_HANDLING'];
    if (errorHandling) {
      if (errorHandling !== 'http-error' && errorHandling !== 'continue') {
        throw new ConfigurationError("METRICS_ERROR_HANDLING must be 'http-error' or 'continue'");
      }
      options.errorHandling = errorHandling;
    }

    if (env['METRICS_ENABLE_COMPRESSION']) {
      options.enableCompression = env['METRICS_ENABLE_COMPRESSION'] === 'true';
    }

    if (env['METRICS_COMPRESSION_THRESHOLD']) {
      options.compressionThreshold = parseInteger(
        'METRICS_COMPRESSION_THRESHOLD',
        env['METRICS_COMPRESSION_THRESHOLD']
      );
    }

    const resource = resourceFromEnv(env);
    if (resource) {
      options.resource = resource;
    }

    return ExporterConfig.create(options);
  }
}

function parseInteger(variable: string, raw: string): number {
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigurationError(`${variable} must be a valid integer`);
  }
  return value;
}

function parseLabelsJson(variable: string, raw: string): Labels {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`${variable} must be valid JSON`, {
      cause: error instanceof Error ? error : undefined,
    });
  }

  const result = z.record(z.string()).safeParse(parsed);
  if (!result.success) {
    throw new ConfigurationError(`${variable} must be a JSON object of string values`);
  }
  return result.data;
}

/**
 * Builder for creating exporter configuration with fluent API
 */
export class ExporterConfigBuilder {
  private options: ExporterConfigOptions = {};

  namespace(namespace: string): this {
    this.options.namespace = namespace;
    return this;
  }

  constLabels(labels: Labels): this {
    this.options.constLabels = { ...labels };
    return this;
  }

  addConstLabel(key: string, value: string): this {
    this.options.constLabels = { ...(this.options.constLabels ?? {}), [key]: value };
    return this;
  }

  resource(resource: Resource): this {
    this.options.resource = resource;
    return this;
  }

  errorHandling(mode: ErrorHandling): this {
    this.options.errorHandling = mode;
    return this;
  }

  path(path: string): this {
    this.options.path = path;
    return this;
  }

  port(port: number): this {
    this.options.port = port;
    return this;
  }

  enableCompression(enabled: boolean): this {
    this.options.enableCompression = enabled;
    return this;
  }

  compressionThreshold(threshold: number): this {
    this.options.compressionThreshold = threshold;
    return this;
  }

  build(): ExporterConfig {
    return ExporterConfig.create(this.options);
  }
}

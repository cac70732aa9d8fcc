import { gzipSync } from 'node:zlib';
import type { ErrorHandling } from '../config';
import { formatError, GatherError } from '../errors';
import { NoopLogger } from '../logging';
import type { Logger } from '../logging';
import { PrometheusTextSerializer } from '../serialization';
import type { MetricFamily } from '../types';

/**
 * Metrics request interface.
 */
export interface MetricsRequest {
  method?: string;
  acceptEncoding?: string;
}

/**
 * Metrics response interface.
 */
export interface MetricsResponse {
  status: number;
  headers: Record<string, string>;
  body: string | Buffer;
}

/**
 * Handler configuration.
 */
export interface HandlerConfig {
  errorHandling?: ErrorHandling;
  enableCompression?: boolean;
  compressionThreshold?: number;
  logger?: Logger;
}

/**
 * Anything that can be gathered, usually a MetricsRegistry.
 */
export interface Gatherer {
  gather(): MetricFamily[];
}

export const ERROR_BODY_PREFIX = 'An error has occurred while serving metrics:\n\n';

/**
 * Framework-agnostic handler for the /metrics endpoint.
 *
 * Every request gathers afresh; nothing is cached between scrapes.
 */
export class MetricsHandler {
  private readonly gatherer: Gatherer;
  private readonly serializer = new PrometheusTextSerializer();
  private readonly errorHandling: ErrorHandling;
  private readonly enableCompression: boolean;
  private readonly compressionThreshold: number;
  private readonly logger: Logger;

  constructor(gatherer: Gatherer, config: HandlerConfig = {}) {
    this.gatherer = gatherer;
    this.errorHandling = config.errorHandling ?? 'http-error';
    this.enableCompression = config.enableCompression ?? true;
    this.compressionThreshold = config.compressionThreshold ?? 1024;
    this.logger = config.logger ?? new NoopLogger();
  }

  /**
   * Handle a metrics scrape request.
   * Returns { status, headers, body } for framework-agnostic usage.
   */
  handle(request: MetricsRequest = {}): MetricsResponse {
    const method = (request.method ?? 'GET').toUpperCase();
    if (method !== 'GET' && method !== 'HEAD') {
      return {
        status: 405,
        headers: { 'Content-Type': 'text/plain', Allow: 'GET, HEAD' },
        body: 'Method Not Allowed',
      };
    }

    let families: readonly MetricFamily[];
    try {
      families = this.gatherer.gather();
    } catch (error) {
      if (error instanceof GatherError && this.errorHandling === 'continue') {
        this.logger.warn('serving metrics despite gather errors', { error: error.message });
        families = error.families;
      } else {
        this.logger.error('error gathering metrics', { error: formatError(error) });
        return {
          status: 500,
          headers: { 'Content-Type': 'text/plain; charset=utf-8' },
          body: ERROR_BODY_PREFIX + (error instanceof Error ? error.message : String(error)),
        };
      }
    }

    const content = this.serializer.serialize(families);
    const headers: Record<string, string> = { 'Content-Type': this.serializer.contentType };

    if (method === 'HEAD') {
      return { status: 200, headers, body: '' };
    }

    if (this.shouldCompress(content, request.acceptEncoding)) {
      headers['Content-Encoding'] = 'gzip';
      return { status: 200, headers, body: gzipSync(content) };
    }

    return { status: 200, headers, body: content };
  }

  private shouldCompress(content: string, acceptEncoding: string | undefined): boolean {
    return (
      this.enableCompression &&
      (acceptEncoding?.includes('gzip') ?? false) &&
      Buffer.byteLength(content) >= this.compressionThreshold
    );
  }
}

import { createServer } from 'node:http';
import type { IncomingMessage, Server, ServerResponse } from 'node:http';
import type { MetricsHandler, MetricsResponse } from './handler';

/**
 * Health check response.
 */
export interface HealthResponse {
  status: number;
  body: string;
  headers: Record<string, string>;
}

/**
 * Simple health check - always returns OK.
 */
export function handleHealth(): HealthResponse {
  return {
    status: 200,
    body: 'OK',
    headers: { 'Content-Type': 'text/plain' },
  };
}

export interface ServerOptions {
  /** Path of the metrics endpoint (default: /metrics) */
  path?: string;
  /** Path of the health endpoint (default: /health) */
  healthPath?: string;
}

/**
 * Create a node:http server exposing the metrics and health endpoints.
 * The caller owns listen() and close().
 */
export function createMetricsServer(handler: MetricsHandler, options: ServerOptions = {}): Server {
  const metricsPath = options.path ?? '/metrics';
  const healthPath = options.healthPath ?? '/health';

  return createServer((req: IncomingMessage, res: ServerResponse) => {
    const { pathname } = new URL(req.url ?? '/', 'http://localhost');

    if (pathname === metricsPath) {
      const acceptEncoding = req.headers['accept-encoding'];
      send(
        res,
        handler.handle({
          method: req.method,
          acceptEncoding: Array.isArray(acceptEncoding) ? acceptEncoding.join(',') : acceptEncoding,
        })
      );
      return;
    }

    if (pathname === healthPath) {
      send(res, handleHealth());
      return;
    }

    send(res, { status: 404, headers: { 'Content-Type': 'text/plain' }, body: 'Not Found' });
  });
}

function send(res: ServerResponse, response: MetricsResponse | HealthResponse): void {
  res.statusCode = response.status;
  for (const [key, value] of Object.entries(response.headers)) {
    res.setHeader(key, value);
  }
  res.end(response.body);
}

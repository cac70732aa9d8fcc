/**
 * HTTP module - scrape handler and a node:http server around it.
 */

export {
  MetricsHandler,
  ERROR_BODY_PREFIX,
  type Gatherer,
  type HandlerConfig,
  type MetricsRequest,
  type MetricsResponse,
} from './handler';
export {
  createMetricsServer,
  handleHealth,
  type HealthResponse,
  type ServerOptions,
} from './server';

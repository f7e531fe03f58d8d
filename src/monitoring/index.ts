/**
 * Agent Gateway - Monitoring Module
 */

export {
  MetricsService,
  createMetricsService,
  type CompletionOutcome,
  type MetricsServiceOptions,
} from './metrics.js';

export { createMetricsMiddleware, type MetricsMiddlewareOptions } from './middleware.js';

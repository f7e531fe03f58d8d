/**
 * Agent Gateway - Health Module
 */

export { HealthMonitor, createHealthMonitor, type HealthMonitorOptions } from './monitor.js';

export {
  createDefaultProbes,
  createHttpProbe,
  createPostgresProbe,
  createQdrantProbe,
  createRedisProbe,
  httpCheck,
  type FetchLike,
  type HttpCheckOptions,
} from './probes.js';

export type {
  HealthCheckResult,
  HealthProbe,
  HealthStatus,
  HealthSummary,
  ProbeOutcome,
  ServiceStatus,
} from './types.js';

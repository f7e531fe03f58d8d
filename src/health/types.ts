/**
 * Agent Gateway - Health Check Types
 */

export type HealthStatus = 'healthy' | 'degraded';

/**
 * Outcome reported by a single probe
 */
export interface ProbeOutcome {
  ok: boolean;
  detail: string;
}

/**
 * A named dependency check. `check` receives a signal that aborts when the
 * monitor's timeout for this probe expires.
 */
export interface HealthProbe {
  name: string;
  check(signal: AbortSignal): Promise<ProbeOutcome>;
  /** Overrides the monitor's default timeout */
  timeoutMs?: number;
  /** Releases any resources held between checks */
  close?(): Promise<void>;
}

export interface HealthCheckResult extends ProbeOutcome {
  /** ISO-8601 time the check finished */
  timestamp: string;
}

export interface HealthSummary {
  status: HealthStatus;
  timestamp: string;
  /** Keyed by service name, in registry order */
  services: Record<string, HealthCheckResult>;
}

export interface ServiceStatus extends HealthCheckResult {
  service: string;
}

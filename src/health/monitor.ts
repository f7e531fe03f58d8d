/**
 * Agent Gateway - Health Monitor
 * Runs dependency probes concurrently and aggregates them into a summary
 *
 * Every call probes fresh; nothing is cached between calls.
 */

import logger from '../utils/logger.js';
import { errorMessage } from '../utils/helpers.js';

import type {
  HealthCheckResult,
  HealthProbe,
  HealthSummary,
  ProbeOutcome,
  ServiceStatus,
} from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface HealthMonitorOptions {
  /** Timeout for probes that do not set their own */
  defaultTimeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 5000;

// =============================================================================
// Health Monitor Class
// =============================================================================

export class HealthMonitor {
  private readonly probes = new Map<string, HealthProbe>();
  private readonly defaultTimeoutMs: number;

  constructor(probes: HealthProbe[], options: HealthMonitorOptions = {}) {
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;

    for (const probe of probes) {
      const name = probe.name.toLowerCase();
      if (this.probes.has(name)) {
        throw new Error(`Duplicate health probe: ${name}`);
      }
      this.probes.set(name, probe);
    }
  }

  public getServiceNames(): string[] {
    return [...this.probes.keys()];
  }

  /**
   * Probe every service at once and wait for all of them. A slow or failing
   * probe only affects its own entry.
   */
  public async summary(): Promise<HealthSummary> {
    const entries = [...this.probes.entries()];
    const results = await Promise.all(entries.map(([name, probe]) => this.runProbe(name, probe)));

    const services: Record<string, HealthCheckResult> = {};
    entries.forEach(([name], index) => {
      const result = results[index];
      if (result) {
        services[name] = result;
      }
    });

    const healthy = results.every((result) => result.ok);
    if (!healthy) {
      logger.warn('Health check degraded', {
        failing: Object.entries(services)
          .filter(([, result]) => !result.ok)
          .map(([name, result]) => `${name}: ${result.detail}`),
      });
    }

    return {
      status: healthy ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      services,
    };
  }

  /**
   * Probe a single service by name (case-insensitive); null when unknown
   */
  public async serviceStatus(name: string): Promise<ServiceStatus | null> {
    const service = name.toLowerCase();
    const probe = this.probes.get(service);
    if (!probe) {
      return null;
    }

    const result = await this.runProbe(service, probe);
    return { service, ...result };
  }

  public async close(): Promise<void> {
    const closing = [...this.probes.values()].map(async (probe) => {
      try {
        await probe.close?.();
      } catch (error) {
        logger.warn('Health probe close failed', { probe: probe.name, error: errorMessage(error) });
      }
    });
    await Promise.all(closing);
  }

  // ===========================================================================
  // Private Helpers
  // ===========================================================================

  private async runProbe(name: string, probe: HealthProbe): Promise<HealthCheckResult> {
    const timeoutMs = probe.timeoutMs ?? this.defaultTimeoutMs;
    const outcome = await this.withTimeout(probe, timeoutMs);

    if (!outcome.ok) {
      logger.debug('Health probe failed', { service: name, detail: outcome.detail });
    }

    return { ...outcome, timestamp: new Date().toISOString() };
  }

  private withTimeout(probe: HealthProbe, timeoutMs: number): Promise<ProbeOutcome> {
    const controller = new AbortController();

    return new Promise<ProbeOutcome>((resolve) => {
      const timeoutId = setTimeout(() => {
        controller.abort();
        resolve({ ok: false, detail: `Timed out after ${timeoutMs}ms` });
      }, timeoutMs);

      let pending: Promise<ProbeOutcome>;
      try {
        pending = probe.check(controller.signal);
      } catch (error) {
        pending = Promise.reject(error);
      }

      pending.then(
        (outcome) => {
          clearTimeout(timeoutId);
          resolve(outcome);
        },
        (error: unknown) => {
          clearTimeout(timeoutId);
          resolve({ ok: false, detail: `Unexpected error: ${errorMessage(error)}` });
        }
      );
    });
  }
}

export function createHealthMonitor(probes: HealthProbe[], options?: HealthMonitorOptions): HealthMonitor {
  return new HealthMonitor(probes, options);
}

export default HealthMonitor;

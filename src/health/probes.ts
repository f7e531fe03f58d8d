/**
 * Agent Gateway - Dependency Probes
 * Health probes for the infrastructure services the gateway depends on
 */

import pgPromise, { type IDatabase, type IMain } from 'pg-promise';
import { createClient, type RedisClientOptions } from 'redis';

import logger from '../utils/logger.js';
import { errorMessage } from '../utils/helpers.js';
import type { HealthConfig, PostgresConfig, RedisConfig } from '../config/schema.js';

import type { HealthProbe, ProbeOutcome } from './types.js';

export type FetchLike = typeof fetch;

// =============================================================================
// HTTP Probes
// =============================================================================

export interface HttpCheckOptions {
  expectedStatuses?: readonly number[];
  fetchImpl?: FetchLike;
}

function statusField(body: string): string | undefined {
  try {
    const payload: unknown = JSON.parse(body);
    if (typeof payload === 'object' && payload !== null && 'status' in payload) {
      const { status } = payload;
      return typeof status === 'string' && status !== '' ? status : undefined;
    }
    return undefined;
  } catch {
    return undefined;
  }
}

/**
 * GET a URL and report `HTTP <code>`, plus the body's JSON `status` field when present
 */
export async function httpCheck(
  url: string,
  signal: AbortSignal,
  options: HttpCheckOptions = {}
): Promise<ProbeOutcome> {
  const { expectedStatuses = [200, 204], fetchImpl = fetch } = options;

  try {
    const response = await fetchImpl(url, {
      method: 'GET',
      signal,
      headers: {
        'User-Agent': 'AgentGateway-HealthMonitor/1.0',
        Accept: 'application/json',
      },
    });

    const ok = expectedStatuses.includes(response.status);
    const status = statusField(await response.text());
    const detail = status ? `HTTP ${response.status} (${status})` : `HTTP ${response.status}`;
    return { ok, detail };
  } catch (error) {
    return { ok: false, detail: errorMessage(error) };
  }
}

/**
 * Probe for an optional HTTP service; a blank URL reports the service as disabled
 */
export function createHttpProbe(
  name: string,
  label: string,
  url: string,
  options: HttpCheckOptions = {}
): HealthProbe {
  return {
    name,
    async check(signal) {
      if (!url.trim()) {
        return { ok: true, detail: `${label} disabled` };
      }
      return httpCheck(url, signal, options);
    },
  };
}

/**
 * Qdrant exposes /healthz on recent releases and /health on older ones
 */
export function createQdrantProbe(baseUrl: string, options: HttpCheckOptions = {}): HealthProbe {
  const root = baseUrl.replace(/\/+$/, '');

  return {
    name: 'qdrant',
    async check(signal) {
      let last: ProbeOutcome = { ok: false, detail: 'no health endpoint tried' };
      for (const healthPath of ['/healthz', '/health']) {
        last = await httpCheck(`${root}${healthPath}`, signal, options);
        if (last.ok) {
          return { ok: true, detail: 'Qdrant health endpoint reachable' };
        }
      }
      return { ok: false, detail: `Qdrant health check failed: ${last.detail}` };
    },
  };
}

// =============================================================================
// PostgreSQL Probe
// =============================================================================

/**
 * Runs SELECT 1 through a small pg-promise pool that lives as long as the probe
 */
export function createPostgresProbe(config: PostgresConfig): HealthProbe {
  let pgp: IMain | null = null;
  let db: IDatabase<object> | null = null;

  const connect = (): IDatabase<object> => {
    if (db) {
      return db;
    }
    pgp = pgPromise({
      error(err, e) {
        logger.debug('PostgreSQL health query error', {
          error: errorMessage(err),
          query: e.query,
        });
      },
    });
    db = pgp({
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password,
      ssl: config.ssl ? { rejectUnauthorized: false } : false,
      max: 1,
      connectionTimeoutMillis: config.timeoutMs,
      query_timeout: config.timeoutMs,
    });
    return db;
  };

  return {
    name: 'postgres',
    timeoutMs: config.timeoutMs,
    async check() {
      try {
        await connect().one('SELECT 1 AS ok');
        return { ok: true, detail: 'PostgreSQL responded to SELECT 1' };
      } catch (error) {
        return { ok: false, detail: `PostgreSQL error: ${errorMessage(error)}` };
      }
    },
    async close() {
      if (pgp) {
        pgp.end();
        pgp = null;
        db = null;
      }
    },
  };
}

// =============================================================================
// Redis Probe
// =============================================================================

/**
 * Client options for a single health PING; no reconnects, connect bounded by the probe timeout
 */
export function redisClientOptions(config: RedisConfig, timeoutMs: number): RedisClientOptions {
  const base = {
    host: config.host,
    port: config.port,
    connectTimeout: timeoutMs,
    reconnectStrategy: false as const,
  };
  return {
    socket: config.tls ? { ...base, tls: true as const } : base,
    ...(config.password ? { password: config.password } : {}),
    database: config.db,
  };
}

/**
 * Opens a fresh connection per check, sends PING and disconnects
 */
export function createRedisProbe(config: RedisConfig, timeoutMs: number): HealthProbe {
  return {
    name: 'redis',
    timeoutMs,
    async check() {
      const client = createClient(redisClientOptions(config, timeoutMs));

      client.on('error', (err: unknown) => {
        logger.debug('Redis health client error', { error: errorMessage(err) });
      });

      try {
        await client.connect();
        const pong = await client.ping();
        return { ok: true, detail: `Redis responded with ${pong}` };
      } catch (error) {
        return { ok: false, detail: `Redis error: ${errorMessage(error)}` };
      } finally {
        if (client.isOpen) {
          await client.disconnect();
        }
      }
    },
  };
}

// =============================================================================
// Default Registry
// =============================================================================

/**
 * Probes for postgres, redis, qdrant, langflow and n8n, in that order
 */
export function createDefaultProbes(config: HealthConfig, options: HttpCheckOptions = {}): HealthProbe[] {
  return [
    createPostgresProbe(config.postgres),
    createRedisProbe(config.redis, config.timeoutMs),
    createQdrantProbe(config.qdrantUrl, options),
    createHttpProbe('langflow', 'Langflow', config.langflowUrl, options),
    createHttpProbe('n8n', 'n8n', config.n8nUrl, options),
  ];
}

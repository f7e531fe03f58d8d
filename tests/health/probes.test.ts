/**
 * Agent Gateway - Dependency Probe Tests
 */

import { describe, it, expect, jest } from '@jest/globals';

import {
  createDefaultProbes,
  createHttpProbe,
  createQdrantProbe,
  createRedisProbe,
  httpCheck,
  redisClientOptions,
  type FetchLike,
} from '../../src/health/probes.js';
import { HealthConfigSchema } from '../../src/config/schema.js';

function respondWith(status: number, body: string | null = null): FetchLike {
  return jest.fn<FetchLike>().mockImplementation(() => Promise.resolve(new Response(body, { status })));
}

const signal = new AbortController().signal;

describe('httpCheck', () => {
  it('should include the JSON status field in the detail', async () => {
    const fetchImpl = respondWith(200, JSON.stringify({ status: 'ok' }));

    await expect(httpCheck('http://langflow:7860', signal, { fetchImpl })).resolves.toEqual({
      ok: true,
      detail: 'HTTP 200 (ok)',
    });
  });

  it('should accept 204 with an empty body', async () => {
    const fetchImpl = respondWith(204);

    await expect(httpCheck('http://n8n:5678', signal, { fetchImpl })).resolves.toEqual({
      ok: true,
      detail: 'HTTP 204',
    });
  });

  it('should fail on other statuses', async () => {
    const fetchImpl = respondWith(500, 'Internal Server Error');

    await expect(httpCheck('http://n8n:5678', signal, { fetchImpl })).resolves.toEqual({
      ok: false,
      detail: 'HTTP 500',
    });
  });

  it('should report a connection failure as its message', async () => {
    const fetchImpl = jest.fn<FetchLike>().mockRejectedValue(new Error('connect ECONNREFUSED 10.0.0.9:5678'));

    await expect(httpCheck('http://n8n:5678', signal, { fetchImpl })).resolves.toEqual({
      ok: false,
      detail: 'connect ECONNREFUSED 10.0.0.9:5678',
    });
  });

  it('should send a GET with the monitor user agent and the abort signal', async () => {
    const fetchImpl = jest
      .fn<FetchLike>()
      .mockImplementation(() => Promise.resolve(new Response(null, { status: 200 })));

    await httpCheck('http://n8n:5678', signal, { fetchImpl });

    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe('http://n8n:5678');
    expect(init?.method).toBe('GET');
    expect(init?.signal).toBe(signal);
    expect(init?.headers).toEqual({
      'User-Agent': 'AgentGateway-HealthMonitor/1.0',
      Accept: 'application/json',
    });
  });
});

describe('createHttpProbe', () => {
  it('should report a blank URL as disabled without a request', async () => {
    const fetchImpl = jest.fn<FetchLike>();
    const probe = createHttpProbe('langflow', 'Langflow', '  ', { fetchImpl });

    await expect(probe.check(signal)).resolves.toEqual({ ok: true, detail: 'Langflow disabled' });
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});

describe('createQdrantProbe', () => {
  it('should fall back to /health when /healthz is missing', async () => {
    const fetchImpl = jest
      .fn<FetchLike>()
      .mockImplementationOnce(() => Promise.resolve(new Response(null, { status: 404 })))
      .mockImplementationOnce(() => Promise.resolve(new Response(null, { status: 200 })));
    const probe = createQdrantProbe('http://qdrant:6333/', { fetchImpl });

    await expect(probe.check(signal)).resolves.toEqual({
      ok: true,
      detail: 'Qdrant health endpoint reachable',
    });
    expect(fetchImpl.mock.calls.map(([url]) => url)).toEqual([
      'http://qdrant:6333/healthz',
      'http://qdrant:6333/health',
    ]);
  });

  it('should report the last failure when neither endpoint answers', async () => {
    const probe = createQdrantProbe('http://qdrant:6333', { fetchImpl: respondWith(404) });

    await expect(probe.check(signal)).resolves.toEqual({
      ok: false,
      detail: 'Qdrant health check failed: HTTP 404',
    });
  });
});

describe('createRedisProbe', () => {
  const redis = HealthConfigSchema.parse({}).redis;

  it('should bound the connection by the configured timeout', () => {
    expect(redisClientOptions(redis, 1500)).toEqual({
      socket: { host: 'redis', port: 6379, connectTimeout: 1500, reconnectStrategy: false },
      database: 0,
    });
    expect(createRedisProbe(redis, 1500).timeoutMs).toBe(1500);
  });

  it('should pass TLS and the password through', () => {
    const options = redisClientOptions({ ...redis, tls: true, password: 'test-secret' }, 2000);

    expect(options.socket).toEqual({
      host: 'redis',
      port: 6379,
      connectTimeout: 2000,
      reconnectStrategy: false,
      tls: true,
    });
    expect(options).toMatchObject({ password: 'test-secret' });
  });
});

describe('createDefaultProbes', () => {
  it('should register the dependent services in order', () => {
    const probes = createDefaultProbes(HealthConfigSchema.parse({}));

    expect(probes.map((probe) => probe.name)).toEqual(['postgres', 'redis', 'qdrant', 'langflow', 'n8n']);
  });

  it('should hand the health timeout to the redis probe', () => {
    const probes = createDefaultProbes(HealthConfigSchema.parse({ timeoutMs: 2500 }));

    expect(probes[1]?.timeoutMs).toBe(2500);
  });
});

/**
 * Agent Gateway - Configuration Loader Tests
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import fs from 'fs';
import os from 'os';
import path from 'path';

import { ConfigLoader, loadConfig } from '../../src/config/loader.js';
import { ConfigurationError } from '../../src/utils/types.js';

describe('ConfigLoader', () => {
  const originalEnv = process.env;
  let tempDir: string;

  const writeConfig = (name: string, content: string): string => {
    const file = path.join(tempDir, name);
    fs.writeFileSync(file, content, 'utf-8');
    return file;
  };

  beforeEach(() => {
    process.env = { NODE_ENV: 'test' };
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'gateway-config-'));
  });

  afterEach(() => {
    process.env = originalEnv;
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should fall back to defaults when the file is missing', () => {
    const config = loadConfig(path.join(tempDir, 'absent.yaml'));

    expect(config.server).toEqual({ port: 8080, host: '0.0.0.0', nodeEnv: 'test', trustProxy: false });
    expect(config.rateLimit.requestsPerMinute).toBe(120);
    expect(config.rateLimit.burstSize).toBe(20);
    expect(config.retry).toEqual({ maxAttempts: 3, minWaitMs: 2000, maxWaitMs: 10000 });
    expect(config.providers.openai.apiKey).toBeUndefined();
    expect(config.metrics.enabled).toBe(true);
  });

  it('should read a YAML file', () => {
    const file = writeConfig(
      'gateway.yaml',
      [
        'server:',
        '  port: 9090',
        'rateLimit:',
        '  requestsPerMinute: 60',
        '  hourStrategy: sliding-window',
        '  endpointOverrides:',
        '    - prefix: /completion',
        '      burstSize: 5',
        'providers:',
        '  openai:',
        '    model: gpt-4o',
      ].join('\n')
    );

    const config = loadConfig(file);

    expect(config.server.port).toBe(9090);
    expect(config.rateLimit.requestsPerMinute).toBe(60);
    expect(config.rateLimit.hourStrategy).toBe('sliding-window');
    expect(config.rateLimit.endpointOverrides).toEqual([{ prefix: '/completion', burstSize: 5 }]);
    expect(config.providers.openai.model).toBe('gpt-4o');
    expect(config.providers.openai.baseUrl).toBe('https://api.openai.com/v1');
  });

  it('should read a JSON file', () => {
    const file = writeConfig('gateway.json', JSON.stringify({ retry: { maxAttempts: 5, minWaitMs: 100, maxWaitMs: 400 } }));

    const config = loadConfig(file);

    expect(config.retry).toEqual({ maxAttempts: 5, minWaitMs: 100, maxWaitMs: 400 });
  });

  it('should let environment variables win over the file', () => {
    const file = writeConfig('gateway.yaml', 'server:\n  port: 9090\nrateLimit:\n  enabled: true\n');
    process.env['PORT'] = '7000';
    process.env['RATE_LIMIT_ENABLED'] = 'false';
    process.env['OPENAI_API_KEY'] = 'test-secret';
    process.env['SERVICE_HEALTH_TIMEOUT'] = '2.5';
    process.env['N8N_HOST'] = 'workflows';

    const config = loadConfig(file);

    expect(config.server.port).toBe(7000);
    expect(config.rateLimit.enabled).toBe(false);
    expect(config.providers.openai.apiKey).toBe('test-secret');
    expect(config.health.timeoutMs).toBe(2500);
    expect(config.health.n8nUrl).toBe('http://workflows:5678');
  });

  it('should keep an explicitly empty probe URL', () => {
    process.env['LANGFLOW_INTERNAL_URL'] = '';

    const config = loadConfig(path.join(tempDir, 'absent.yaml'));

    expect(config.health.langflowUrl).toBe('');
  });

  it('should reject invalid file values', () => {
    const file = writeConfig('gateway.yaml', 'rateLimit:\n  requestsPerMinute: 0\n');

    expect(() => loadConfig(file)).toThrow(ConfigurationError);
    expect(() => loadConfig(file)).toThrow(
      `Invalid configuration (${file}): rateLimit.requestsPerMinute: Number must be greater than or equal to 1`
    );
  });

  it('should reject a fractional override count', () => {
    const file = writeConfig(
      'gateway.yaml',
      'rateLimit:\n  endpointOverrides:\n    - prefix: /completion\n      burstSize: 0.5\n'
    );

    expect(() => loadConfig(file)).toThrow(
      `Invalid configuration (${file}): rateLimit.endpointOverrides.0.burstSize: Expected integer, received float`
    );
  });

  it('should reject invalid environment values', () => {
    process.env['PORT'] = '70000';

    expect(() => loadConfig(path.join(tempDir, 'absent.yaml'))).toThrow(
      'Invalid configuration (environment): server.port: Number must be less than or equal to 65535'
    );
  });

  it('should ignore a file in an unsupported format', () => {
    const file = writeConfig('gateway.toml', 'port = 9090\n');

    expect(loadConfig(file).server.port).toBe(8080);
  });

  it('should take the path from CONFIG_FILE_PATH', () => {
    const file = writeConfig('from-env.yaml', 'server:\n  port: 9191\n');
    process.env['CONFIG_FILE_PATH'] = file;

    const loader = new ConfigLoader();

    expect(loader.getConfigPath()).toBe(file);
    expect(loader.load().server.port).toBe(9191);
    expect(loader.getConfig().server.port).toBe(9191);
  });

  it('should refuse getConfig before load', () => {
    expect(() => new ConfigLoader('unused.yaml').getConfig()).toThrow(ConfigurationError);
  });
});

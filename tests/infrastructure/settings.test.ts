import { describe, it, expect } from 'vitest';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadRuntimeSettings } from '../../src/infrastructure/index.js';
import { ConfigError } from '../../src/domain/index.js';

describe('loadRuntimeSettings', () => {
  it('applies defaults', () => {
    expect(loadRuntimeSettings({})).toEqual({
      redisUrl: 'redis://localhost:6379/1',
      queueKey: 'mqtt_bridge:events',
      healthKey: 'mqtt_bridge:health',
      controlChannel: 'mqtt_bridge:control',
      configPath: 'config/bridge.json',
      lockPath: join(tmpdir(), 'mqtt-bridge.lock'),
      popTimeoutSeconds: 1,
      publishRetryLimit: 3,
      healthIntervalMs: 30000,
      healthTtlSeconds: 90,
      statusHost: '127.0.0.1',
      statusPort: 0,
      logLevel: 'info',
    });
  });

  it('coerces numeric variables and treats empty ones as unset', () => {
    const settings = loadRuntimeSettings({
      PUBLISH_RETRY_LIMIT: '5',
      STATUS_PORT: '9464',
      BRIDGE_QUEUE_KEY: '',
      LOG_LEVEL: 'debug',
    });
    expect(settings.publishRetryLimit).toBe(5);
    expect(settings.statusPort).toBe(9464);
    expect(settings.queueKey).toBe('mqtt_bridge:events');
    expect(settings.logLevel).toBe('debug');
  });

  it('throws ConfigError naming the bad variable', () => {
    expect(() => loadRuntimeSettings({ PUBLISH_RETRY_LIMIT: '0' })).toThrow(ConfigError);
    expect(() => loadRuntimeSettings({ LOG_LEVEL: 'loud' })).toThrow(/^Invalid environment: LOG_LEVEL: /);
  });
});

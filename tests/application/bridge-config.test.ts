import { describe, it, expect } from 'vitest';
import { DEFAULT_BRIDGE_CONFIG, bridgeConfigSchema, exitCodeFor, formatIssues } from '../../src/application/index.js';
import {
  AlreadyRunningError,
  ConfigError,
  FatalConnectionError,
  MalformedEntryError,
} from '../../src/domain/index.js';

describe('bridgeConfigSchema', () => {
  it('fills every default', () => {
    expect(DEFAULT_BRIDGE_CONFIG).toEqual({
      enabled: true,
      broker_host: 'localhost',
      broker_port: 1883,
      hmac_enabled: false,
      hmac_secret_key: '',
      keepalive_seconds: 60,
      auto_reconnect: true,
      reconnect_delay_seconds: 5,
      max_reconnect_delay_seconds: 60,
      max_reconnect_attempts: 0,
      connect_timeout_seconds: 10,
      topic_prefix: '',
    });
  });

  it('requires a secret when signing is enabled', () => {
    const result = bridgeConfigSchema.safeParse({ hmac_enabled: true });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatIssues(result.error.issues)).toBe(
        'hmac_secret_key: hmac_secret_key is required when hmac_enabled is true',
      );
    }
  });

  it('rejects an out-of-range port', () => {
    expect(bridgeConfigSchema.safeParse({ broker_port: 70000 }).success).toBe(false);
  });
});

describe('exitCodeFor', () => {
  it('maps errors to process exit codes', () => {
    expect(exitCodeFor(new AlreadyRunningError(42, '/tmp/x.lock'))).toBe(3);
    expect(exitCodeFor(new FatalConnectionError('gave up', 3))).toBe(2);
    expect(exitCodeFor(new ConfigError('bad'))).toBe(1);
    expect(exitCodeFor(new MalformedEntryError('bad', '{}'))).toBe(1);
    expect(exitCodeFor('weird')).toBe(1);
  });

  it('names the holder in AlreadyRunningError', () => {
    const err = new AlreadyRunningError(42, '/tmp/x.lock');
    expect(err.message).toBe('Another bridge instance is running (PID 42, lock /tmp/x.lock)');
    expect(err.name).toBe('AlreadyRunningError');
  });
});

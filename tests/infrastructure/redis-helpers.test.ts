import { describe, it, expect, vi } from 'vitest';
import type { Redis } from 'ioredis';
import { ConnectionStateStore, buildQueueEntry } from '../../src/application/index.js';
import { ShutdownError, initialConnectionState } from '../../src/domain/index.js';
import {
  ExternalServiceProvisioner,
  RedisHealthReporter,
  enqueueEntry,
  readHealthSnapshot,
} from '../../src/infrastructure/index.js';
import { fakeLogger } from '../helpers.js';

describe('enqueueEntry', () => {
  it('pushes the serialized entry onto the tail', async () => {
    const rpush = vi.fn(async () => 3);
    const entry = buildQueueEntry('devices/1', 'on', { now: new Date('2026-01-01T00:00:00Z') });

    const depth = await enqueueEntry({ rpush } as unknown as Redis, 'q', entry);

    expect(depth).toBe(3);
    expect(rpush).toHaveBeenCalledWith(
      'q',
      '{"topic":"devices/1","payload":"on","qos":1,"retain":false,"enqueued_at":1767225600}',
    );
  });
});

describe('RedisHealthReporter', () => {
  it('writes the snapshot with a TTL', async () => {
    const set = vi.fn(async () => 'OK');
    const reporter = new RedisHealthReporter({ status: 'ready', set } as unknown as Redis, 'mqtt_bridge:health', 90);
    const snapshot = { ...initialConnectionState('id'), queue_depth: 2, checked_at: '2026-01-01T00:00:00.000Z' };

    await reporter.report(snapshot);

    expect(set).toHaveBeenCalledWith('mqtt_bridge:health', JSON.stringify(snapshot), 'EX', 90);
  });

  it('fails fast instead of queueing the write while Redis is down', async () => {
    const set = vi.fn(async () => 'OK');
    const reporter = new RedisHealthReporter({ status: 'connecting', set } as unknown as Redis, 'k', 90);
    const snapshot = { ...initialConnectionState('id'), queue_depth: null, checked_at: '2026-01-01T00:00:00.000Z' };

    await expect(reporter.report(snapshot)).rejects.toThrow('Redis connection is connecting');
    expect(set).not.toHaveBeenCalled();
  });
});

describe('readHealthSnapshot', () => {
  it('returns the stored object', async () => {
    const get = vi.fn(async () => '{"broker_connected":true,"queue_depth":0}');
    expect(await readHealthSnapshot({ get } as unknown as Redis, 'k')).toEqual({
      broker_connected: true,
      queue_depth: 0,
    });
  });

  it('returns null when the key expired or holds something else', async () => {
    expect(await readHealthSnapshot({ get: async () => null } as unknown as Redis, 'k')).toBeNull();
    expect(await readHealthSnapshot({ get: async () => '[1]' } as unknown as Redis, 'k')).toBeNull();
    expect(await readHealthSnapshot({ get: async () => 'OK' } as unknown as Redis, 'k')).toBeNull();
  });
});

describe('ExternalServiceProvisioner', () => {
  function fakeClient(status: string, failures = 0) {
    const client = { status, connect: vi.fn<() => Promise<void>>(), ping: vi.fn(async () => 'PONG') };
    client.connect.mockImplementation(async () => {
      if (failures > 0) {
        failures--;
        throw new Error('connect ECONNREFUSED 127.0.0.1:6379');
      }
      client.status = 'ready';
    });
    return client;
  }

  it('connects lazy clients and pings the queue', async () => {
    const first = fakeClient('wait');
    const second = fakeClient('ready');
    const state = new ConnectionStateStore(initialConnectionState('id'));
    const log = fakeLogger();
    const provisioner = new ExternalServiceProvisioner([first, second] as unknown as Redis[], state, log, 1);

    await provisioner.prepare(new AbortController().signal);
    await provisioner.teardown();

    expect(first.connect).toHaveBeenCalledOnce();
    expect(second.connect).not.toHaveBeenCalled();
    expect(first.ping).toHaveBeenCalledOnce();
    expect(state.get().queue_connected).toBe(true);
    expect(log.info).toHaveBeenCalledWith({ pong: 'PONG' }, 'Redis queue reachable');
  });

  it('keeps retrying while Redis is down at startup', async () => {
    const client = fakeClient('wait', 2);
    const state = new ConnectionStateStore(initialConnectionState('id'));
    const log = fakeLogger();
    const provisioner = new ExternalServiceProvisioner([client] as unknown as Redis[], state, log, 1);

    await provisioner.prepare(new AbortController().signal);

    expect(client.connect).toHaveBeenCalledTimes(3);
    expect(log.error).toHaveBeenCalledTimes(2);
    expect(state.get()).toMatchObject({
      queue_connected: true,
      last_error: 'Redis: connect ECONNREFUSED 127.0.0.1:6379',
    });
  });

  it('gives up with ShutdownError once shutdown is requested', async () => {
    const client = fakeClient('wait', Number.POSITIVE_INFINITY);
    const state = new ConnectionStateStore(initialConnectionState('id'));
    const ac = new AbortController();
    const provisioner = new ExternalServiceProvisioner([client] as unknown as Redis[], state, fakeLogger(), 5);

    const prepared = provisioner.prepare(ac.signal);
    await vi.waitFor(() => {
      expect(client.connect).toHaveBeenCalled();
    });
    ac.abort();

    await expect(prepared).rejects.toBeInstanceOf(ShutdownError);
    expect(state.get()).toMatchObject({
      queue_connected: false,
      last_error: 'Redis: connect ECONNREFUSED 127.0.0.1:6379',
    });
  });
});

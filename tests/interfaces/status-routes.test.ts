import { describe, it, expect, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { buildStatusApp } from '../../src/interfaces/http/index.js';
import type { HealthSnapshot } from '../../src/domain/index.js';
import { initialConnectionState } from '../../src/domain/index.js';

function snapshot(overrides: Partial<HealthSnapshot> = {}): HealthSnapshot {
  return {
    ...initialConnectionState('mqtt-bridge_h_1'),
    queue_depth: 0,
    checked_at: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

describe('status routes', () => {
  let app: FastifyInstance | null = null;

  afterEach(async () => {
    await app?.close();
    app = null;
  });

  async function build(current: HealthSnapshot): Promise<FastifyInstance> {
    app = await buildStatusApp(
      {
        snapshot: async () => current,
        processStatus: () => ({
          pid: 1234,
          client_session_id: 'mqtt-bridge_h_1',
          lock_path: '/tmp/mqtt-bridge.lock',
          uptime_seconds: 5,
        }),
      },
      'silent',
    );
    return app;
  }

  it('GET /health returns 200 when broker and queue are connected', async () => {
    const healthy = snapshot({ broker_connected: true, broker_phase: 'connected', queue_connected: true });
    const res = await (await build(healthy)).inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual(healthy);
  });

  it('GET /health returns 503 while degraded', async () => {
    const degraded = snapshot({ queue_connected: true, broker_phase: 'backoff', last_error: 'refused' });
    const res = await (await build(degraded)).inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(503);
    expect(res.json()).toMatchObject({ broker_phase: 'backoff', last_error: 'refused' });
  });

  it('GET /status returns the process identity', async () => {
    const res = await (await build(snapshot())).inject({ method: 'GET', url: '/status' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      pid: 1234,
      client_session_id: 'mqtt-bridge_h_1',
      lock_path: '/tmp/mqtt-bridge.lock',
      uptime_seconds: 5,
    });
  });
});

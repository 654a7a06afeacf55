import { describe, it, expect } from 'vitest';
import { ConnectionStateStore } from '../../src/application/index.js';
import { initialConnectionState } from '../../src/domain/index.js';

describe('ConnectionStateStore', () => {
  it('starts disconnected with zeroed counters', () => {
    const store = new ConnectionStateStore(initialConnectionState('mqtt-bridge_h_1'));
    expect(store.get()).toMatchObject({
      broker_connected: false,
      broker_phase: 'disconnected',
      queue_connected: false,
      client_session_id: 'mqtt-bridge_h_1',
      reconnect_attempt_count: 0,
      published_count: 0,
    });
  });

  it('swaps in a new frozen snapshot on update', () => {
    const store = new ConnectionStateStore(initialConnectionState('id'));
    const before = store.get();

    store.update({ broker_connected: true });

    expect(before.broker_connected).toBe(false);
    expect(store.get().broker_connected).toBe(true);
    expect(store.get()).not.toBe(before);
    expect(Object.isFrozen(store.get())).toBe(true);
  });

  it('derives a patch from the current snapshot', () => {
    const store = new ConnectionStateStore(initialConnectionState('id'));
    store.update((s) => ({ published_count: s.published_count + 1 }));
    store.update((s) => ({ published_count: s.published_count + 1 }));
    expect(store.get().published_count).toBe(2);
  });
});

/**
 * Process-wide view of the bridge's links to the broker and the queue.
 *
 * Written by the connection manager, the queue consumer and the
 * coordinator; read by the health monitor.
 */

export type BrokerPhase = 'disconnected' | 'backoff' | 'connected' | 'fatal';

export interface ConnectionState {
  readonly broker_connected: boolean;
  readonly broker_phase: BrokerPhase;
  readonly queue_connected: boolean;
  readonly client_session_id: string;
  readonly reconnect_attempt_count: number;
  readonly last_error: string | null;
  readonly published_count: number;
  readonly malformed_count: number;
  readonly dropped_count: number;
  readonly last_published_at: string | null; // ISO-8601
  readonly last_entry_lag_seconds: number | null;
}

export function initialConnectionState(clientSessionId: string): ConnectionState {
  return {
    broker_connected: false,
    broker_phase: 'disconnected',
    queue_connected: false,
    client_session_id: clientSessionId,
    reconnect_attempt_count: 0,
    last_error: null,
    published_count: 0,
    malformed_count: 0,
    dropped_count: 0,
    last_published_at: null,
    last_entry_lag_seconds: null,
  };
}

/** Health snapshot exposed to external pollers. */
export interface HealthSnapshot {
  readonly broker_connected: boolean;
  readonly broker_phase: BrokerPhase;
  readonly queue_connected: boolean;
  readonly queue_depth: number | null;
  readonly reconnect_attempt_count: number;
  readonly last_error: string | null;
  readonly client_session_id: string;
  readonly published_count: number;
  readonly malformed_count: number;
  readonly dropped_count: number;
  readonly last_published_at: string | null;
  readonly last_entry_lag_seconds: number | null;
  readonly checked_at: string;
}

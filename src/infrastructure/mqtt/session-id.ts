import { hostname } from 'node:os';

/**
 * MQTT client id for this process: `mqtt-bridge_<host>_<pid>`.
 *
 * Derived from host identity and pid, never from configuration, so two
 * bridge processes can never take over each other's broker session.
 */
export function deriveSessionId(host: string = hostname(), pid: number = process.pid): string {
  const safeHost = host.replace(/[^A-Za-z0-9-]/g, '-') || 'host';
  return `mqtt-bridge_${safeHost}_${pid}`;
}

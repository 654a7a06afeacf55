export type { QoS, QueueEntry, PoppedEntry, SignedEnvelope } from './queue-entry.js';
export { HMAC_ALGORITHM } from './queue-entry.js';
export type { BrokerPhase, ConnectionState, HealthSnapshot } from './connection-state.js';
export { initialConnectionState } from './connection-state.js';
export {
  BridgeError,
  MalformedEntryError,
  AlreadyRunningError,
  FatalConnectionError,
  ConfigError,
  ShutdownError,
  describeError,
} from './errors.js';
export type { BridgeErrorCode } from './errors.js';
export type { LockInfo } from './lock-info.js';

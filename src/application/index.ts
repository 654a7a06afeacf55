export { bridgeConfigSchema, DEFAULT_BRIDGE_CONFIG, LOG_LEVELS } from './bridge-config.js';
export type { BridgeConfig, BridgeConfigInput, LogLevel } from './bridge-config.js';
export { decodeEntry, encodeEntry, serializeEntry, buildQueueEntry, resolveTopic, queueEntrySchema } from './codec.js';
export { signPayload, createSignedEnvelope, verifyEnvelope, createSigner } from './hmac.js';
export type { Signer, VerifyResult } from './hmac.js';
export { backoffDelayMs, sleep, pause } from './timers.js';
export type { BackoffPolicy } from './timers.js';
export { ConnectionStateStore } from './connection-state-store.js';
export { BrokerConnectionManager } from './connection-manager.js';
export type { BrokerSession, ConnectionManagerDeps } from './connection-manager.js';
export { HealthMonitor, createLogHealthReporter } from './health-monitor.js';
export type { HealthMonitorOptions } from './health-monitor.js';
export { BridgeCoordinator } from './bridge-coordinator.js';
export type { BridgeCoordinatorDeps } from './bridge-coordinator.js';
export { exitCodeFor, EXIT_OK, EXIT_CRASH, EXIT_FATAL_CONNECTION, EXIT_ALREADY_RUNNING } from './exit-codes.js';
export { formatIssues } from './validation.js';
export type {
  ConfigSource,
  EntrySource,
  PublishOptions,
  BrokerTransport,
  TransportFactory,
  HealthReporter,
  LockHandle,
  AcquireOptions,
  InstanceLockPort,
  ServiceProvisioner,
  BackgroundService,
} from './ports.js';

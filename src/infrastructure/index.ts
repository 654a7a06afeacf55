export { FileConfigSource, envOverrides, loadRuntimeSettings } from './config/index.js';
export type { RuntimeSettings } from './config/index.js';
export {
  createRedisClient,
  ensureRedisConnected,
  watchQueueConnection,
  enqueueEntry,
  RedisHealthReporter,
  readHealthSnapshot,
  publishControlCommand,
  CONTROL_COMMANDS,
} from './redis/index.js';
export type { ControlCommand } from './redis/index.js';
export { RedisQueueConsumer, ControlSubscriber, parseControlMessage, handleControlMessage } from './worker/index.js';
export type { QueueConsumerOptions, ControlHandler } from './worker/index.js';
export { MqttTransport, createMqttTransport, buildClientOptions, brokerUrl, deriveSessionId } from './mqtt/index.js';
export type { ConnectFn } from './mqtt/index.js';
export { InstanceLock, isProcessAlive, parseLockRecord } from './lock/index.js';
export type { InstanceLockOptions, LockInspection } from './lock/index.js';
export { ExternalServiceProvisioner } from './provisioning/index.js';

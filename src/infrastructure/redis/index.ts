export { createRedisClient, ensureRedisConnected, watchQueueConnection } from './client.js';
export { enqueueEntry } from './entry-producer.js';
export { RedisHealthReporter, readHealthSnapshot } from './health-reporter.js';
export { publishControlCommand, CONTROL_COMMANDS } from './control-publisher.js';
export type { ControlCommand } from './control-publisher.js';

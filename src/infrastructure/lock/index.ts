export { InstanceLock, isProcessAlive, parseLockRecord } from './instance-lock.js';
export type { InstanceLockOptions, LockInspection } from './instance-lock.js';

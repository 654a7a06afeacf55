import type { Redis } from 'ioredis';
import { pino } from 'pino';
import type { Logger } from 'pino';
import { InstanceLock, createRedisClient, loadRuntimeSettings } from '../../infrastructure/index.js';
import type { RuntimeSettings } from '../../infrastructure/index.js';

/** Commands print their own output; library logs only surface on errors. */
export function cliLogger(): Logger {
  return pino({ level: 'error' });
}

export function settingsFromEnv(): RuntimeSettings {
  return loadRuntimeSettings(process.env);
}

export function lockFor(settings: RuntimeSettings): InstanceLock {
  return new InstanceLock({ path: settings.lockPath, log: cliLogger() });
}

/** Runs `fn` against a short-lived Redis connection. */
export async function withRedis<T>(settings: RuntimeSettings, fn: (redis: Redis) => Promise<T>): Promise<T> {
  const redis = createRedisClient(settings.redisUrl);
  try {
    await redis.connect();
    return await fn(redis);
  } finally {
    redis.disconnect();
  }
}

import { Redis } from 'ioredis';
import type { Logger } from 'pino';
import { describeError } from '../../domain/index.js';
import type { ConnectionStateStore } from '../../application/index.js';

/**
 * Creates an ioredis client for the backing queue.
 *
 * - `lazyConnect`: nothing touches Redis until the bridge holds its lock.
 * - `maxRetriesPerRequest: null`: commands wait out a reconnect instead
 *   of failing, which a blocking pop loop needs.
 */
export function createRedisClient(redisUrl: string): Redis {
  return new Redis(redisUrl, {
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
    lazyConnect: true,
  });
}

/** Connects a lazily created client; a no-op once it is connecting or up. */
export async function ensureRedisConnected(redis: Redis): Promise<void> {
  if (redis.status === 'wait' || redis.status === 'end') {
    await redis.connect();
  }
}

/**
 * Mirrors the queue connection's lifecycle into `ConnectionState`.
 * ioredis reconnects on its own; this only observes it.
 */
export function watchQueueConnection(redis: Redis, state: ConnectionStateStore, log: Logger): void {
  redis.on('ready', () => {
    state.update({ queue_connected: true });
    log.info('Redis queue connection ready');
  });
  redis.on('close', () => {
    if (state.get().queue_connected) {
      state.update({ queue_connected: false });
      log.warn('Redis queue connection closed');
    }
  });
  redis.on('error', (err: Error) => {
    state.update({ last_error: `Redis: ${describeError(err)}` });
    log.error({ err }, 'Redis queue connection error');
  });
}

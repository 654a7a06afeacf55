import type { Redis } from 'ioredis';
import { serializeEntry } from '../../application/index.js';
import type { QueueEntry } from '../../domain/index.js';

/**
 * Appends an entry to the tail of the queue list.
 *
 * The bridge pops from the head (`BLPOP`), so `RPUSH` here gives FIFO.
 * Upstream producers must push the same way.
 *
 * @returns The queue length after the push.
 */
export async function enqueueEntry(redis: Redis, queueKey: string, entry: QueueEntry): Promise<number> {
  return redis.rpush(queueKey, serializeEntry(entry));
}

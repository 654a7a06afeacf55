import type { Redis } from 'ioredis';
import type { HealthReporter } from '../../application/index.js';
import type { HealthSnapshot } from '../../domain/index.js';

/**
 * Publishes health snapshots to a Redis key with a TTL.
 *
 * Dashboards and `mqtt-bridge health` read the key passively. The TTL
 * is longer than the tick interval; an expired key means the bridge
 * stopped reporting.
 */
export class RedisHealthReporter implements HealthReporter {
  readonly name = 'redis';

  constructor(
    private readonly redis: Redis,
    private readonly key: string,
    private readonly ttlSeconds: number,
  ) {}

  async report(snapshot: HealthSnapshot): Promise<void> {
    if (this.redis.status !== 'ready') {
      throw new Error(`Redis connection is ${this.redis.status}`);
    }
    await this.redis.set(this.key, JSON.stringify(snapshot), 'EX', this.ttlSeconds);
  }
}

/** Reads the last published snapshot, or `null` if none is current. */
export async function readHealthSnapshot(redis: Redis, key: string): Promise<Record<string, unknown> | null> {
  const raw = await redis.get(key);
  if (raw === null) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return null;
  return Object.fromEntries(Object.entries(parsed));
}

import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import { describeError } from '../../domain/index.js';
import type { PoppedEntry } from '../../domain/index.js';
import { decodeEntry, pause } from '../../application/index.js';
import type { ConnectionStateStore, EntrySource } from '../../application/index.js';

export interface QueueConsumerOptions {
  queueKey: string;
  /** Upper bound on each blocking pop, so shutdown and health stay responsive. */
  popTimeoutSeconds: number;
  /** Pause after a failed pop before trying again. */
  retryDelayMs?: number | undefined;
}

const DEFAULT_RETRY_DELAY_MS = 1000;

/**
 * FIFO consumer of the Redis list the producer `RPUSH`es to.
 *
 * `BLPOP` removes and returns the head atomically, so no entry is ever
 * seen by two consumers. The pop is destructive: an entry popped but not
 * yet published is lost if the process crashes in between.
 *
 * Blocking pops run on their own connection. On shutdown that connection
 * is dropped, which rejects a pending `BLPOP` immediately instead of
 * waiting out its timeout.
 *
 * Redis errors are transient here: logged, reflected in
 * `queue_connected`, and retried after a short pause. They never reach
 * the coordinator.
 */
export class RedisQueueConsumer implements EntrySource {
  constructor(
    private readonly blocking: Redis,
    private readonly commands: Redis,
    private readonly state: ConnectionStateStore,
    private readonly log: Logger,
    private readonly options: QueueConsumerOptions,
  ) {}

  async next(signal: AbortSignal): Promise<PoppedEntry | null> {
    if (signal.aborted) return null;

    const raw = await this.pop(signal);
    if (raw === null) return null;

    // Throws MalformedEntryError; the entry is already off the queue.
    return { raw, entry: decodeEntry(raw) };
  }

  async requeue(raw: string): Promise<void> {
    await this.commands.lpush(this.options.queueKey, raw);
  }

  /** @throws Error while the command connection is down, instead of queueing the call. */
  async depth(): Promise<number> {
    if (this.commands.status !== 'ready') {
      throw new Error(`Redis connection is ${this.commands.status}`);
    }
    return this.commands.llen(this.options.queueKey);
  }

  private async pop(signal: AbortSignal): Promise<string | null> {
    const interrupt = (): void => {
      this.blocking.disconnect();
    };
    signal.addEventListener('abort', interrupt, { once: true });

    try {
      const result = await this.blocking.blpop(this.options.queueKey, this.options.popTimeoutSeconds);
      this.markConnected();
      // null = timeout with nothing queued
      if (result === null) return null;
      const [, raw] = result;
      return raw;
    } catch (err: unknown) {
      if (signal.aborted) return null;

      this.log.error({ err, queue: this.options.queueKey }, 'Queue pop failed, retrying');
      this.state.update({ queue_connected: false, last_error: `Queue pop failed: ${describeError(err)}` });
      await pause(this.options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS, signal);
      return null;
    } finally {
      signal.removeEventListener('abort', interrupt);
    }
  }

  private markConnected(): void {
    if (!this.state.get().queue_connected) {
      this.state.update({ queue_connected: true });
    }
  }
}

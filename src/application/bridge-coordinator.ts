import type { Logger } from 'pino';
import {
  FatalConnectionError,
  MalformedEntryError,
  ShutdownError,
  describeError,
} from '../domain/index.js';
import type { PoppedEntry, QueueEntry } from '../domain/index.js';
import { encodeEntry, resolveTopic } from './codec.js';
import type { BrokerConnectionManager, BrokerSession } from './connection-manager.js';
import type { ConnectionStateStore } from './connection-state-store.js';
import type { HealthMonitor } from './health-monitor.js';
import type {
  BackgroundService,
  EntrySource,
  InstanceLockPort,
  ServiceProvisioner,
} from './ports.js';

export interface BridgeCoordinatorDeps {
  lock: InstanceLockPort;
  provisioner: ServiceProvisioner;
  source: EntrySource;
  connection: BrokerConnectionManager;
  health: HealthMonitor;
  state: ConnectionStateStore;
  log: Logger;
  /** Publish attempts per entry before it is dropped. */
  publishRetryLimit: number;
  /** Take the instance lock over even if its holder is alive. */
  forceLock?: boolean | undefined;
  services?: readonly BackgroundService[] | undefined;
  now?: (() => Date) | undefined;
}

const RAW_PREVIEW_LENGTH = 200;

/**
 * Wires queue → codec → broker and owns startup and shutdown.
 *
 * Startup: lock → health monitor → provisioner → background services →
 * first broker connection → consume loop. Health is reported from the
 * moment the lock is held, so outages at startup stay observable.
 *
 * The loop keeps exactly one entry in flight. An entry that cannot be
 * published is retried after the connection manager reconnects, up to
 * `publishRetryLimit` times, and then dropped with an error log. If
 * shutdown (or a fatal connection state) interrupts delivery, the entry
 * is pushed back to the head of the queue so it is neither lost nor
 * reordered.
 */
export class BridgeCoordinator {
  private reloadRequested = false;
  private readonly now: () => Date;

  constructor(private readonly deps: BridgeCoordinatorDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  /** Asks for a reconnect (with fresh configuration) before the next entry. */
  requestReload(): void {
    this.reloadRequested = true;
  }

  /**
   * Runs the bridge until `signal` aborts.
   *
   * @throws AlreadyRunningError if another live process holds the lock.
   * @throws FatalConnectionError when the connection manager gives up.
   */
  async run(signal: AbortSignal): Promise<void> {
    const { log, health, connection, provisioner } = this.deps;
    const handle = await this.deps.lock.acquire({ force: this.deps.forceLock ?? false });
    const started: BackgroundService[] = [];

    try {
      health.start();
      await provisioner.prepare(signal);
      for (const service of this.deps.services ?? []) {
        await service.start();
        started.push(service);
      }

      await connection.ensureConnected(signal);
      log.info('Starting consumption loop');
      await this.consume(signal);
      log.info('Consumption loop stopped');
    } catch (err: unknown) {
      if (!(err instanceof ShutdownError)) throw err;
      log.info('Shutdown interrupted startup or a broker connection attempt');
    } finally {
      health.stop();
      for (const service of started.reverse()) {
        await this.settle(service.stop(), `Failed to stop ${service.name}`);
      }
      await this.settle(connection.disconnect(), 'Failed to disconnect from MQTT broker');
      await this.settle(provisioner.teardown(), 'Failed to tear down services');
      await this.settle(handle.release(), 'Failed to release bridge lock');
    }
  }

  private async consume(signal: AbortSignal): Promise<void> {
    const { source, connection, log, state } = this.deps;

    while (!signal.aborted) {
      if (this.reloadRequested) {
        this.reloadRequested = false;
        log.info('Config reload requested, reconnecting to broker with latest settings');
        await this.settle(connection.reconnect(), 'Failed to close broker session for reload');
      }

      let popped: PoppedEntry | null;
      try {
        popped = await source.next(signal);
      } catch (err: unknown) {
        if (!(err instanceof MalformedEntryError)) throw err;
        log.warn({ err, raw: err.raw.slice(0, RAW_PREVIEW_LENGTH) }, 'Discarding malformed queue entry');
        state.update((s) => ({ malformed_count: s.malformed_count + 1 }));
        continue;
      }

      if (popped === null) continue;
      await this.deliver(popped, signal);
    }
  }

  private async deliver(popped: PoppedEntry, signal: AbortSignal): Promise<void> {
    const { connection, log, state, publishRetryLimit } = this.deps;
    const { entry } = popped;

    for (let attempt = 1; attempt <= publishRetryLimit; attempt++) {
      let session: BrokerSession;
      try {
        session = await connection.ensureConnected(signal);
      } catch (err: unknown) {
        if (err instanceof ShutdownError || err instanceof FatalConnectionError) {
          await this.requeue(popped);
        }
        throw err;
      }

      const topic = resolveTopic(entry.topic, session.config.topic_prefix);
      const bytes = encodeEntry(entry, session.signer);

      try {
        await connection.publish(topic, bytes, entry.retain);
        this.recordPublished(entry);
        log.debug(
          { topic, bytes: bytes.length, retain: entry.retain, signed: session.signer !== null },
          'Published entry',
        );
        return;
      } catch (err: unknown) {
        log.warn({ err, topic, attempt, limit: publishRetryLimit }, 'Publish failed');
        state.update({ last_error: `Publish to ${topic} failed: ${describeError(err)}` });
      }
    }

    log.error({ topic: entry.topic, attempts: publishRetryLimit }, 'Dropping entry after exhausting publish retries');
    state.update((s) => ({ dropped_count: s.dropped_count + 1 }));
  }

  private async requeue(popped: PoppedEntry): Promise<void> {
    try {
      await this.deps.source.requeue(popped.raw);
      this.deps.log.info({ topic: popped.entry.topic }, 'Re-queued undelivered entry at the head of the queue');
    } catch (err: unknown) {
      this.deps.log.error({ err, topic: popped.entry.topic }, 'Failed to re-queue undelivered entry; entry lost');
    }
  }

  private recordPublished(entry: QueueEntry): void {
    const now = this.now();
    const lag = entry.enqueued_at === null
      ? null
      : Math.max(0, now.getTime() / 1000 - entry.enqueued_at);

    this.deps.state.update((s) => ({
      published_count: s.published_count + 1,
      last_published_at: now.toISOString(),
      last_entry_lag_seconds: lag,
    }));
  }

  private async settle(operation: Promise<void>, message: string): Promise<void> {
    try {
      await operation;
    } catch (err: unknown) {
      this.deps.log.error({ err }, message);
    }
  }
}

import type { Logger } from 'pino';
import type { HealthSnapshot } from '../domain/index.js';
import type { ConnectionStateStore } from './connection-state-store.js';
import type { EntrySource, HealthReporter } from './ports.js';

export interface HealthMonitorOptions {
  intervalMs: number;
  reporters: readonly HealthReporter[];
  now?: (() => Date) | undefined;
}

/**
 * Periodic, read-only self-check.
 *
 * Ticks on its own timer so health stays observable while the queue is
 * idle. It reads `ConnectionState` and the queue depth and hands the
 * result to reporters; it never writes bridge state, so a reporter bug
 * cannot affect delivery.
 */
export class HealthMonitor {
  private timer: NodeJS.Timeout | null = null;
  private ticking = false;
  private readonly now: () => Date;

  constructor(
    private readonly state: ConnectionStateStore,
    private readonly queue: Pick<EntrySource, 'depth'>,
    private readonly log: Logger,
    private readonly options: HealthMonitorOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async snapshot(): Promise<HealthSnapshot> {
    // Take the state first: one consistent view, then the (async) depth.
    const current = this.state.get();

    let queueDepth: number | null = null;
    try {
      queueDepth = await this.queue.depth();
    } catch (err: unknown) {
      this.log.debug({ err }, 'Queue depth unavailable');
    }

    return {
      broker_connected: current.broker_connected,
      broker_phase: current.broker_phase,
      queue_connected: current.queue_connected,
      queue_depth: queueDepth,
      reconnect_attempt_count: current.reconnect_attempt_count,
      last_error: current.last_error,
      client_session_id: current.client_session_id,
      published_count: current.published_count,
      malformed_count: current.malformed_count,
      dropped_count: current.dropped_count,
      last_published_at: current.last_published_at,
      last_entry_lag_seconds: current.last_entry_lag_seconds,
      checked_at: this.now().toISOString(),
    };
  }

  /** Takes one snapshot and passes it to every reporter. */
  async tick(): Promise<HealthSnapshot> {
    const snapshot = await this.snapshot();
    for (const reporter of this.options.reporters) {
      try {
        await reporter.report(snapshot);
      } catch (err: unknown) {
        this.log.warn({ err, reporter: reporter.name }, 'Health reporter failed');
      }
    }
    return snapshot;
  }

  /** Reports once right away, then every `intervalMs`. */
  start(): void {
    if (this.timer !== null) return;
    this.timer = setInterval(() => this.scheduledTick(), this.options.intervalMs);
    this.timer.unref();
    this.log.info({ intervalMs: this.options.intervalMs }, 'Health monitor started');
    this.scheduledTick();
  }

  stop(): void {
    if (this.timer === null) return;
    clearInterval(this.timer);
    this.timer = null;
    this.log.info('Health monitor stopped');
  }

  // A slow reporter skips ticks rather than piling them up.
  private scheduledTick(): void {
    if (this.ticking) return;
    this.ticking = true;
    void this.tick()
      .catch((err: unknown) => {
        this.log.warn({ err }, 'Health tick failed');
      })
      .finally(() => {
        this.ticking = false;
      });
  }
}

/** Logs each snapshot: debug while healthy, warn otherwise. */
export function createLogHealthReporter(log: Logger): HealthReporter {
  return {
    name: 'log',
    report: async (snapshot) => {
      if (snapshot.broker_connected && snapshot.queue_connected) {
        log.debug({ health: snapshot }, 'Health check');
      } else {
        log.warn({ health: snapshot }, 'Health check: bridge degraded');
      }
    },
  };
}

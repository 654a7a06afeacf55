import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import { ShutdownError, describeError } from '../../domain/index.js';
import { pause } from '../../application/index.js';
import type { ConnectionStateStore, ServiceProvisioner } from '../../application/index.js';
import { ensureRedisConnected } from '../redis/index.js';

const DEFAULT_RETRY_DELAY_MS = 2000;

/**
 * Provisioner for externally managed Redis and broker.
 *
 * It starts nothing and stops nothing: it only brings up the bridge's
 * own Redis connections and checks the queue answers. Bootstrapping a
 * local broker for development is left to dev tooling.
 *
 * Redis being down at startup is transient: `prepare` keeps retrying
 * until the queue answers or shutdown is requested.
 */
export class ExternalServiceProvisioner implements ServiceProvisioner {
  readonly name = 'external';

  constructor(
    private readonly clients: readonly Redis[],
    private readonly state: ConnectionStateStore,
    private readonly log: Logger,
    private readonly retryDelayMs = DEFAULT_RETRY_DELAY_MS,
  ) {}

  async prepare(signal: AbortSignal): Promise<void> {
    for (let attempt = 1; ; attempt++) {
      if (signal.aborted) throw new ShutdownError();
      try {
        await this.connect();
        return;
      } catch (err: unknown) {
        this.log.error({ err, attempt, retryInMs: this.retryDelayMs }, 'Redis queue unreachable, retrying');
        this.state.update({ queue_connected: false, last_error: `Redis: ${describeError(err)}` });
      }
      await pause(this.retryDelayMs, signal);
    }
  }

  async teardown(): Promise<void> {
    this.log.debug('External services left running');
  }

  private async connect(): Promise<void> {
    for (const client of this.clients) {
      await ensureRedisConnected(client);
      // ioredis keeps reconnecting on its own after a failed connect.
      if (client.status !== 'ready') {
        throw new Error(`Redis connection is ${client.status}`);
      }
    }
    const [first] = this.clients;
    if (first !== undefined) {
      const pong = await first.ping();
      this.state.update({ queue_connected: true });
      this.log.info({ pong }, 'Redis queue reachable');
    }
  }
}

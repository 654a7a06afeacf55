import type { Logger } from 'pino';
import {
  ConfigError,
  FatalConnectionError,
  ShutdownError,
  describeError,
} from '../domain/index.js';
import type { BrokerPhase } from '../domain/index.js';
import { DEFAULT_BRIDGE_CONFIG } from './bridge-config.js';
import type { BridgeConfig } from './bridge-config.js';
import type { ConnectionStateStore } from './connection-state-store.js';
import { createSigner } from './hmac.js';
import type { Signer } from './hmac.js';
import type { BrokerTransport, ConfigSource, TransportFactory } from './ports.js';
import { backoffDelayMs, sleep } from './timers.js';

/** What the coordinator needs from an established session. */
export interface BrokerSession {
  readonly config: BridgeConfig;
  readonly signer: Signer | null;
  readonly connectedAt: Date;
}

export interface ConnectionManagerDeps {
  configSource: ConfigSource;
  createTransport: TransportFactory;
  state: ConnectionStateStore;
  log: Logger;
  clientId: string;
  /** Invoked with every freshly loaded configuration, before connecting. */
  onConfigLoaded?: ((config: BridgeConfig) => void) | undefined;
  sleep?: ((ms: number, signal: AbortSignal) => Promise<void>) | undefined;
}

/**
 * Owns the MQTT session lifecycle.
 *
 * State machine (mirrored into `ConnectionState.broker_phase`):
 *
 *   disconnected ──connect ok──▶ connected ──transport error──▶ disconnected
 *        │                                                          ▲
 *        └──connect failed──▶ backoff ──delay elapsed───────────────┘
 *                               │
 *                               └──attempt budget reached──▶ fatal (terminal)
 *
 * Every connect attempt starts by reloading the configuration, so host,
 * credentials and the HMAC secret follow the settings store without a
 * restart. Only one publish is ever in flight (the coordinator awaits
 * each one), which keeps broker order equal to queue order.
 */
export class BrokerConnectionManager {
  private transport: BrokerTransport | null = null;
  private session: BrokerSession | null = null;
  private policy: BridgeConfig = DEFAULT_BRIDGE_CONFIG;
  private hasConnected = false;
  private fatal: FatalConnectionError | null = null;
  private readonly wait: (ms: number, signal: AbortSignal) => Promise<void>;

  constructor(private readonly deps: ConnectionManagerDeps) {
    this.wait = deps.sleep ?? sleep;
  }

  get phase(): BrokerPhase {
    return this.deps.state.get().broker_phase;
  }

  get currentSession(): BrokerSession | null {
    return this.session;
  }

  /**
   * Returns the live session, connecting (with backoff) if there is none.
   *
   * @throws FatalConnectionError once the attempt budget is spent, or when
   *   a session was lost while `auto_reconnect` is off.
   * @throws ShutdownError if `signal` aborts while connecting or backing off.
   */
  async ensureConnected(signal: AbortSignal): Promise<BrokerSession> {
    if (this.session !== null) return this.session;
    if (this.fatal !== null) throw this.fatal;

    const { state, log } = this.deps;

    for (;;) {
      if (signal.aborted) throw new ShutdownError();

      try {
        const config = await this.deps.configSource.load();
        this.policy = config;
        if (!config.enabled) {
          throw new ConfigError('Broker configuration is disabled');
        }
        this.deps.onConfigLoaded?.(config);

        log.info(
          {
            host: config.broker_host,
            port: config.broker_port,
            clientId: this.deps.clientId,
            attempt: state.get().reconnect_attempt_count + 1,
          },
          'Connecting to MQTT broker',
        );

        const transport = await this.deps.createTransport(config, this.deps.clientId);
        if (signal.aborted) {
          await transport.end();
          throw new ShutdownError();
        }
        return this.adopt(transport, config);
      } catch (err: unknown) {
        if (err instanceof ShutdownError) throw err;
        await this.recordFailure(err, signal);
      }
    }
  }

  /**
   * Publishes at QoS 1 and waits for the broker's acknowledgement.
   * A failure tears the session down before rethrowing.
   */
  async publish(topic: string, payload: Buffer, retain: boolean): Promise<void> {
    const transport = this.transport;
    if (transport === null) {
      throw new Error('Not connected to MQTT broker');
    }

    try {
      await transport.publish(topic, payload, { qos: 1, retain });
    } catch (err: unknown) {
      if (this.transport === transport) {
        this.sessionLost(err);
        transport.end().catch((endErr: unknown) => {
          this.deps.log.debug({ err: endErr }, 'Error closing failed MQTT session');
        });
      }
      throw err;
    }
  }

  /** Drops the current session; the next `ensureConnected` reloads configuration. */
  async reconnect(): Promise<void> {
    await this.disconnect();
  }

  /** Sends an explicit DISCONNECT so the broker does not keep a stale session. */
  async disconnect(): Promise<void> {
    const transport = this.transport;
    if (transport === null) return;

    this.transport = null;
    this.session = null;
    if (this.fatal === null) {
      this.deps.state.update({ broker_connected: false, broker_phase: 'disconnected' });
    }
    await transport.end();
    this.deps.log.info('Disconnected from MQTT broker');
  }

  private adopt(transport: BrokerTransport, config: BridgeConfig): BrokerSession {
    const session: BrokerSession = {
      config,
      signer: createSigner(config),
      connectedAt: new Date(),
    };
    this.transport = transport;
    this.session = session;

    transport.onClose((reason) => {
      if (this.transport !== transport) return;
      this.sessionLost(reason ?? new Error('Connection closed by broker'));
    });

    this.deps.state.update({
      broker_connected: true,
      broker_phase: 'connected',
      reconnect_attempt_count: 0,
      last_error: null,
    });

    this.deps.log.info(
      {
        host: config.broker_host,
        port: config.broker_port,
        hmac: session.signer !== null,
        keepalive: config.keepalive_seconds,
      },
      this.hasConnected ? 'Reconnected to MQTT broker' : 'Connected to MQTT broker',
    );
    this.hasConnected = true;
    return session;
  }

  private async recordFailure(err: unknown, signal: AbortSignal): Promise<void> {
    const { state, log } = this.deps;
    const attempts = state.get().reconnect_attempt_count + 1;
    const message = describeError(err);
    const max = this.policy.max_reconnect_attempts;

    log.error({ err, attempt: attempts }, 'MQTT connection attempt failed');

    if (max > 0 && attempts >= max) {
      this.fatal = new FatalConnectionError(
        `Gave up connecting to MQTT broker after ${attempts} attempts: ${message}`,
        attempts,
        { cause: err },
      );
      state.update({
        broker_connected: false,
        broker_phase: 'fatal',
        reconnect_attempt_count: attempts,
        last_error: message,
      });
      log.fatal({ attempts, max }, 'Reconnect budget exhausted');
      throw this.fatal;
    }

    const delayMs = backoffDelayMs(attempts, {
      baseSeconds: this.policy.reconnect_delay_seconds,
      maxSeconds: this.policy.max_reconnect_delay_seconds,
    });
    state.update({
      broker_connected: false,
      broker_phase: 'backoff',
      reconnect_attempt_count: attempts,
      last_error: message,
    });
    log.warn({ attempt: attempts, delayMs }, 'Backing off before next MQTT connection attempt');

    await this.wait(delayMs, signal);
    state.update({ broker_phase: 'disconnected' });
  }

  private sessionLost(reason: unknown): void {
    const config = this.session?.config;
    const message = describeError(reason);
    this.transport = null;
    this.session = null;

    if (config !== undefined && !config.auto_reconnect) {
      this.fatal = new FatalConnectionError(
        `MQTT session lost and auto_reconnect is disabled: ${message}`,
        0,
        { cause: reason },
      );
      this.deps.state.update({ broker_connected: false, broker_phase: 'fatal', last_error: message });
      this.deps.log.fatal({ err: reason }, 'MQTT session lost with auto_reconnect disabled');
      return;
    }

    this.deps.state.update({ broker_connected: false, broker_phase: 'disconnected', last_error: message });
    this.deps.log.warn({ err: reason }, 'MQTT connection lost');
  }
}

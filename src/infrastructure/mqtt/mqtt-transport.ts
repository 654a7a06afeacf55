import { connect } from 'mqtt';
import type { IClientOptions, MqttClient } from 'mqtt';
import type { BridgeConfig, BrokerTransport, PublishOptions, TransportFactory } from '../../application/index.js';

export type ConnectFn = (brokerUrl: string, options: IClientOptions) => MqttClient;

export function brokerUrl(config: Pick<BridgeConfig, 'broker_host' | 'broker_port'>): string {
  return `mqtt://${config.broker_host}:${config.broker_port}`;
}

/**
 * Client options for one session.
 *
 * MQTT.js's own reconnect loop is off (`reconnectPeriod: 0`): the
 * connection manager decides when and how to reconnect. `keepalive`
 * makes MQTT.js send PINGREQ whenever the link is otherwise idle.
 */
export function buildClientOptions(config: BridgeConfig, clientId: string): IClientOptions {
  return {
    clientId,
    username: config.username || undefined,
    password: config.password || undefined,
    keepalive: config.keepalive_seconds,
    connectTimeout: config.connect_timeout_seconds * 1000,
    reconnectPeriod: 0,
    clean: true,
    protocolVersion: 4,
  };
}

/**
 * `BrokerTransport` over an MQTT.js client.
 *
 * Pending publishes are rejected when the connection closes, so a QoS 1
 * publish never waits forever for a PUBACK that cannot arrive.
 */
export class MqttTransport implements BrokerTransport {
  private readonly closeListeners: Array<(reason: Error | null) => void> = [];
  private readonly pending = new Set<(err: Error) => void>();
  private lastError: Error | null = null;
  private closed = false;
  private ending = false;

  private constructor(private readonly client: MqttClient) {
    client.on('error', (err: Error) => {
      this.lastError = err;
    });
    client.on('close', () => this.handleClose());
  }

  /** Resolves on CONNACK; rejects on refusal, error or close before it. */
  static open(config: BridgeConfig, clientId: string, connectFn: ConnectFn = connect): Promise<MqttTransport> {
    const url = brokerUrl(config);

    return new Promise((resolve, reject) => {
      const client = connectFn(url, buildClientOptions(config, clientId));

      const cleanup = (): void => {
        client.removeListener('connect', onConnect);
        client.removeListener('error', onError);
        client.removeListener('close', onClose);
      };
      const fail = (err: Error): void => {
        cleanup();
        client.end(true);
        reject(err);
      };
      const onConnect = (): void => {
        cleanup();
        resolve(new MqttTransport(client));
      };
      const onError = (err: Error): void => fail(err);
      const onClose = (): void => fail(new Error(`Connection to ${url} closed before CONNACK`));

      client.on('connect', onConnect);
      client.on('error', onError);
      client.on('close', onClose);
    });
  }

  publish(topic: string, payload: Buffer, options: PublishOptions): Promise<void> {
    if (this.closed) {
      return Promise.reject(new Error('MQTT connection is closed'));
    }

    return new Promise((resolve, reject) => {
      this.pending.add(reject);
      this.client.publish(topic, payload, { qos: options.qos, retain: options.retain }, (err) => {
        this.pending.delete(reject);
        if (err) reject(err);
        else resolve();
      });
    });
  }

  /** Graceful DISCONNECT; in-flight QoS 1 messages are flushed first. */
  end(): Promise<void> {
    if (this.closed) return Promise.resolve();
    this.ending = true;
    return new Promise((resolve) => {
      this.client.end(false, {}, () => resolve());
    });
  }

  onClose(listener: (reason: Error | null) => void): void {
    this.closeListeners.push(listener);
  }

  private handleClose(): void {
    if (this.closed) return;
    this.closed = true;

    const reason = this.ending ? null : this.lastError ?? new Error('Connection to MQTT broker closed');
    const rejection = reason ?? new Error('MQTT connection ended');
    for (const reject of this.pending) reject(rejection);
    this.pending.clear();

    for (const listener of this.closeListeners) listener(reason);
  }
}

export const createMqttTransport: TransportFactory = (config, clientId) => MqttTransport.open(config, clientId);

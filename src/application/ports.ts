import type { HealthSnapshot, LockInfo, PoppedEntry, QoS } from '../domain/index.js';
import type { BridgeConfig } from './bridge-config.js';

/**
 * Seams between the bridge's application logic and its infrastructure.
 * Production adapters live under `infrastructure/`; tests plug in fakes.
 */

/** The settings store the broker configuration is read from. */
export interface ConfigSource {
  load(): Promise<BridgeConfig>;
}

/** FIFO source of queue entries. */
export interface EntrySource {
  /**
   * Pops the next entry, waiting a bounded time.
   * Resolves `null` on timeout or once `signal` aborts.
   *
   * @throws MalformedEntryError for an entry that was popped but cannot be decoded.
   */
  next(signal: AbortSignal): Promise<PoppedEntry | null>;
  /** Puts an entry back at the head of the queue. */
  requeue(raw: string): Promise<void>;
  depth(): Promise<number>;
}

export interface PublishOptions {
  readonly qos: QoS;
  readonly retain: boolean;
}

/** One established broker session. */
export interface BrokerTransport {
  /** Resolves once the broker acknowledges the message. */
  publish(topic: string, payload: Buffer, options: PublishOptions): Promise<void>;
  /** Sends DISCONNECT and resolves once the session is closed. */
  end(): Promise<void>;
  /** `reason` is null when the close followed our own `end()`. */
  onClose(listener: (reason: Error | null) => void): void;
}

/** Opens a session; rejects if the broker cannot be reached or refuses it. */
export type TransportFactory = (config: BridgeConfig, clientId: string) => Promise<BrokerTransport>;

export interface HealthReporter {
  readonly name: string;
  report(snapshot: HealthSnapshot): Promise<void>;
}

export interface LockHandle {
  readonly path: string;
  readonly info: LockInfo;
  release(): Promise<void>;
}

export interface AcquireOptions {
  /** Take the lock over even if its holder is alive. */
  readonly force?: boolean;
}

export interface InstanceLockPort {
  acquire(options?: AcquireOptions): Promise<LockHandle>;
}

/** Brings up (or checks) the services the bridge depends on. */
export interface ServiceProvisioner {
  readonly name: string;
  /**
   * Resolves once the services answer.
   *
   * @throws ShutdownError if `signal` aborts first.
   */
  prepare(signal: AbortSignal): Promise<void>;
  teardown(): Promise<void>;
}

/** Auxiliary service that runs only while the bridge holds the lock. */
export interface BackgroundService {
  readonly name: string;
  start(): Promise<void>;
  stop(): Promise<void>;
}

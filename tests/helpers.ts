import { vi } from 'vitest';
import type { Logger } from 'pino';
import { bridgeConfigSchema } from '../src/application/index.js';
import type {
  BridgeConfig,
  BridgeConfigInput,
  BrokerTransport,
  ConfigSource,
  EntrySource,
  PublishOptions,
} from '../src/application/index.js';
import { decodeEntry } from '../src/application/index.js';
import type { PoppedEntry } from '../src/domain/index.js';

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    level: 'info',
    fatal: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
  } as unknown as Logger;
}

export function makeConfig(overrides: BridgeConfigInput = {}): BridgeConfig {
  return bridgeConfigSchema.parse(overrides);
}

/** Hands out the given configurations in turn, repeating the last one. */
export class FakeConfigSource implements ConfigSource {
  loads = 0;

  constructor(private readonly configs: BridgeConfig[] = [makeConfig()]) {}

  async load(): Promise<BridgeConfig> {
    const config = this.configs[Math.min(this.loads, this.configs.length - 1)];
    this.loads++;
    if (config === undefined) throw new Error('no configuration');
    return config;
  }
}

export interface PublishedMessage {
  topic: string;
  payload: string;
  options: PublishOptions;
}

export class FakeTransport implements BrokerTransport {
  readonly published: PublishedMessage[] = [];
  ended = false;
  failPublish: Error | null = null;
  private readonly listeners: Array<(reason: Error | null) => void> = [];

  async publish(topic: string, payload: Buffer, options: PublishOptions): Promise<void> {
    if (this.failPublish !== null) throw this.failPublish;
    this.published.push({ topic, payload: payload.toString('utf8'), options });
  }

  async end(): Promise<void> {
    this.ended = true;
  }

  onClose(listener: (reason: Error | null) => void): void {
    this.listeners.push(listener);
  }

  /** Simulates the broker dropping the connection. */
  drop(reason: Error): void {
    for (const listener of this.listeners) listener(reason);
  }
}

/**
 * In-memory queue. `next()` yields to the event loop on every call so a
 * consume loop polling an empty queue never starves timers.
 */
export class FakeEntrySource implements EntrySource {
  readonly items: string[];
  pops = 0;

  constructor(items: string[] = [], private readonly onEmpty?: () => void) {
    this.items = [...items];
  }

  async next(signal: AbortSignal): Promise<PoppedEntry | null> {
    await new Promise((resolve) => setTimeout(resolve, 1));
    if (signal.aborted) return null;

    const raw = this.items.shift();
    if (raw === undefined) {
      this.onEmpty?.();
      return null;
    }
    this.pops++;
    return { raw, entry: decodeEntry(raw) };
  }

  async requeue(raw: string): Promise<void> {
    this.items.unshift(raw);
  }

  async depth(): Promise<number> {
    return this.items.length;
  }
}

export function rawEntry(topic: string, payload: string, extra: Record<string, unknown> = {}): string {
  return JSON.stringify({ topic, payload, qos: 1, retain: false, enqueued_at: 1_700_000_000, ...extra });
}

import { readFile } from 'node:fs/promises';
import { ConfigError, describeError } from '../../domain/index.js';
import { bridgeConfigSchema, formatIssues } from '../../application/index.js';
import type { BridgeConfig, ConfigSource } from '../../application/index.js';

/** Environment variables that override individual fields of the file. */
const ENV_OVERRIDES = {
  MQTT_BROKER_HOST: 'broker_host',
  MQTT_BROKER_PORT: 'broker_port',
  MQTT_USERNAME: 'username',
  MQTT_PASSWORD: 'password',
  MQTT_HMAC_ENABLED: 'hmac_enabled',
  MQTT_HMAC_SECRET_KEY: 'hmac_secret_key',
  MQTT_KEEPALIVE_SECONDS: 'keepalive_seconds',
  MQTT_TOPIC_PREFIX: 'topic_prefix',
} as const satisfies Record<string, keyof BridgeConfig>;

const NUMERIC_FIELDS: ReadonlySet<string> = new Set(['broker_port', 'keepalive_seconds']);
const BOOLEAN_FIELDS: ReadonlySet<string> = new Set(['hmac_enabled']);

/** Env values are strings; coerce them and let the schema reject bad ones. */
function coerceEnvValue(field: string, value: string): unknown {
  if (NUMERIC_FIELDS.has(field)) return value.trim() === '' ? Number.NaN : Number(value);
  if (BOOLEAN_FIELDS.has(field)) {
    const lowered = value.trim().toLowerCase();
    if (lowered === 'true' || lowered === '1') return true;
    if (lowered === 'false' || lowered === '0') return false;
  }
  return value;
}

export function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  for (const [variable, field] of Object.entries(ENV_OVERRIDES)) {
    const value = env[variable];
    if (value === undefined || value === '') continue;
    overrides[field] = coerceEnvValue(field, value);
  }
  return overrides;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Broker configuration backed by a JSON file plus environment overrides.
 *
 * `load()` goes to disk every time it is called; the connection manager
 * calls it once per connect attempt. A missing file means "defaults +
 * overrides". An unreadable or invalid file is a `ConfigError`, never a
 * silent fallback to defaults.
 */
export class FileConfigSource implements ConfigSource {
  constructor(
    private readonly path: string,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  async load(): Promise<BridgeConfig> {
    let fileValues: unknown = {};
    try {
      const content = await readFile(this.path, 'utf-8');
      fileValues = content.trim() === '' ? {} : JSON.parse(content);
    } catch (err: unknown) {
      if (!isNotFound(err)) {
        throw new ConfigError(`Cannot read broker configuration ${this.path}: ${describeError(err)}`, { cause: err });
      }
    }

    if (typeof fileValues !== 'object' || fileValues === null || Array.isArray(fileValues)) {
      throw new ConfigError(`Broker configuration ${this.path} must contain a JSON object`);
    }

    const parsed = bridgeConfigSchema.safeParse({ ...fileValues, ...envOverrides(this.env) });
    if (!parsed.success) {
      throw new ConfigError(`Invalid broker configuration: ${formatIssues(parsed.error.issues)}`, { cause: parsed.error });
    }
    return parsed.data;
  }
}

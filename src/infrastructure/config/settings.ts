import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { ConfigError } from '../../domain/index.js';
import { LOG_LEVELS, formatIssues } from '../../application/index.js';
import type { LogLevel } from '../../application/index.js';

/**
 * Process-level settings, read once from the environment at startup.
 * Unlike the broker configuration these never change while running.
 */
export interface RuntimeSettings {
  redisUrl: string;
  queueKey: string;
  healthKey: string;
  controlChannel: string;
  configPath: string;
  lockPath: string;
  popTimeoutSeconds: number;
  publishRetryLimit: number;
  healthIntervalMs: number;
  healthTtlSeconds: number;
  statusHost: string;
  statusPort: number;
  logLevel: LogLevel;
}

const settingsSchema = z.object({
  // Database 1 keeps the bridge's keys apart from other users of the same Redis.
  REDIS_URL: z.string().url().default('redis://localhost:6379/1'),
  BRIDGE_QUEUE_KEY: z.string().min(1).default('mqtt_bridge:events'),
  BRIDGE_HEALTH_KEY: z.string().min(1).default('mqtt_bridge:health'),
  BRIDGE_CONTROL_CHANNEL: z.string().min(1).default('mqtt_bridge:control'),
  BRIDGE_CONFIG_PATH: z.string().min(1).default('config/bridge.json'),
  BRIDGE_LOCK_PATH: z.string().min(1).default(join(tmpdir(), 'mqtt-bridge.lock')),
  QUEUE_POP_TIMEOUT_SECONDS: z.coerce.number().positive().max(60).default(1),
  PUBLISH_RETRY_LIMIT: z.coerce.number().int().min(1).default(3),
  HEALTH_INTERVAL_MS: z.coerce.number().int().min(100).default(30_000),
  HEALTH_TTL_SECONDS: z.coerce.number().int().min(1).default(90),
  STATUS_HOST: z.string().min(1).default('127.0.0.1'),
  STATUS_PORT: z.coerce.number().int().min(0).max(65535).default(0),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export function loadRuntimeSettings(env: NodeJS.ProcessEnv = process.env): RuntimeSettings {
  // Treat empty variables as unset so defaults apply.
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );

  const parsed = settingsSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(`Invalid environment: ${formatIssues(parsed.error.issues)}`, { cause: parsed.error });
  }

  const s = parsed.data;
  return {
    redisUrl: s.REDIS_URL,
    queueKey: s.BRIDGE_QUEUE_KEY,
    healthKey: s.BRIDGE_HEALTH_KEY,
    controlChannel: s.BRIDGE_CONTROL_CHANNEL,
    configPath: s.BRIDGE_CONFIG_PATH,
    lockPath: s.BRIDGE_LOCK_PATH,
    popTimeoutSeconds: s.QUEUE_POP_TIMEOUT_SECONDS,
    publishRetryLimit: s.PUBLISH_RETRY_LIMIT,
    healthIntervalMs: s.HEALTH_INTERVAL_MS,
    healthTtlSeconds: s.HEALTH_TTL_SECONDS,
    statusHost: s.STATUS_HOST,
    statusPort: s.STATUS_PORT,
    logLevel: s.LOG_LEVEL,
  };
}

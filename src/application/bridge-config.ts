import { z } from 'zod';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Zod schema for the broker configuration.
 *
 * This is re-read on every connect attempt, so a change to credentials,
 * host or HMAC secret takes effect on the next (re)connect without a
 * process restart.
 *
 * - `max_reconnect_attempts` of 0 means unlimited.
 * - `hmac_secret_key` must be set whenever `hmac_enabled` is true; the
 *   bridge never silently falls back to unsigned publishing.
 */
export const bridgeConfigSchema = z
  .object({
    enabled: z.boolean().default(true),
    broker_host: z.string().min(1).default('localhost'),
    broker_port: z.number().int().min(1).max(65535).default(1883),
    username: z.string().optional(),
    password: z.string().optional(),
    hmac_enabled: z.boolean().default(false),
    hmac_secret_key: z.string().default(''),
    keepalive_seconds: z.number().int().min(0).max(65535).default(60),
    auto_reconnect: z.boolean().default(true),
    reconnect_delay_seconds: z.number().positive().default(5),
    max_reconnect_delay_seconds: z.number().positive().default(60),
    max_reconnect_attempts: z.number().int().min(0).default(0),
    connect_timeout_seconds: z.number().positive().default(10),
    topic_prefix: z.string().default(''),
    log_level: z.enum(LOG_LEVELS).optional(),
  })
  .refine((config) => !config.hmac_enabled || config.hmac_secret_key.length > 0, {
    message: 'hmac_secret_key is required when hmac_enabled is true',
    path: ['hmac_secret_key'],
  });

export type BridgeConfig = z.infer<typeof bridgeConfigSchema>;
export type BridgeConfigInput = z.input<typeof bridgeConfigSchema>;

/** Configuration with every default applied; used before the first load. */
export const DEFAULT_BRIDGE_CONFIG: BridgeConfig = bridgeConfigSchema.parse({});

import { z } from 'zod';
import { MalformedEntryError } from '../domain/index.js';
import type { QueueEntry } from '../domain/index.js';
import type { Signer } from './hmac.js';
import { formatIssues } from './validation.js';

/**
 * Epoch seconds (as written by the producer) or an ISO-8601 string.
 * Advisory only: a value that cannot be read becomes `null` instead of
 * failing the entry.
 */
const timestampSchema = z
  .union([z.number().finite().nonnegative(), z.string()])
  .nullable()
  .optional()
  .catch(null);

/** MQTT forbids wildcards and NUL in a topic that is published to. */
const publishTopicSchema = z
  .string()
  .min(1)
  .refine((topic) => !/[+#\u0000]/.test(topic), { message: 'Topic must not contain +, # or NUL' });

// ISO date-time without an offset, read as UTC.
const NAIVE_DATETIME = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;

/**
 * Zod schema for a queue entry as pushed by the producer.
 *
 * - `topic` and `payload` are required.
 * - `qos` is accepted for compatibility but every entry is published at QoS 1.
 * - `timestamp` is the legacy name of `enqueued_at`.
 */
export const queueEntrySchema = z.object({
  topic: publishTopicSchema,
  payload: z.string(),
  qos: z.number().int().min(0).max(2).optional(),
  retain: z.boolean().default(false),
  enqueued_at: timestampSchema,
  timestamp: timestampSchema,
});

function toEpochSeconds(value: number | string | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') return value;
  const ms = Date.parse(NAIVE_DATETIME.test(value) ? `${value}Z` : value);
  return Number.isNaN(ms) ? null : ms / 1000;
}

/**
 * Decodes one raw queue entry.
 *
 * @throws MalformedEntryError when the string is not JSON, misses a
 *   required field or names a topic that cannot be published to. The
 *   caller discards such entries.
 */
export function decodeEntry(raw: string): QueueEntry {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err: unknown) {
    throw new MalformedEntryError('Queue entry is not valid JSON', raw, { cause: err });
  }

  const parsed = queueEntrySchema.safeParse(json);
  if (!parsed.success) {
    throw new MalformedEntryError(
      `Queue entry failed validation: ${formatIssues(parsed.error.issues)}`,
      raw,
      { cause: parsed.error },
    );
  }

  const { topic, payload, retain } = parsed.data;
  return {
    topic,
    payload,
    qos: 1,
    retain,
    enqueued_at: toEpochSeconds(parsed.data.enqueued_at ?? parsed.data.timestamp),
  };
}

/**
 * Produces the bytes published to the broker.
 *
 * Without a signer the payload goes out unchanged. With one, the
 * serialized `{ payload, hmac, algo }` envelope replaces it.
 */
export function encodeEntry(entry: QueueEntry, signer: Signer | null): Buffer {
  if (signer === null) return Buffer.from(entry.payload, 'utf8');
  return Buffer.from(JSON.stringify(signer.sign(entry.payload)), 'utf8');
}

/** Producer-side wire form of an entry. */
export function serializeEntry(entry: QueueEntry): string {
  return JSON.stringify({
    topic: entry.topic,
    payload: entry.payload,
    qos: entry.qos,
    retain: entry.retain,
    enqueued_at: entry.enqueued_at,
  });
}

export function buildQueueEntry(
  topic: string,
  payload: string,
  options: { retain?: boolean; now?: Date } = {},
): QueueEntry {
  return {
    topic,
    payload,
    qos: 1,
    retain: options.retain ?? false,
    enqueued_at: (options.now ?? new Date()).getTime() / 1000,
  };
}

/**
 * Applies the configured topic prefix.
 *
 * Topics that already live under the prefix are left alone, so
 * producers that prefix on their side are not double-prefixed.
 */
export function resolveTopic(topic: string, prefix: string): string {
  const base = prefix.replace(/\/+$/, '');
  if (base === '') return topic;
  if (topic === base || topic.startsWith(`${base}/`)) return topic;
  return `${base}/${topic.replace(/^\/+/, '')}`;
}

/**
 * Core domain types for entries flowing from the backing queue to the broker.
 *
 * These types carry no framework dependencies. Field names follow the
 * queue wire format, which is shared with the upstream producer.
 */

/** Every entry is published with "at least once" delivery. */
export type QoS = 1;

/**
 * One unit popped from the backing queue.
 *
 * Ordering is by queue position; `enqueued_at` is advisory and only
 * feeds lag reporting.
 */
export interface QueueEntry {
  readonly topic: string;
  readonly payload: string;
  readonly qos: QoS;
  readonly retain: boolean;
  readonly enqueued_at: number | null; // epoch seconds
}

/** A decoded entry together with the exact string that was popped. */
export interface PoppedEntry {
  readonly raw: string;
  readonly entry: QueueEntry;
}

export const HMAC_ALGORITHM = 'sha256';

/** Wire shape published in place of the raw payload when signing is on. */
export interface SignedEnvelope {
  readonly payload: string;
  readonly hmac: string;
  readonly algo: typeof HMAC_ALGORITHM;
}

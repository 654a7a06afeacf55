import { createHmac, timingSafeEqual } from 'node:crypto';
import { z } from 'zod';
import { HMAC_ALGORITHM } from '../domain/index.js';
import type { SignedEnvelope } from '../domain/index.js';
import type { BridgeConfig } from './bridge-config.js';

/**
 * HMAC-SHA256 signing of outbound payloads.
 *
 * SHA-256 is the only algorithm offered, so every subscriber verifies
 * against the same contract. The `algo` field is still emitted for
 * subscribers that dispatch on it.
 */
export function signPayload(payload: string, secret: string): string {
  return createHmac(HMAC_ALGORITHM, secret).update(payload, 'utf8').digest('hex');
}

export function createSignedEnvelope(payload: string, secret: string): SignedEnvelope {
  return { payload, hmac: signPayload(payload, secret), algo: HMAC_ALGORITHM };
}

const signedEnvelopeSchema = z.object({
  payload: z.string(),
  hmac: z.string(),
  algo: z.literal(HMAC_ALGORITHM),
});

export type VerifyResult =
  | { readonly valid: true; readonly payload: string }
  | { readonly valid: false; readonly payload: null };

const INVALID: VerifyResult = { valid: false, payload: null };

/**
 * Recomputes the digest of an envelope and compares it in constant time.
 *
 * Accepts either the serialized envelope or an already-parsed object.
 * Malformed JSON, a missing field or a foreign `algo` all yield
 * `{ valid: false }`.
 */
export function verifyEnvelope(envelope: unknown, secret: string): VerifyResult {
  let candidate: unknown = envelope;
  if (typeof envelope === 'string') {
    try {
      candidate = JSON.parse(envelope);
    } catch {
      return INVALID;
    }
  }

  const parsed = signedEnvelopeSchema.safeParse(candidate);
  if (!parsed.success) return INVALID;

  const expected = Buffer.from(signPayload(parsed.data.payload, secret), 'utf8');
  const actual = Buffer.from(parsed.data.hmac, 'utf8');
  if (expected.length !== actual.length) return INVALID;
  if (!timingSafeEqual(expected, actual)) return INVALID;

  return { valid: true, payload: parsed.data.payload };
}

/** Wraps payloads for one broker session. */
export interface Signer {
  sign(payload: string): SignedEnvelope;
}

/**
 * Builds the signer for a session from that session's configuration.
 *
 * The secret is captured here, at connection time; a rotated key is
 * picked up on the next reconnect.
 */
export function createSigner(
  config: Pick<BridgeConfig, 'hmac_enabled' | 'hmac_secret_key'>,
): Signer | null {
  if (!config.hmac_enabled) return null;
  const secret = config.hmac_secret_key;
  return {
    sign: (payload) => createSignedEnvelope(payload, secret),
  };
}

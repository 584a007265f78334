import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { HmacSha256Port } from '../ports/hmac-sha256.port.js';
import type { HexPort } from '../ports/hex.port.js';
import { TAG_LENGTH } from './constants.js';
import type { KeyError, VerifyError } from './errors.js';
import { parseSigningKey } from './signing-key.js';

/**
 * Signed envelope layout:
 *
 *   bytes[0 .. N-32]  firmware payload
 *   bytes[N-32 .. N]  HMAC-SHA256(key, payload)
 *
 * No header, magic or length field. The payload boundary is known only by
 * stripping the fixed TAG_LENGTH suffix.
 */

export interface EnvelopeCryptoDeps {
  readonly hmac: HmacSha256Port;
  readonly hex: HexPort;
}

export interface SignedFirmware {
  readonly envelope: Uint8Array;
  readonly payloadLength: number;
  /** Audit output only; not part of the cryptographic contract. */
  readonly tagHex: string;
}

export interface EnvelopeParts {
  readonly payload: Uint8Array;
  readonly tag: Uint8Array;
}

/**
 * Split an envelope into candidate payload and received tag.
 *
 * The returned views alias `envelope`; nothing here is trusted yet.
 */
export function splitEnvelope(envelope: Uint8Array): EnvelopeParts | null {
  if (envelope.length < TAG_LENGTH) return null;
  const boundary = envelope.length - TAG_LENGTH;
  return {
    payload: envelope.subarray(0, boundary),
    tag: envelope.subarray(boundary),
  };
}

export function concatEnvelope(payload: Uint8Array, tag: Uint8Array): Uint8Array {
  const out = new Uint8Array(payload.length + tag.length);
  out.set(payload, 0);
  out.set(tag, payload.length);
  return out;
}

/**
 * Sign a firmware payload. Deterministic: same payload + key → same envelope.
 *
 * The payload is copied into a fresh envelope buffer and never mutated.
 */
export function signFirmware(
  payload: Uint8Array,
  keyHex: string,
  deps: EnvelopeCryptoDeps
): Result<SignedFirmware, KeyError> {
  const key = parseSigningKey(keyHex, deps.hex);
  if (key.isErr()) return err(key.error);

  const tag = deps.hmac.hmacSha256(key.value, payload);
  return ok({
    envelope: concatEnvelope(payload, tag),
    payloadLength: payload.length,
    tagHex: deps.hex.encodeHex(tag),
  });
}

/**
 * Verify a signed envelope and release its payload.
 *
 * On SIGNATURE_INVALID the candidate payload is not returned in any form.
 * Callers treat every Err as "do not flash, do not execute".
 */
export function verifyFirmware(
  envelope: Uint8Array,
  keyHex: string,
  deps: EnvelopeCryptoDeps
): Result<Uint8Array, VerifyError> {
  const key = parseSigningKey(keyHex, deps.hex);
  if (key.isErr()) return err(key.error);

  const parts = splitEnvelope(envelope);
  if (parts === null) {
    return err({
      code: 'ENVELOPE_TOO_SHORT',
      message: `Signed firmware must be at least ${TAG_LENGTH} bytes, got ${envelope.length}`,
      actualLength: envelope.length,
    });
  }

  const expected = deps.hmac.hmacSha256(key.value, parts.payload);
  if (!deps.hmac.timingSafeEqual(expected, parts.tag)) {
    return err({ code: 'SIGNATURE_INVALID', message: 'Firmware signature verification failed' });
  }

  return ok(parts.payload.slice());
}

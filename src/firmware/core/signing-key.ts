import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { Brand } from '../../runtime/brand.js';
import type { HexPort } from '../ports/hex.port.js';
import { KEY_HEX_LENGTH, KEY_LENGTH } from './constants.js';
import type { KeyError } from './errors.js';

/** 32 bytes of key material that passed length and encoding checks. */
export type SigningKey = Brand<Uint8Array, 'SigningKey'>;

/** Canonical key text: 64 lowercase hex characters. */
export type KeyHex = Brand<string, 'KeyHex'>;

/**
 * Parse key text into key bytes.
 *
 * Order is fixed: length first, then encoding. Both run before any MAC is
 * computed, so a malformed key never reaches the crypto port.
 */
export function parseSigningKey(keyHex: string, hex: HexPort): Result<SigningKey, KeyError> {
  if (keyHex.length !== KEY_HEX_LENGTH) {
    return err({
      code: 'KEY_INVALID_LENGTH',
      message: `Key must be ${KEY_HEX_LENGTH} hex characters (${KEY_LENGTH} bytes), got ${keyHex.length}`,
      actualLength: keyHex.length,
    });
  }

  const decoded = hex.decodeHex(keyHex);
  if (decoded.isErr()) {
    return err({ code: 'KEY_INVALID_ENCODING', message: 'Key must be valid hexadecimal' });
  }

  // A conforming HexPort always yields KEY_LENGTH bytes here.
  if (decoded.value.length !== KEY_LENGTH) {
    return err({
      code: 'KEY_INVALID_LENGTH',
      message: `Key must decode to ${KEY_LENGTH} bytes, got ${decoded.value.length}`,
      actualLength: keyHex.length,
    });
  }

  return ok(decoded.value as SigningKey);
}

export function asKeyHex(value: string): KeyHex {
  return value as KeyHex;
}

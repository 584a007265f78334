import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { HexPort } from '../ports/hex.port.js';
import type { RandomEntropyPort } from '../ports/random-entropy.port.js';
import { KEY_LENGTH } from './constants.js';
import type { EntropyError } from './errors.js';
import type { KeyHex } from './signing-key.js';
import { asKeyHex } from './signing-key.js';

export interface KeyGeneratorDeps {
  readonly entropy: RandomEntropyPort;
  readonly hex: HexPort;
}

/**
 * Generate a fresh signing key as 64 lowercase hex characters.
 *
 * A failing or short entropy source is an error; there is no fallback.
 */
export function generateKey(deps: KeyGeneratorDeps): Result<KeyHex, EntropyError> {
  let bytes: Uint8Array;
  try {
    bytes = deps.entropy.generateBytes(KEY_LENGTH);
  } catch (e) {
    return err({
      code: 'ENTROPY_UNAVAILABLE',
      message: `Secure random source unavailable: ${e instanceof Error ? e.message : String(e)}`,
    });
  }

  if (bytes.length !== KEY_LENGTH) {
    return err({
      code: 'ENTROPY_UNAVAILABLE',
      message: `Secure random source returned ${bytes.length} bytes, expected ${KEY_LENGTH}`,
    });
  }

  return ok(asKeyHex(deps.hex.encodeHex(bytes)));
}

import { ok, err } from 'neverthrow';
import { Buffer } from 'node:buffer';
import type { HexPort, HexError } from '../../../ports/hex.port.js';

const HEX_RE = /^[0-9a-fA-F]*$/;

/**
 * Node hex adapter using Buffer (Node-specific, hidden behind port).
 *
 * Buffer.from(s, 'hex') stops at the first non-hex pair and drops a trailing
 * odd nibble, so the input is checked in full before decoding.
 */
export class NodeHex implements HexPort {
  encodeHex(bytes: Uint8Array): string {
    return Buffer.from(bytes).toString('hex');
  }

  decodeHex(input: string): ReturnType<HexPort['decodeHex']> {
    if (!HEX_RE.test(input)) {
      return err({
        code: 'INVALID_HEX_CHARACTERS',
        message: 'Invalid hex: only 0-9, a-f and A-F are allowed',
      } satisfies HexError);
    }

    if (input.length % 2 !== 0) {
      return err({
        code: 'INVALID_HEX_LENGTH',
        message: `Invalid hex: odd number of digits (${input.length})`,
      } satisfies HexError);
    }

    return ok(new Uint8Array(Buffer.from(input, 'hex')));
  }
}

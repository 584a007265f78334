import type { Result } from 'neverthrow';

export type HexError =
  | { readonly code: 'INVALID_HEX_CHARACTERS'; readonly message: string }
  | { readonly code: 'INVALID_HEX_LENGTH'; readonly message: string };

/**
 * Hex codec for key material and tag reporting.
 *
 * Design decisions (locked):
 * - encode is infallible and always emits lowercase
 * - decode is strict: no whitespace, no `0x` prefix, no odd length,
 *   never stops early on a bad character
 * - decode returns Result (invalid input is expected, not exceptional)
 */
export interface HexPort {
  encodeHex(bytes: Uint8Array): string;
  decodeHex(input: string): Result<Uint8Array, HexError>;
}

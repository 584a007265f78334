/**
 * Port: HMAC-SHA256 primitives (firmware envelope tags).
 *
 * Purpose:
 * - Compute the 32-byte tag appended to a firmware payload
 * - Compare tags in constant time during verification
 * - Feed large or chunked payloads through an incremental MAC
 *
 * Locked invariants:
 * - Algorithm: HMAC-SHA256, full 32-byte output (no truncation)
 * - Key size: 32 bytes
 * - MAC input: the raw payload bytes, nothing prepended or appended
 *
 * Guarantees:
 * - hmacSha256() is deterministic (same key + message → same tag)
 * - An incremental MAC fed the same bytes in any chunking yields the same tag
 * - timingSafeEqual() does not exit early on the first differing byte
 *
 * Example:
 * ```typescript
 * const tag = hmac.hmacSha256(keyBytes, payload);
 * const ok = hmac.timingSafeEqual(tag, receivedTag);
 * ```
 */
export interface HmacSha256Port {
  /**
   * Compute HMAC-SHA256 over a single message. Returns 32 bytes.
   */
  hmacSha256(key: Uint8Array, message: Uint8Array): Uint8Array;

  /**
   * Start an incremental HMAC-SHA256 computation.
   */
  createIncremental(key: Uint8Array): IncrementalHmac;

  /**
   * Compare two byte arrays in a timing-safe way.
   *
   * Returns true only if arrays are equal and same length.
   */
  timingSafeEqual(a: Uint8Array, b: Uint8Array): boolean;
}

/**
 * Incremental MAC state. `digest()` may be called once.
 */
export interface IncrementalHmac {
  update(chunk: Uint8Array): void;
  digest(): Uint8Array;
}

/**
 * Random entropy port for cryptographically secure random bytes.
 *
 * Purpose:
 * - Source of key material for the key generator
 * - Swappable in tests to force an unreadable source
 *
 * Guarantees:
 * - Synchronous (randomness is CPU-bound, no I/O)
 * - Cryptographically secure (not Math.random())
 * - Returns exactly the requested byte count, or throws
 *
 * @example
 * const bytes = entropy.generateBytes(32);  // 32-byte key
 */
export interface RandomEntropyPort {
  /**
   * Generate cryptographically secure random bytes.
   *
   * @param count - Number of bytes to generate (must be positive)
   */
  generateBytes(count: number): Uint8Array;
}

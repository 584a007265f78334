import { randomBytes } from 'node:crypto';
import type { RandomEntropyPort } from '../../../ports/random-entropy.port.js';

/**
 * Node crypto adapter for random entropy generation.
 *
 * Uses Node.js crypto.randomBytes() which is cryptographically secure.
 * Throws when the OS entropy source cannot be read; callers map that to
 * ENTROPY_UNAVAILABLE.
 */
export class NodeRandomEntropy implements RandomEntropyPort {
  generateBytes(count: number): Uint8Array {
    return new Uint8Array(randomBytes(count));
  }
}

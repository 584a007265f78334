/**
 * firmseal library entry point.
 *
 * The core functions take their crypto ports explicitly; `createNodeCrypto()`
 * returns the Node-backed adapters for callers that do not need to swap them.
 */

import type { EnvelopeCryptoDeps } from './firmware/core/envelope.js';
import type { KeyGeneratorDeps } from './firmware/core/key-generator.js';
import { NodeHmacSha256 } from './firmware/infra/local/hmac-sha256/index.js';
import { NodeHex } from './firmware/infra/local/hex/index.js';
import { NodeRandomEntropy } from './firmware/infra/local/random-entropy/index.js';

export { TAG_LENGTH, KEY_LENGTH, KEY_HEX_LENGTH } from './firmware/core/constants.js';
export type {
  KeyError,
  EntropyError,
  EnvelopeTooShortError,
  SignatureInvalidError,
  VerifyError,
  ChunkError,
  ChunkedVerifyError,
} from './firmware/core/errors.js';
export { parseSigningKey, type SigningKey, type KeyHex } from './firmware/core/signing-key.js';
export {
  signFirmware,
  verifyFirmware,
  splitEnvelope,
  concatEnvelope,
  type EnvelopeCryptoDeps,
  type SignedFirmware,
  type EnvelopeParts,
} from './firmware/core/envelope.js';
export { generateKey, type KeyGeneratorDeps } from './firmware/core/key-generator.js';
export { ChunkedEnvelopeVerifier, verifyChunks, type ChunkedVerifyOutcome } from './firmware/core/chunked-verifier.js';
export type { HmacSha256Port, IncrementalHmac } from './firmware/ports/hmac-sha256.port.js';
export type { RandomEntropyPort } from './firmware/ports/random-entropy.port.js';
export type { HexPort, HexError } from './firmware/ports/hex.port.js';
export type { FileSystemPort, FsError } from './firmware/ports/fs.port.js';
export { NodeHmacSha256, NodeHex, NodeRandomEntropy };
export { NodeFileSystem } from './firmware/infra/local/fs/index.js';
export { writeFileAtomically, type AtomicWriteOutcome } from './firmware/io/atomic-write.js';

export function createNodeCrypto(): EnvelopeCryptoDeps & KeyGeneratorDeps {
  return {
    hmac: new NodeHmacSha256(),
    hex: new NodeHex(),
    entropy: new NodeRandomEntropy(),
  };
}

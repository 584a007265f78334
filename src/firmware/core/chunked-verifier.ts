import type { Result } from 'neverthrow';
import { err, ok } from 'neverthrow';
import type { HmacSha256Port, IncrementalHmac } from '../ports/hmac-sha256.port.js';
import { TAG_LENGTH } from './constants.js';
import type { EnvelopeCryptoDeps } from './envelope.js';
import type { ChunkError, ChunkedVerifyError, SignatureInvalidError, VerifyError } from './errors.js';
import { parseSigningKey } from './signing-key.js';

export interface ChunkedVerifyOutcome {
  readonly payloadLength: number;
}

/**
 * Verifies an envelope that arrives in pieces with a declared total size,
 * the way a device loader receives an upload.
 *
 * Payload bytes are fed to an incremental MAC and handed back to the caller
 * for staging; the trailing TAG_LENGTH bytes are held aside. Nothing staged
 * may be committed until finish() returns Ok.
 *
 * Chunk boundaries never affect the outcome.
 */
export class ChunkedEnvelopeVerifier {
  private received = 0;
  private finished = false;
  private readonly receivedTag = new Uint8Array(TAG_LENGTH);

  private constructor(
    private readonly mac: IncrementalHmac,
    private readonly hmac: HmacSha256Port,
    readonly declaredSize: number
  ) {}

  /**
   * Key validation runs first, then the declared size is checked.
   */
  static start(
    keyHex: string,
    declaredSize: number,
    deps: EnvelopeCryptoDeps
  ): Result<ChunkedEnvelopeVerifier, VerifyError | ChunkError> {
    const key = parseSigningKey(keyHex, deps.hex);
    if (key.isErr()) return err(key.error);

    if (!Number.isSafeInteger(declaredSize) || declaredSize < 0) {
      return err({ code: 'CHUNK_INVALID_SIZE', message: `Declared size must be a non-negative integer, got ${declaredSize}` });
    }
    if (declaredSize < TAG_LENGTH) {
      return err({
        code: 'ENVELOPE_TOO_SHORT',
        message: `Signed firmware must be at least ${TAG_LENGTH} bytes, got ${declaredSize}`,
        actualLength: declaredSize,
      });
    }

    return ok(new ChunkedEnvelopeVerifier(deps.hmac.createIncremental(key.value), deps.hmac, declaredSize));
  }

  get payloadLength(): number {
    return this.declaredSize - TAG_LENGTH;
  }

  get bytesReceived(): number {
    return this.received;
  }

  /**
   * Accept the next chunk. Returns the part of it that belongs to the payload
   * (possibly empty). A rejected chunk leaves the verifier unchanged.
   */
  write(chunk: Uint8Array): Result<Uint8Array, ChunkError> {
    if (this.finished) {
      return err({ code: 'CHUNK_FINISHED', message: 'Verification already finished' });
    }
    if (this.received + chunk.length > this.declaredSize) {
      return err({
        code: 'CHUNK_OVERRUN',
        message: `Chunk of ${chunk.length} bytes exceeds declared size ${this.declaredSize} (received ${this.received})`,
        declaredSize: this.declaredSize,
      });
    }

    const payloadEnd = this.payloadLength;
    const payloadInChunk = Math.max(0, Math.min(chunk.length, payloadEnd - this.received));
    const payloadPart = chunk.subarray(0, payloadInChunk);
    if (payloadPart.length > 0) this.mac.update(payloadPart);

    const tagPart = chunk.subarray(payloadInChunk);
    if (tagPart.length > 0) {
      this.receivedTag.set(tagPart, this.received + payloadInChunk - payloadEnd);
    }

    this.received += chunk.length;
    return ok(payloadPart);
  }

  /**
   * Finalize the MAC and compare it with the received tag in constant time.
   *
   * An incomplete upload can still be continued; any other outcome is final.
   */
  finish(): Result<ChunkedVerifyOutcome, ChunkError | SignatureInvalidError> {
    if (this.finished) {
      return err({ code: 'CHUNK_FINISHED', message: 'Verification already finished' });
    }
    if (this.received < this.declaredSize) {
      return err({
        code: 'CHUNK_INCOMPLETE',
        message: `Received ${this.received} of ${this.declaredSize} bytes`,
        received: this.received,
        declaredSize: this.declaredSize,
      });
    }

    this.finished = true;
    const expected = this.mac.digest();
    if (!this.hmac.timingSafeEqual(expected, this.receivedTag)) {
      return err({ code: 'SIGNATURE_INVALID', message: 'Firmware signature verification failed' });
    }
    return ok({ payloadLength: this.payloadLength });
  }
}

/**
 * Verify an envelope delivered as a sequence of chunks. Returns the staged
 * payload only once the whole envelope checks out.
 */
export function verifyChunks(
  chunks: Iterable<Uint8Array>,
  declaredSize: number,
  keyHex: string,
  deps: EnvelopeCryptoDeps
): Result<Uint8Array, ChunkedVerifyError> {
  const started = ChunkedEnvelopeVerifier.start(keyHex, declaredSize, deps);
  if (started.isErr()) return err(started.error);
  const verifier = started.value;

  const staged = new Uint8Array(verifier.payloadLength);
  let offset = 0;
  for (const chunk of chunks) {
    const written = verifier.write(chunk);
    if (written.isErr()) return err(written.error);
    staged.set(written.value, offset);
    offset += written.value.length;
  }

  const finished = verifier.finish();
  if (finished.isErr()) return err(finished.error);
  return ok(staged);
}

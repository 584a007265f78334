/**
 * Verify Command
 *
 * Checks a signed envelope against a key and, on success only, optionally
 * writes the verified payload. With `chunkSize` the envelope is fed through
 * the chunked verifier the way a device receives an upload.
 */

import type { Result } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { success, misuse } from '../types/cli-result.js';
import { dirSyncWarnings, firmwareErrorToCliResult, fsErrorToCliResult } from '../error-mapping.js';
import type { EnvelopeCryptoDeps } from '../../firmware/core/envelope.js';
import { verifyFirmware } from '../../firmware/core/envelope.js';
import { verifyChunks } from '../../firmware/core/chunked-verifier.js';
import { parseSigningKey } from '../../firmware/core/signing-key.js';
import type { ChunkedVerifyError } from '../../firmware/core/errors.js';
import type { FileSystemPort, FsError } from '../../firmware/ports/fs.port.js';
import { writeFileAtomically } from '../../firmware/io/atomic-write.js';
import type { Logger } from '../../core/logging/index.js';
import { assertNever } from '../../runtime/assert-never.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface VerifyCommandDeps {
  readonly fs: FileSystemPort;
  readonly crypto: EnvelopeCryptoDeps;
  readonly logger: Logger;
}

export interface VerifyCommandOptions {
  readonly output?: string;
  readonly chunkSize?: number;
}

export type VerifyFileResult =
  | { kind: 'verified'; payloadLength: number; outputPath?: string; dirSyncError?: FsError }
  | { kind: 'rejected'; error: ChunkedVerifyError }
  | { kind: 'read_error'; error: FsError }
  | { kind: 'write_error'; error: FsError };

// ═══════════════════════════════════════════════════════════════════════════
// PURE FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Split bytes into consecutive views of at most `size` bytes.
 */
export function* chunksOf(bytes: Uint8Array, size: number): Generator<Uint8Array> {
  for (let offset = 0; offset < bytes.length; offset += size) {
    yield bytes.subarray(offset, offset + size);
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// FILE OPERATIONS
// ═══════════════════════════════════════════════════════════════════════════

export async function verifyFirmwareFile(
  inputPath: string,
  keyHex: string,
  options: VerifyCommandOptions,
  deps: VerifyCommandDeps
): Promise<VerifyFileResult> {
  const key = parseSigningKey(keyHex, deps.crypto.hex);
  if (key.isErr()) return { kind: 'rejected', error: key.error };

  const envelope = await deps.fs.readFileBytes(inputPath);
  if (envelope.isErr()) return { kind: 'read_error', error: envelope.error };

  const verified: Result<Uint8Array, ChunkedVerifyError> =
    options.chunkSize === undefined
      ? verifyFirmware(envelope.value, keyHex, deps.crypto)
      : verifyChunks(chunksOf(envelope.value, options.chunkSize), envelope.value.length, keyHex, deps.crypto);

  if (verified.isErr()) {
    deps.logger.warn({ inputPath, code: verified.error.code }, 'Firmware rejected');
    return { kind: 'rejected', error: verified.error };
  }

  const payload = verified.value;
  deps.logger.info({ inputPath, payloadLength: payload.length }, 'Firmware verified');

  if (options.output === undefined) {
    return { kind: 'verified', payloadLength: payload.length };
  }

  const written = await writeFileAtomically(deps.fs, options.output, payload);
  if (written.isErr()) return { kind: 'write_error', error: written.error };

  const verifiedFile = { kind: 'verified', payloadLength: payload.length, outputPath: options.output } as const;
  if (written.value.kind === 'unsynced_dir') {
    deps.logger.warn({ outputPath: options.output, code: written.value.error.code }, 'Firmware written but directory not synced');
    return { ...verifiedFile, dirSyncError: written.value.error };
  }
  return verifiedFile;
}

// ═══════════════════════════════════════════════════════════════════════════
// CLI COMMAND
// ═══════════════════════════════════════════════════════════════════════════

export async function executeVerifyCommand(
  inputPath: string,
  keyHex: string,
  options: VerifyCommandOptions,
  deps: VerifyCommandDeps
): Promise<CliResult> {
  if (options.chunkSize !== undefined && (!Number.isSafeInteger(options.chunkSize) || options.chunkSize < 1)) {
    return misuse(`Chunk size must be a positive integer, got ${options.chunkSize}`);
  }

  const result = await verifyFirmwareFile(inputPath, keyHex, options, deps);

  switch (result.kind) {
    case 'verified': {
      const details = [`Firmware size: ${result.payloadLength} bytes`];
      if (result.outputPath !== undefined) details.push(`Firmware written to: ${result.outputPath}`);
      return success({ message: 'Signature verified', details, warnings: dirSyncWarnings(result.dirSyncError) });
    }

    case 'rejected':
      return firmwareErrorToCliResult(result.error);

    case 'read_error':
      return fsErrorToCliResult(result.error, 'read');

    case 'write_error':
      return fsErrorToCliResult(result.error, 'write');

    default:
      return assertNever(result);
  }
}

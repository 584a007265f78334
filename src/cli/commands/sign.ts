/**
 * Sign Command
 *
 * Reads a firmware image, appends its HMAC-SHA256 tag, and writes the
 * signed envelope atomically.
 */

import * as path from 'path';
import type { CliResult } from '../types/cli-result.js';
import { success } from '../types/cli-result.js';
import { dirSyncWarnings, firmwareErrorToCliResult, fsErrorToCliResult } from '../error-mapping.js';
import type { EnvelopeCryptoDeps } from '../../firmware/core/envelope.js';
import { signFirmware } from '../../firmware/core/envelope.js';
import { parseSigningKey } from '../../firmware/core/signing-key.js';
import type { KeyError } from '../../firmware/core/errors.js';
import type { FileSystemPort, FsError } from '../../firmware/ports/fs.port.js';
import { writeFileAtomically } from '../../firmware/io/atomic-write.js';
import type { Logger } from '../../core/logging/index.js';
import { assertNever } from '../../runtime/assert-never.js';

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

export interface SignCommandDeps {
  readonly fs: FileSystemPort;
  readonly crypto: EnvelopeCryptoDeps;
  readonly signedSuffix: string;
  readonly logger: Logger;
}

export interface SignCommandOptions {
  readonly output?: string;
}

export type SignFileResult =
  | {
      kind: 'signed';
      outputPath: string;
      payloadLength: number;
      tagHex: string;
      totalLength: number;
      dirSyncError?: FsError;
    }
  | { kind: 'key_rejected'; error: KeyError }
  | { kind: 'read_error'; error: FsError }
  | { kind: 'write_error'; error: FsError };

// ═══════════════════════════════════════════════════════════════════════════
// PURE FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Insert `suffix` before the input's extension: `fw.bin` → `fw_signed.bin`,
 * `fw` → `fw_signed`. Dotfiles without an extension keep their whole name.
 */
export function defaultSignedOutputPath(inputPath: string, suffix: string): string {
  const ext = path.extname(inputPath);
  const base = inputPath.slice(0, inputPath.length - ext.length);
  return `${base}${suffix}${ext}`;
}

// ═══════════════════════════════════════════════════════════════════════════
// FILE OPERATIONS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Sign a firmware file.
 *
 * The key is checked before the input is read, and the complete envelope is
 * built in memory before anything is written.
 */
export async function signFirmwareFile(
  inputPath: string,
  keyHex: string,
  options: SignCommandOptions,
  deps: SignCommandDeps
): Promise<SignFileResult> {
  const key = parseSigningKey(keyHex, deps.crypto.hex);
  if (key.isErr()) return { kind: 'key_rejected', error: key.error };

  const firmware = await deps.fs.readFileBytes(inputPath);
  if (firmware.isErr()) return { kind: 'read_error', error: firmware.error };

  const signed = signFirmware(firmware.value, keyHex, deps.crypto);
  if (signed.isErr()) return { kind: 'key_rejected', error: signed.error };

  const { envelope, payloadLength, tagHex } = signed.value;
  deps.logger.info({ inputPath, payloadLength, tagHex }, 'Firmware signed');

  const outputPath = options.output ?? defaultSignedOutputPath(inputPath, deps.signedSuffix);
  const written = await writeFileAtomically(deps.fs, outputPath, envelope);
  if (written.isErr()) {
    deps.logger.error({ outputPath, code: written.error.code }, 'Failed to write signed firmware');
    return { kind: 'write_error', error: written.error };
  }

  const signedFile = { kind: 'signed', outputPath, payloadLength, tagHex, totalLength: envelope.length } as const;
  if (written.value.kind === 'unsynced_dir') {
    deps.logger.warn({ outputPath, code: written.value.error.code }, 'Signed firmware written but directory not synced');
    return { ...signedFile, dirSyncError: written.value.error };
  }
  return signedFile;
}

// ═══════════════════════════════════════════════════════════════════════════
// CLI COMMAND
// ═══════════════════════════════════════════════════════════════════════════

export async function executeSignCommand(
  inputPath: string,
  keyHex: string,
  options: SignCommandOptions,
  deps: SignCommandDeps
): Promise<CliResult> {
  const result = await signFirmwareFile(inputPath, keyHex, options, deps);

  switch (result.kind) {
    case 'signed':
      return success({
        message: `Signed firmware: ${result.outputPath} (${result.totalLength} bytes)`,
        details: [`Firmware size: ${result.payloadLength} bytes`, `Signature: ${result.tagHex}`],
        warnings: dirSyncWarnings(result.dirSyncError),
      });

    case 'key_rejected':
      return firmwareErrorToCliResult(result.error);

    case 'read_error':
      return fsErrorToCliResult(result.error, 'read');

    case 'write_error':
      return fsErrorToCliResult(result.error, 'write');

    default:
      return assertNever(result);
  }
}

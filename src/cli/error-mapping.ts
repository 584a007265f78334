/**
 * Maps firmware and file-system errors to CLI results.
 *
 * Key problems are misuse (exit 2). Everything else, rejected signatures
 * included, is a general error (exit 1). File errors keep their own wording
 * so an I/O failure is never reported as a bad signature.
 */

import type { CliResult } from './types/cli-result.js';
import { failure, misuse } from './types/cli-result.js';
import type { ChunkedVerifyError, EntropyError } from '../firmware/core/errors.js';
import type { FsError } from '../firmware/ports/fs.port.js';
import { KEY_HEX_LENGTH, TAG_LENGTH } from '../firmware/core/constants.js';
import { assertNever } from '../runtime/assert-never.js';

export function firmwareErrorToCliResult(error: ChunkedVerifyError | EntropyError): CliResult {
  switch (error.code) {
    case 'KEY_INVALID_LENGTH':
      return misuse(`Key must be ${KEY_HEX_LENGTH} hex characters, got ${error.actualLength}`, [
        'Generate a key with `firmseal keygen`',
      ]);

    case 'KEY_INVALID_ENCODING':
      return misuse('Key must be valid hexadecimal', ['Use only the characters 0-9 and a-f']);

    case 'ENTROPY_UNAVAILABLE':
      return failure('Secure random source unavailable', { details: [error.message] });

    case 'ENVELOPE_TOO_SHORT':
      return failure(`Signed firmware is ${error.actualLength} bytes; at least ${TAG_LENGTH} are required`, {
        suggestions: ['Check that the file was produced by `firmseal sign`'],
      });

    case 'SIGNATURE_INVALID':
      return failure('Signature verification failed: do not flash this firmware', {
        suggestions: ['Check that the key matches the one used for signing'],
      });

    case 'CHUNK_INVALID_SIZE':
    case 'CHUNK_OVERRUN':
    case 'CHUNK_INCOMPLETE':
    case 'CHUNK_FINISHED':
      return failure(`Chunked verification failed: ${error.message}`);

    default:
      return assertNever(error);
  }
}

export function fsErrorToCliResult(error: FsError, action: 'read' | 'write'): CliResult {
  switch (error.code) {
    case 'FS_NOT_FOUND':
      return failure(`Failed to ${action} file: ${error.message}`, {
        suggestions: [action === 'read' ? 'Check the file path and try again' : 'Check that the output directory exists'],
      });

    case 'FS_PERMISSION_DENIED':
      return failure(`Failed to ${action} file: ${error.message}`, {
        suggestions: ['Check file permissions and try again'],
      });

    case 'FS_ALREADY_EXISTS':
    case 'FS_IO_ERROR':
    case 'FS_UNSUPPORTED':
      return failure(`Failed to ${action} file: ${error.message}`);

    default:
      return assertNever(error);
  }
}

/**
 * Warning lines for an output that was renamed into place but whose
 * directory could not be fsynced.
 */
export function dirSyncWarnings(error: FsError | undefined): readonly string[] | undefined {
  return error === undefined ? undefined : [`Output written, but its directory could not be synced: ${error.message}`];
}

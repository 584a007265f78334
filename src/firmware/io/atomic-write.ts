import type { ResultAsync } from 'neverthrow';
import { errAsync, okAsync } from 'neverthrow';
import * as path from 'path';
import type { FileSystemPort, FsError } from '../ports/fs.port.js';

/**
 * Outcome of a write that reached its target path.
 *
 * `unsynced_dir`: the complete file is in place but the directory entry was
 * not fsynced, so the rename may not survive a power loss.
 */
export type AtomicWriteOutcome =
  | { readonly kind: 'durable' }
  | { readonly kind: 'unsynced_dir'; readonly error: FsError };

/**
 * Write bytes to `filePath` so that readers see either the old file or the
 * complete new one: tmp → write → fsync → close → rename → fsync dir.
 *
 * Failures up to the rename remove the tmp file and return the original
 * error. After the rename the write has happened; a directory fsync failure
 * is reported in the outcome.
 */
export function writeFileAtomically(
  fs: FileSystemPort,
  filePath: string,
  bytes: Uint8Array
): ResultAsync<AtomicWriteOutcome, FsError> {
  const tmpPath = `${filePath}.tmp`;

  return fs
    .openWriteTruncate(tmpPath)
    .andThen((h) =>
      fs
        .writeAll(h.fd, bytes)
        .andThen(() => fs.fsyncFile(h.fd))
        // Close once on failure; the success path closes below.
        .orElse((e) => fs.closeFile(h.fd).orElse(() => okAsync(undefined)).andThen(() => errAsync(e)))
        .andThen(() => fs.closeFile(h.fd))
    )
    .andThen(() => fs.rename(tmpPath, filePath))
    .orElse((e) => discardTmp(fs, tmpPath, e))
    .andThen(() =>
      fs
        .fsyncDir(path.dirname(filePath))
        .map((): AtomicWriteOutcome => ({ kind: 'durable' }))
        .orElse((e) =>
          okAsync<AtomicWriteOutcome, FsError>(e.code === 'FS_UNSUPPORTED' ? { kind: 'durable' } : { kind: 'unsynced_dir', error: e })
        )
    );
}

function discardTmp(fs: FileSystemPort, tmpPath: string, cause: FsError): ResultAsync<never, FsError> {
  return fs
    .unlink(tmpPath)
    .orElse((e) => (e.code === 'FS_NOT_FOUND' ? okAsync(undefined) : errAsync(cause)))
    .andThen(() => errAsync(cause));
}

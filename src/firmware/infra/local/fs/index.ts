import * as fs from 'fs/promises';
import * as fsCb from 'fs';
import { constants as fsConstants } from 'fs';
import type { ResultAsync } from 'neverthrow';
import { ResultAsync as RA } from 'neverthrow';
import type { FileSystemPort, FsError } from '../../../ports/fs.port.js';

function nodeErrorCode(e: unknown): string | undefined {
  if (typeof e !== 'object' || e === null) return undefined;
  // Node errors typically expose a string `code` property; treat it as best-effort.
  const code = (e as { readonly code?: unknown }).code;
  return typeof code === 'string' ? code : undefined;
}

function mapFsError(e: unknown, filePath: string): FsError {
  const code = nodeErrorCode(e);

  if (code === 'ENOENT') return { code: 'FS_NOT_FOUND', message: `Not found: ${filePath}` };
  if (code === 'EEXIST') return { code: 'FS_ALREADY_EXISTS', message: `Already exists: ${filePath}` };
  if (code === 'EACCES' || code === 'EPERM') return { code: 'FS_PERMISSION_DENIED', message: `Permission denied: ${filePath}` };
  return { code: 'FS_IO_ERROR', message: `FS error at ${filePath}: ${e instanceof Error ? e.message : String(e)}` };
}

export class NodeFileSystem implements FileSystemPort {
  readFileBytes(filePath: string): ResultAsync<Uint8Array, FsError> {
    return RA.fromPromise(fs.readFile(filePath), (e) => mapFsError(e, filePath)).map((b) => new Uint8Array(b));
  }

  openWriteTruncate(filePath: string): ResultAsync<{ readonly fd: number }, FsError> {
    return RA.fromPromise(
      new Promise<{ fd: number }>((resolve, reject) => {
        fsCb.open(filePath, fsConstants.O_CREAT | fsConstants.O_TRUNC | fsConstants.O_WRONLY, 0o644, (err, fd) => {
          if (err) reject(err);
          else resolve({ fd });
        });
      }),
      (e) => mapFsError(e, filePath)
    );
  }

  writeAll(fd: number, bytes: Uint8Array): ResultAsync<void, FsError> {
    return RA.fromPromise(
      (async () => {
        // fs.write may accept fewer bytes than requested; loop until done.
        let offset = 0;
        while (offset < bytes.length) {
          const written = await new Promise<number>((resolve, reject) => {
            fsCb.write(fd, bytes, offset, bytes.length - offset, null, (err, n) => {
              if (err) reject(err);
              else resolve(n);
            });
          });
          offset += written;
        }
      })(),
      (e) => mapFsError(e, `fd:${fd}`)
    );
  }

  fsyncFile(fd: number): ResultAsync<void, FsError> {
    return RA.fromPromise(
      new Promise<void>((resolve, reject) => {
        fsCb.fsync(fd, (err) => (err ? reject(err) : resolve()));
      }),
      (e) => mapFsError(e, `fd:${fd}`)
    );
  }

  closeFile(fd: number): ResultAsync<void, FsError> {
    return RA.fromPromise(
      new Promise<void>((resolve, reject) => {
        fsCb.close(fd, (err) => (err ? reject(err) : resolve()));
      }),
      (e) => mapFsError(e, `fd:${fd}`)
    );
  }

  rename(fromPath: string, toPath: string): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.rename(fromPath, toPath), (e) => mapFsError(e, `${fromPath} -> ${toPath}`));
  }

  unlink(filePath: string): ResultAsync<void, FsError> {
    return RA.fromPromise(fs.unlink(filePath).then(() => undefined), (e) => mapFsError(e, filePath));
  }

  fsyncDir(dirPath: string): ResultAsync<void, FsError> {
    return RA.fromPromise(
      (async () => {
        // fsync a directory by opening it, then fsyncing the fd.
        const dirHandle = await fs.open(dirPath, 'r');
        try {
          await dirHandle.sync();
        } finally {
          await dirHandle.close();
        }
      })(),
      (e) => {
        const code = nodeErrorCode(e);
        if (code === 'EINVAL' || code === 'ENOTSUP' || code === 'EISDIR') {
          return { code: 'FS_UNSUPPORTED', message: `Directory fsync unsupported for: ${dirPath}` };
        }
        return mapFsError(e, dirPath);
      }
    );
  }
}

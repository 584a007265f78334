/**
 * In-memory fake for the firmware FileSystemPort.
 *
 * - Files live in a Map keyed by path
 * - Writes go to a per-descriptor buffer and land on close
 * - Any operation can be made to fail once via failNext()
 */

import { okAsync, errAsync, type ResultAsync } from 'neverthrow';
import type { FileSystemPort, FsError } from '../../../src/firmware/ports/fs.port.js';

type Operation = 'readFileBytes' | 'openWriteTruncate' | 'writeAll' | 'fsyncFile' | 'closeFile' | 'rename' | 'unlink' | 'fsyncDir';

export class InMemoryFileSystem implements FileSystemPort {
  private readonly files = new Map<string, Uint8Array>();
  private readonly openFiles = new Map<number, { path: string; chunks: Uint8Array[] }>();
  private readonly failures = new Map<Operation, FsError>();
  private nextFd = 3;
  readonly calls: Operation[] = [];

  // Test utilities
  seed(filePath: string, bytes: Uint8Array): void {
    this.files.set(filePath, bytes.slice());
  }

  get(filePath: string): Uint8Array | undefined {
    return this.files.get(filePath);
  }

  paths(): string[] {
    return [...this.files.keys()].sort();
  }

  failNext(op: Operation, error: FsError): void {
    this.failures.set(op, error);
  }

  private injected(op: Operation): FsError | undefined {
    this.calls.push(op);
    const failure = this.failures.get(op);
    if (failure) this.failures.delete(op);
    return failure;
  }

  readFileBytes(filePath: string): ResultAsync<Uint8Array, FsError> {
    const failure = this.injected('readFileBytes');
    if (failure) return errAsync(failure);
    const bytes = this.files.get(filePath);
    if (!bytes) return errAsync({ code: 'FS_NOT_FOUND', message: `Not found: ${filePath}` });
    return okAsync(bytes.slice());
  }

  openWriteTruncate(filePath: string): ResultAsync<{ readonly fd: number }, FsError> {
    const failure = this.injected('openWriteTruncate');
    if (failure) return errAsync(failure);
    const fd = this.nextFd++;
    this.openFiles.set(fd, { path: filePath, chunks: [] });
    this.files.set(filePath, new Uint8Array(0));
    return okAsync({ fd });
  }

  writeAll(fd: number, bytes: Uint8Array): ResultAsync<void, FsError> {
    const failure = this.injected('writeAll');
    if (failure) return errAsync(failure);
    const open = this.openFiles.get(fd);
    if (!open) return errAsync({ code: 'FS_IO_ERROR', message: `Bad fd: ${fd}` });
    open.chunks.push(bytes.slice());
    return okAsync(undefined);
  }

  fsyncFile(fd: number): ResultAsync<void, FsError> {
    const failure = this.injected('fsyncFile');
    if (failure) return errAsync(failure);
    if (!this.openFiles.has(fd)) return errAsync({ code: 'FS_IO_ERROR', message: `Bad fd: ${fd}` });
    return okAsync(undefined);
  }

  closeFile(fd: number): ResultAsync<void, FsError> {
    const failure = this.injected('closeFile');
    if (failure) return errAsync(failure);
    const open = this.openFiles.get(fd);
    if (!open) return errAsync({ code: 'FS_IO_ERROR', message: `Bad fd: ${fd}` });
    const total = open.chunks.reduce((n, c) => n + c.length, 0);
    const out = new Uint8Array(total);
    let offset = 0;
    for (const c of open.chunks) {
      out.set(c, offset);
      offset += c.length;
    }
    this.files.set(open.path, out);
    this.openFiles.delete(fd);
    return okAsync(undefined);
  }

  rename(fromPath: string, toPath: string): ResultAsync<void, FsError> {
    const failure = this.injected('rename');
    if (failure) return errAsync(failure);
    const bytes = this.files.get(fromPath);
    if (!bytes) return errAsync({ code: 'FS_NOT_FOUND', message: `Not found: ${fromPath}` });
    this.files.delete(fromPath);
    this.files.set(toPath, bytes);
    return okAsync(undefined);
  }

  unlink(filePath: string): ResultAsync<void, FsError> {
    const failure = this.injected('unlink');
    if (failure) return errAsync(failure);
    if (!this.files.delete(filePath)) return errAsync({ code: 'FS_NOT_FOUND', message: `Not found: ${filePath}` });
    return okAsync(undefined);
  }

  fsyncDir(): ResultAsync<void, FsError> {
    const failure = this.injected('fsyncDir');
    if (failure) return errAsync(failure);
    return okAsync(undefined);
  }
}

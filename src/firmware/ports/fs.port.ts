import type { ResultAsync } from 'neverthrow';

export type FsError =
  | { readonly code: 'FS_IO_ERROR'; readonly message: string }
  | { readonly code: 'FS_NOT_FOUND'; readonly message: string }
  | { readonly code: 'FS_ALREADY_EXISTS'; readonly message: string }
  | { readonly code: 'FS_PERMISSION_DENIED'; readonly message: string }
  | { readonly code: 'FS_UNSUPPORTED'; readonly message: string };

/**
 * Port: File reading.
 * Used by: sign and verify commands (firmware and envelope input).
 */
export interface FileReadPort {
  readFileBytes(filePath: string): ResultAsync<Uint8Array, FsError>;
}

/**
 * Port: File descriptor operations for crash-safe writes.
 * Used by: atomic output writer.
 */
export interface FileDescriptorPort {
  /**
   * Open a file for writing (create or truncate). Used for crash-safe write+fsync+rename flows.
   */
  openWriteTruncate(filePath: string): ResultAsync<{ readonly fd: number }, FsError>;

  writeAll(fd: number, bytes: Uint8Array): ResultAsync<void, FsError>;
  fsyncFile(fd: number): ResultAsync<void, FsError>;
  closeFile(fd: number): ResultAsync<void, FsError>;
}

/**
 * Port: File manipulation and directory sync.
 * Used by: atomic output writer.
 */
export interface FileManipulationPort {
  rename(fromPath: string, toPath: string): ResultAsync<void, FsError>;
  unlink(filePath: string): ResultAsync<void, FsError>;
  fsyncDir(dirPath: string): ResultAsync<void, FsError>;
}

/**
 * Composite port for the CLI's file operations.
 */
export interface FileSystemPort extends FileReadPort, FileDescriptorPort, FileManipulationPort {}

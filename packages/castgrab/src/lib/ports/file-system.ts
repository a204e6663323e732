/**
 * A file opened for sequential writing.
 */
export interface WritableFile {
  write(chunk: Uint8Array): Promise<void>;
  close(): Promise<void>;
}

/**
 * The filesystem operations a download needs.
 * Swapped for an in-memory implementation in tests.
 */
export interface FileSystem {
  /** Create a directory and its parents if missing */
  ensureDir(path: string): Promise<void>;
  /** Create or truncate a file */
  openForWrite(path: string): Promise<WritableFile>;
  /** Delete a file; resolves quietly when it does not exist */
  remove(path: string): Promise<void>;
  exists(path: string): Promise<boolean>;
}

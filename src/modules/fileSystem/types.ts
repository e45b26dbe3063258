export interface FileAttributes {
  /** POSIX permission bits, e.g. 0o700. */
  mode?: number;
}

/**
 * Synchronous filesystem capability the storage engine runs on.
 * Swap in InMemoryFileSystem for tests, or your own driver for sandboxes.
 */
export interface FileSystem {
  exists(path: string): boolean;
  /** Creates the directory along with any missing parents. */
  createDirectory(path: string): void;
  setAttributes(path: string, attributes: FileAttributes): void;
  /** Returns false when the write was refused. Existing files are overwritten. */
  writeFile(path: string, data: Uint8Array): boolean;
  readFile(path: string): Buffer;
  /** Throws when nothing exists at `path`. */
  removeFile(path: string): void;
  /** Recursive. Throws when nothing exists at `path`. */
  removeDirectory(path: string): void;
}

import * as path from 'node:path';
import type { FileAttributes, FileSystem } from './types';

export type FileSystemOperation = 'createDirectory' | 'setAttributes' | 'writeFile' | 'readFile' | 'removeFile' | 'removeDirectory';

function fsError(code: string, syscall: string, target: string): NodeJS.ErrnoException {
  const error: NodeJS.ErrnoException = new Error(`${code}: ${syscall} '${target}'`);
  error.code = code;
  error.syscall = syscall;
  error.path = target;
  return error;
}

/**
 * In-process filesystem backed by Maps.
 *
 * Nothing touches the disk, which makes it suitable for tests and for
 * sandboxed hosts. `fail()` injects failures per operation so callers can
 * exercise the error paths of whatever sits on top.
 */
export class InMemoryFileSystem implements FileSystem {
  private files = new Map<string, Buffer>();
  private directories = new Set<string>();
  private modes = new Map<string, number>();
  private faults = new Set<FileSystemOperation>();

  constructor(initialDirectories: string[] = []) {
    for (const dir of initialDirectories) {
      this._addDirectory(path.resolve(dir));
    }
  }

  /** Makes every subsequent call of `operation` fail until `heal()` is called. */
  fail(operation: FileSystemOperation): this {
    this.faults.add(operation);
    return this;
  }

  heal(operation?: FileSystemOperation): this {
    if (operation) this.faults.delete(operation);
    else this.faults.clear();
    return this;
  }

  exists(target: string): boolean {
    const p = path.resolve(target);
    return this.files.has(p) || this.directories.has(p);
  }

  createDirectory(target: string): void {
    const p = path.resolve(target);
    if (this.faults.has('createDirectory')) throw fsError('EACCES', 'mkdir', p);
    if (this.files.has(p)) throw fsError('EEXIST', 'mkdir', p);
    this._addDirectory(p);
  }

  setAttributes(target: string, attributes: FileAttributes): void {
    const p = path.resolve(target);
    if (this.faults.has('setAttributes')) throw fsError('EPERM', 'chmod', p);
    if (!this.exists(p)) throw fsError('ENOENT', 'chmod', p);
    if (attributes.mode !== undefined) this.modes.set(p, attributes.mode);
  }

  writeFile(target: string, data: Uint8Array): boolean {
    const p = path.resolve(target);
    if (this.faults.has('writeFile')) return false;
    if (this.directories.has(p) || !this.directories.has(path.dirname(p))) return false;
    this.files.set(p, Buffer.from(data));
    return true;
  }

  readFile(target: string): Buffer {
    const p = path.resolve(target);
    if (this.faults.has('readFile')) throw fsError('EIO', 'read', p);
    if (this.directories.has(p)) throw fsError('EISDIR', 'read', p);
    const data = this.files.get(p);
    if (!data) throw fsError('ENOENT', 'open', p);
    return Buffer.from(data);
  }

  removeFile(target: string): void {
    const p = path.resolve(target);
    if (this.faults.has('removeFile')) throw fsError('EACCES', 'unlink', p);
    if (!this.files.delete(p)) throw fsError('ENOENT', 'unlink', p);
    this.modes.delete(p);
  }

  removeDirectory(target: string): void {
    const p = path.resolve(target);
    if (this.faults.has('removeDirectory')) throw fsError('EACCES', 'rm', p);
    if (!this.directories.has(p)) throw fsError('ENOENT', 'rm', p);
    const prefix = p + path.sep;
    for (const file of [...this.files.keys()]) {
      if (file.startsWith(prefix)) this.files.delete(file);
    }
    for (const dir of [...this.directories]) {
      if (dir === p || dir.startsWith(prefix)) {
        this.directories.delete(dir);
        this.modes.delete(dir);
      }
    }
  }

  // ─── Inspection helpers (tests) ─────────────────────────────────────────

  modeOf(target: string): number | undefined {
    return this.modes.get(path.resolve(target));
  }

  listFiles(): string[] {
    return Array.from(this.files.keys()).sort();
  }

  private _addDirectory(p: string): void {
    let current = p;
    while (!this.directories.has(current)) {
      this.directories.add(current);
      const parent = path.dirname(current);
      if (parent === current) break;
      current = parent;
    }
  }
}

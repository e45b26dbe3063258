import * as fs from 'node:fs';
import type { FileAttributes, FileSystem } from './types';

export type { FileAttributes, FileSystem } from './types';

export class NodeFileSystem implements FileSystem {
  exists(path: string): boolean {
    return fs.existsSync(path);
  }

  createDirectory(path: string): void {
    fs.mkdirSync(path, { recursive: true });
  }

  setAttributes(path: string, attributes: FileAttributes): void {
    if (attributes.mode !== undefined) {
      fs.chmodSync(path, attributes.mode);
    }
  }

  writeFile(path: string, data: Uint8Array): boolean {
    try {
      fs.writeFileSync(path, data);
      return true;
    } catch {
      return false;
    }
  }

  readFile(path: string): Buffer {
    return fs.readFileSync(path);
  }

  removeFile(path: string): void {
    fs.unlinkSync(path);
  }

  removeDirectory(path: string): void {
    // no `force`: a missing folder is an error the caller must see
    fs.rmSync(path, { recursive: true });
  }
}

export { InMemoryFileSystem } from './inMemoryFileSystem';
export { resolveBaseDirectory, type DirectoryKind, type DirectoryResolver } from './directories';
export {
  defaultFolderProtection,
  NoopFolderProtection,
  PosixFolderProtection,
  type FolderProtection,
} from './protection';

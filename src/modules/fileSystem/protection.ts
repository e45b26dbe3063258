import type { FileSystem } from './types';

/**
 * Strategy that locks down the storage folder after it is created.
 * Implementations throw when the OS rejects the change.
 */
export interface FolderProtection {
  apply(fileSystem: FileSystem, folderPath: string): void;
}

/** Owner-only access (rwx------). */
export class PosixFolderProtection implements FolderProtection {
  private readonly mode: number;

  constructor(mode = 0o700) {
    this.mode = mode;
  }

  apply(fileSystem: FileSystem, folderPath: string): void {
    fileSystem.setAttributes(folderPath, { mode: this.mode });
  }
}

/** For platforms without permission bits worth setting. */
export class NoopFolderProtection implements FolderProtection {
  apply(): void {}
}

export function defaultFolderProtection(platform: NodeJS.Platform = process.platform): FolderProtection {
  return platform === 'win32' ? new NoopFolderProtection() : new PosixFolderProtection();
}

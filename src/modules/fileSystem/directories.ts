import * as os from 'node:os';
import * as path from 'node:path';

/**
 * OS-provided roots a storage folder can live under.
 * The kind decides durability: caches may be purged by the OS,
 * applicationSupport and documents are kept, temporary is scratch space.
 */
export type DirectoryKind = 'caches' | 'applicationSupport' | 'documents' | 'temporary';

export const DIRECTORY_KINDS = ['caches', 'applicationSupport', 'documents', 'temporary'] as const satisfies readonly DirectoryKind[];

export type DirectoryResolver = (kind: DirectoryKind) => string;

export interface PlatformEnvironment {
  platform: NodeJS.Platform;
  homedir: string;
  tmpdir: string;
  env: NodeJS.ProcessEnv;
}

function currentEnvironment(): PlatformEnvironment {
  return {
    platform: process.platform,
    homedir: os.homedir(),
    tmpdir: os.tmpdir(),
    env: process.env,
  };
}

function windowsRoot(kind: DirectoryKind, platform: PlatformEnvironment): string {
  const { env, homedir } = platform;
  if (kind === 'caches') {
    return env.LOCALAPPDATA || path.win32.join(homedir, 'AppData', 'Local');
  }
  return env.APPDATA || path.win32.join(homedir, 'AppData', 'Roaming');
}

/**
 * Maps a directory kind onto the conventional root for the current platform
 * (XDG on Linux and other Unixes, ~/Library on macOS, AppData on Windows).
 * Only computes the path; the storage engine creates it.
 */
export function resolveBaseDirectory(kind: DirectoryKind, platform: PlatformEnvironment = currentEnvironment()): string {
  const { homedir, env } = platform;
  if (!homedir && kind !== 'temporary') {
    throw new Error('Home directory is not available');
  }

  switch (kind) {
    case 'temporary':
      return platform.tmpdir;
    case 'documents':
      return path.join(homedir, 'Documents');
    case 'caches':
    case 'applicationSupport':
      break;
  }

  if (platform.platform === 'win32') return windowsRoot(kind, platform);

  if (platform.platform === 'darwin') {
    return kind === 'caches'
      ? path.join(homedir, 'Library', 'Caches')
      : path.join(homedir, 'Library', 'Application Support');
  }

  return kind === 'caches'
    ? env.XDG_CACHE_HOME || path.join(homedir, '.cache')
    : env.XDG_DATA_HOME || path.join(homedir, '.local', 'share');
}

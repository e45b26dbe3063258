export type StorageErrorCode =
  | 'notFound'
  | 'encodeData'
  | 'decodeData'
  | 'createFile'
  | 'directoryResolution'
  | 'createDirectory'
  | 'attribute'
  | 'remove'
  | 'invalidKey'
  | 'invalidOptions';

export interface StorageErrorOptions {
  key?: string;
  path?: string;
  cause?: unknown;
}

/**
 * Base class for every failure the storage engine surfaces.
 * `code` is stable and meant for branching; `message` is for humans.
 */
export class StorageError extends Error {
  readonly code: StorageErrorCode;
  readonly key?: string;
  readonly path?: string;

  constructor(code: StorageErrorCode, message: string, options: StorageErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'StorageError';
    this.code = code;
    this.key = options.key;
    this.path = options.path;
  }
}

export class NotFoundError extends StorageError {
  constructor(key: string, path: string, cause?: unknown) {
    super('notFound', `No entry stored under "${key}"`, { key, path, cause });
    this.name = 'NotFoundError';
  }
}

export class EncodeDataError extends StorageError {
  constructor(key: string, cause?: unknown) {
    super('encodeData', `Value for "${key}" could not be encoded`, { key, cause });
    this.name = 'EncodeDataError';
  }
}

export class DecodeDataError extends StorageError {
  constructor(key: string, cause?: unknown) {
    super('decodeData', `Stored bytes for "${key}" could not be decoded`, { key, cause });
    this.name = 'DecodeDataError';
  }
}

export class CreateFileError extends StorageError {
  constructor(key: string, path: string, cause?: unknown) {
    super('createFile', `Failed to write file for "${key}" at ${path}`, { key, path, cause });
    this.name = 'CreateFileError';
  }
}

export class DirectoryResolutionError extends StorageError {
  constructor(kind: string, cause?: unknown) {
    super('directoryResolution', `Could not resolve base directory for kind "${kind}"`, { cause });
    this.name = 'DirectoryResolutionError';
  }
}

export class CreateDirectoryError extends StorageError {
  constructor(path: string, cause?: unknown) {
    super('createDirectory', `Could not create directory ${path}`, { path, cause });
    this.name = 'CreateDirectoryError';
  }
}

export class AttributeError extends StorageError {
  constructor(path: string, cause?: unknown) {
    super('attribute', `Could not apply attributes to ${path}`, { path, cause });
    this.name = 'AttributeError';
  }
}

export class RemoveError extends StorageError {
  constructor(path: string, key?: string, cause?: unknown) {
    super('remove', `Could not remove ${path}`, { key, path, cause });
    this.name = 'RemoveError';
  }
}

export class InvalidKeyError extends StorageError {
  constructor(key: string) {
    super('invalidKey', `Invalid storage key "${key}"`, { key });
    this.name = 'InvalidKeyError';
  }
}

export class InvalidOptionsError extends StorageError {
  constructor(message: string, cause?: unknown) {
    super('invalidOptions', message, { cause });
    this.name = 'InvalidOptionsError';
  }
}

export function isStorageError(error: unknown, code?: StorageErrorCode): error is StorageError {
  return error instanceof StorageError && (code === undefined || error.code === code);
}

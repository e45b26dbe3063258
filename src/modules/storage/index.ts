import * as path from 'node:path';
import {
  AttributeError,
  CreateDirectoryError,
  CreateFileError,
  DecodeDataError,
  DirectoryResolutionError,
  EncodeDataError,
  InvalidKeyError,
  NotFoundError,
  RemoveError,
  type StorageError,
} from '../../errors';
import type { Logger } from '../../utils/logger';
import { type Schema, wrap, wrapperSchema } from '../codec';
import { MemoryCache } from '../cache';
import type { FileSystem } from '../fileSystem';
import type { Image } from '../image';
import { resolveStorageOptions, type ResolvedStorageOptions, type StorageOptions } from './options';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/** Copy kept in the cache so later mutation by the caller cannot diverge from disk. */
function snapshot<T>(value: T): T {
  try {
    return structuredClone(value);
  } catch {
    // functions and symbols cannot be cloned; the encoder rejects them anyway
    return value;
  }
}

/**
 * Hybrid memory + disk key-value store.
 *
 * Every entry is one flat file at `<root>/<appIdentifier>/<folderName>/<key>`.
 * Writes go to the memory cache first and then to disk; reads try the cache,
 * fall back to disk, and repopulate the cache. All calls are synchronous.
 *
 * Values the encoder refuses at the document root (bare numbers, strings,
 * booleans) are stored inside a `{ object }` envelope. There is no marker on
 * disk, so loads try the plain shape first and the envelope second.
 *
 * @example
 * const storage = new Storage({ appIdentifier: 'com.example.notes', folderName: 'drafts' });
 * storage.save({ title: 'Hello' }, 'draft-1');
 * storage.load('draft-1', z.object({ title: z.string() }));
 */
export class Storage {
  readonly options: ResolvedStorageOptions;
  readonly folderPath: string;
  readonly cache: MemoryCache;
  private readonly fileSystem: FileSystem;
  private readonly logger: Logger;

  constructor(options: StorageOptions) {
    this.options = resolveStorageOptions(options);
    this.fileSystem = this.options.fileSystem;
    this.logger = this.options.logger.child({ folder: this.options.folderName });
    this.cache = new MemoryCache({ countLimit: this.options.cacheCountLimit });

    const root = this._resolveRoot();
    this.folderPath = path.join(root, this.options.appIdentifier, this.options.folderName);
    this._createFolderIfNeeded();
    this._applyProtection();

    this.logger.info({ folderPath: this.folderPath }, 'storage ready');
  }

  /** Disk is authoritative; the cache is not consulted. */
  exists(key: string): boolean {
    this._assertKey(key);
    return this.fileSystem.exists(this.filePath(key));
  }

  filePath(key: string): string {
    return path.join(this.folderPath, key);
  }

  save<T>(value: T, key: string): void {
    this._assertKey(key);
    // cache first: a failed write still leaves the value readable in-process
    this.cache.set(key, { kind: 'value', value: snapshot(value) });
    this._write(this._encode(value, key), key);
  }

  load<T>(key: string, schema: Schema<T>): T {
    this._assertKey(key);

    const cached = this.cache.get(key);
    if (cached?.kind === 'value') {
      const hit = schema.safeParse(cached.value);
      if (hit.success) {
        this.logger.debug({ key }, 'cache hit');
        return snapshot(hit.data);
      }
      this.logger.debug({ key }, 'cached value has a different type, reading from disk');
    }

    const value = this._decode(this._read(key), schema, key);
    this.cache.set(key, { kind: 'value', value: snapshot(value) });
    return value;
  }

  saveImage(image: Image, key: string): void {
    this._assertKey(key);
    this.cache.set(key, { kind: 'image', value: snapshot(image) });

    const data = this.options.imageCodec.encode(image);
    if (!data) throw this._fail(new EncodeDataError(key));
    this._write(data, key);
  }

  loadImage(key: string): Image {
    this._assertKey(key);

    const cached = this.cache.get(key);
    if (cached?.kind === 'image') {
      this.logger.debug({ key }, 'cache hit');
      return snapshot(cached.value);
    }

    const image = this.options.imageCodec.decode(this._read(key));
    if (!image) throw this._fail(new DecodeDataError(key));
    this.cache.set(key, { kind: 'image', value: snapshot(image) });
    return image;
  }

  /**
   * Deletes the entry's file and evicts it from the cache.
   * Removing a key that has no file is an error.
   */
  remove(key: string): void {
    this._assertKey(key);
    this.cache.delete(key);

    const file = this.filePath(key);
    try {
      this.fileSystem.removeFile(file);
    } catch (error) {
      throw this._fail(new RemoveError(file, key, error));
    }
  }

  /**
   * Clears the cache and recreates an empty folder.
   * On failure the engine is in an unknown state; build a new one.
   */
  removeAll(): void {
    this.cache.clear();

    try {
      this.fileSystem.removeDirectory(this.folderPath);
    } catch (error) {
      throw this._fail(new RemoveError(this.folderPath, undefined, error));
    }
    this._createFolderIfNeeded();
    this._applyProtection();
  }

  // ─── Encoding ───────────────────────────────────────────────────────────

  private _encode(value: unknown, key: string): Uint8Array {
    const { encoder } = this.options;
    try {
      return encoder.encode(value);
    } catch (directError) {
      this.logger.debug({ key, err: directError }, 'direct encode failed, wrapping value');
    }

    try {
      return encoder.encode(wrap(value));
    } catch (error) {
      throw this._fail(new EncodeDataError(key, error));
    }
  }

  private _decode<T>(data: Uint8Array, schema: Schema<T>, key: string): T {
    const { decoder } = this.options;
    try {
      return decoder.decode(data, schema);
    } catch (directError) {
      this.logger.debug({ key, err: directError }, 'direct decode failed, trying wrapped value');
    }

    try {
      return decoder.decode(data, wrapperSchema(schema)).object;
    } catch (error) {
      throw this._fail(new DecodeDataError(key, error));
    }
  }

  // ─── Filesystem ─────────────────────────────────────────────────────────

  private _read(key: string): Uint8Array {
    const file = this.filePath(key);
    try {
      return this.fileSystem.readFile(file);
    } catch (error) {
      if (isMissingFile(error)) throw this._fail(new NotFoundError(key, file, error));
      throw error;
    }
  }

  private _write(data: Uint8Array, key: string): void {
    const file = this.filePath(key);
    if (!this.fileSystem.writeFile(file, data)) {
      throw this._fail(new CreateFileError(key, file));
    }
  }

  private _resolveRoot(): string {
    const kind = this.options.baseDirectoryKind;
    try {
      const root = this.options.resolveDirectory(kind);
      if (!this.fileSystem.exists(root)) this.fileSystem.createDirectory(root);
      return root;
    } catch (error) {
      throw this._fail(new DirectoryResolutionError(kind, error));
    }
  }

  private _createFolderIfNeeded(): void {
    if (this.fileSystem.exists(this.folderPath)) return;
    try {
      this.fileSystem.createDirectory(this.folderPath);
    } catch (error) {
      throw this._fail(new CreateDirectoryError(this.folderPath, error));
    }
  }

  private _applyProtection(): void {
    try {
      this.options.protection.apply(this.fileSystem, this.folderPath);
    } catch (error) {
      throw this._fail(new AttributeError(this.folderPath, error));
    }
  }

  private _assertKey(key: string): void {
    if (typeof key !== 'string' || key.length === 0) {
      throw this._fail(new InvalidKeyError(String(key)));
    }
  }

  private _fail<E extends StorageError>(error: E): E {
    const level = error.code === 'notFound' ? 'debug' : 'warn';
    this.logger[level]({ err: error, key: error.key, code: error.code }, error.message);
    return error;
  }
}

export { resolveStorageOptions, storageOptionsSchema, type ResolvedStorageOptions, type StorageOptions } from './options';

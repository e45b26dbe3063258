import { z } from 'zod';
import { InvalidOptionsError } from '../../errors';
import { createLogger, type Logger } from '../../utils/logger';
import { type Decoder, type Encoder, JsonDecoder, JsonEncoder } from '../codec';
import {
  defaultFolderProtection,
  type DirectoryKind,
  type DirectoryResolver,
  type FileSystem,
  type FolderProtection,
  NodeFileSystem,
  resolveBaseDirectory,
} from '../fileSystem';
import { DIRECTORY_KINDS } from '../fileSystem/directories';
import { type ImageCodec, PngImageCodec } from '../image';

export interface StorageOptions {
  /** Namespaces every folder of this application, e.g. 'com.example.notes'. */
  appIdentifier: string;
  /** Which OS root to live under. Defaults to 'caches'. */
  baseDirectoryKind?: DirectoryKind;
  /** Subfolder for this engine; engines with different names never see each other's keys. Defaults to 'Default'. */
  folderName?: string;
  encoder?: Encoder;
  decoder?: Decoder;
  imageCodec?: ImageCodec;
  fileSystem?: FileSystem;
  /** Applied to the folder after creation. Defaults to owner-only mode outside Windows. */
  protection?: FolderProtection;
  resolveDirectory?: DirectoryResolver;
  /** Caps the memory cache. Unbounded when omitted. */
  cacheCountLimit?: number;
  logger?: Logger;
}

export type ResolvedStorageOptions = Readonly<
  Required<Omit<StorageOptions, 'cacheCountLimit'>> & { cacheCountLimit?: number }
>;

const pathSegment = z
  .string()
  .min(1)
  .refine((s) => !/[\\/]/.test(s), 'must not contain path separators')
  .refine((s) => s !== '.' && s !== '..', 'must not be a relative path segment');

export const storageOptionsSchema = z.object({
  appIdentifier: pathSegment,
  baseDirectoryKind: z.enum(DIRECTORY_KINDS).default('caches'),
  folderName: pathSegment.default('Default'),
  cacheCountLimit: z.number().int().positive().optional(),
});

/**
 * Validates the scalar options and fills in defaults for every capability.
 * The result is frozen.
 */
export function resolveStorageOptions(options: StorageOptions): ResolvedStorageOptions {
  const parsed = storageOptionsSchema.safeParse({
    appIdentifier: options.appIdentifier,
    baseDirectoryKind: options.baseDirectoryKind,
    folderName: options.folderName,
    cacheCountLimit: options.cacheCountLimit,
  });
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new InvalidOptionsError(`Invalid storage options (${detail})`, parsed.error);
  }

  return Object.freeze({
    ...parsed.data,
    encoder: options.encoder ?? new JsonEncoder(),
    decoder: options.decoder ?? new JsonDecoder(),
    imageCodec: options.imageCodec ?? new PngImageCodec(),
    fileSystem: options.fileSystem ?? new NodeFileSystem(),
    protection: options.protection ?? defaultFolderProtection(),
    resolveDirectory: options.resolveDirectory ?? ((kind: DirectoryKind) => resolveBaseDirectory(kind)),
    logger: options.logger ?? createLogger(),
  });
}

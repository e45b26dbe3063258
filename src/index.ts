export { Storage, resolveStorageOptions, storageOptionsSchema, type ResolvedStorageOptions, type StorageOptions } from './modules/storage';
export { MemoryCache, type CacheEntry, type MemoryCacheConfig } from './modules/cache';
export {
  DecodeError,
  EncodeError,
  JsonDecoder,
  JsonEncoder,
  wrap,
  wrapperSchema,
  type Decoder,
  type Encoder,
  type JsonDecoderOptions,
  type JsonEncoderOptions,
  type Schema,
  type TypeWrapper,
} from './modules/codec';
export {
  defaultFolderProtection,
  InMemoryFileSystem,
  NodeFileSystem,
  NoopFolderProtection,
  PosixFolderProtection,
  resolveBaseDirectory,
  type DirectoryKind,
  type DirectoryResolver,
  type FileAttributes,
  type FileSystem,
  type FolderProtection,
} from './modules/fileSystem';
export type { FileSystemOperation } from './modules/fileSystem/inMemoryFileSystem';
export { DIRECTORY_KINDS, type PlatformEnvironment } from './modules/fileSystem/directories';
export { hasValidDimensions, isImage, PngImageCodec, type Image, type ImageCodec } from './modules/image';
export * from './errors';
export { createLogger, type Logger, type LoggerConfig } from './utils/logger';

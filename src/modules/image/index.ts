/**
 * Decoded raster image: `data` holds RGBA pixels, 4 bytes each, row-major.
 */
export interface Image {
  width: number;
  height: number;
  data: Uint8Array;
}

/**
 * Byte transform for images. Both directions report failure with `null`
 * rather than throwing; the storage engine turns that into a typed error.
 */
export interface ImageCodec {
  encode(image: Image): Uint8Array | null;
  decode(data: Uint8Array): Image | null;
}

export function isImage(value: unknown): value is Image {
  if (typeof value !== 'object' || value === null) return false;
  if (!('width' in value) || !('height' in value) || !('data' in value)) return false;
  return typeof value.width === 'number' && typeof value.height === 'number' && value.data instanceof Uint8Array;
}

export { hasValidDimensions, PngImageCodec } from './pngImageCodec';

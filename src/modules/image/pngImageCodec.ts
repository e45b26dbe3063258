import { PNG, type PackerOptions } from 'pngjs';
import type { Image, ImageCodec } from '.';

/** True when the pixel buffer matches width x height RGBA. */
export function hasValidDimensions(image: Image): boolean {
  const { width, height, data } = image;
  return Number.isInteger(width) && Number.isInteger(height) && width > 0 && height > 0 && data.length === width * height * 4;
}

/**
 * Lossless PNG codec on pngjs' synchronous API.
 */
export class PngImageCodec implements ImageCodec {
  private readonly packer: PackerOptions;

  constructor(packer: PackerOptions = {}) {
    this.packer = packer;
  }

  encode(image: Image): Uint8Array | null {
    if (!hasValidDimensions(image)) return null;
    const png = new PNG({ width: image.width, height: image.height });
    png.data = Buffer.from(image.data);
    return PNG.sync.write(png, this.packer);
  }

  decode(data: Uint8Array): Image | null {
    try {
      const png = PNG.sync.read(Buffer.from(data));
      return { width: png.width, height: png.height, data: png.data };
    } catch {
      return null;
    }
  }
}

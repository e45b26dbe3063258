/**
 * Image storage: PNG codec and the image-specific save/load path.
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import pino from 'pino';
import { z } from 'zod';
import {
  DecodeDataError,
  EncodeDataError,
  type Image,
  isImage,
  NotFoundError,
  PngImageCodec,
  Storage,
} from '../src/index';

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

// 2x2: red, green / blue, half-transparent white
const pixels: Image = {
  width: 2,
  height: 2,
  data: new Uint8Array([255, 0, 0, 255, 0, 255, 0, 255, 0, 0, 255, 255, 255, 255, 255, 128]),
};

// ─── PngImageCodec ──────────────────────────────────────────────────────────

describe('PngImageCodec', () => {
  const codec = new PngImageCodec();

  it('encodes to PNG and decodes back to the same pixels', () => {
    const encoded = codec.encode(pixels);
    expect(encoded).not.toBeNull();
    if (!encoded) return;

    expect(Array.from(encoded.subarray(0, 8))).toEqual(PNG_SIGNATURE);

    const decoded = codec.decode(encoded);
    expect(decoded?.width).toBe(2);
    expect(decoded?.height).toBe(2);
    expect(Array.from(decoded?.data ?? [])).toEqual(Array.from(pixels.data));
  });

  it('refuses images whose buffer does not match the dimensions', () => {
    expect(codec.encode({ width: 2, height: 2, data: new Uint8Array(3) })).toBeNull();
    expect(codec.encode({ width: 0, height: 0, data: new Uint8Array(0) })).toBeNull();
    expect(codec.encode({ width: 1.5, height: 2, data: new Uint8Array(12) })).toBeNull();
  });

  it('returns null for bytes that are not a PNG', () => {
    expect(codec.decode(Buffer.from('definitely not a png'))).toBeNull();
  });
});

describe('isImage', () => {
  it('recognises decoded images only', () => {
    expect(isImage(pixels)).toBe(true);
    expect(isImage({ width: 1, height: 1, data: [0, 0, 0, 0] })).toBe(false);
    expect(isImage({ width: 1 })).toBe(false);
    expect(isImage(null)).toBe(false);
  });
});

// ─── Storage image path ─────────────────────────────────────────────────────

describe('Storage images', () => {
  let root: string;
  const createStorage = () =>
    new Storage({
      appIdentifier: 'com.example.test',
      folderName: 'Images',
      resolveDirectory: () => root,
      logger: pino({ level: 'silent' }),
    });

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'stashkit-img-'));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('serves a warm read from a copy of the saved image', () => {
    const storage = createStorage();
    const image: Image = { width: 1, height: 1, data: new Uint8Array([1, 2, 3, 255]) };
    storage.saveImage(image, 'avatar');
    image.data[0] = 9;

    const warm = storage.loadImage('avatar');
    expect(warm).not.toBe(image);
    expect(Array.from(warm.data)).toEqual([1, 2, 3, 255]);
  });

  it('writes a PNG file and reads it back in a fresh engine', () => {
    createStorage().saveImage(pixels, 'avatar');

    const cold = createStorage();
    const file = fs.readFileSync(cold.filePath('avatar'));
    expect(Array.from(file.subarray(0, 8))).toEqual(PNG_SIGNATURE);

    const image = cold.loadImage('avatar');
    expect(image.width).toBe(2);
    expect(image.height).toBe(2);
    expect(Array.from(image.data)).toEqual(Array.from(pixels.data));
  });

  it('raises EncodeDataError for an image the codec cannot encode', () => {
    const storage = createStorage();
    expect(() => storage.saveImage({ width: 3, height: 3, data: new Uint8Array(4) }, 'bad')).toThrow(EncodeDataError);
    expect(storage.exists('bad')).toBe(false);
  });

  it('raises NotFoundError for a missing image', () => {
    expect(() => createStorage().loadImage('missing')).toThrow(NotFoundError);
  });

  it('raises DecodeDataError when the file is not an image', () => {
    const storage = createStorage();
    storage.save({ not: 'an image' }, 'doc');
    expect(() => storage.loadImage('doc')).toThrow(DecodeDataError);
  });

  it('does not hand an image to a value load', () => {
    const storage = createStorage();
    storage.saveImage(pixels, 'avatar');
    expect(() => storage.load('avatar', z.object({ width: z.number() }))).toThrow(DecodeDataError);
  });
});

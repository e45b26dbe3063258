import type { z } from 'zod';

/**
 * Runtime description of a stored value's type.
 * Input is left open so schemas with defaults or transforms are accepted.
 */
export type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export class EncodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EncodeError';
  }
}

export class DecodeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DecodeError';
  }
}

export interface Encoder {
  /** Throws EncodeError when the value has no representation in this format. */
  encode(value: unknown): Uint8Array;
}

export interface Decoder {
  /**
   * Throws DecodeError when the bytes are malformed or do not satisfy `schema`.
   * Must never return data of a different shape than the schema describes.
   */
  decode<T>(data: Uint8Array, schema: Schema<T>): T;
}

export interface JsonEncoderOptions {
  /** Passed to JSON.stringify for pretty output. */
  space?: number;
  /** Accept scalars and null at the document root. Off by default. */
  allowFragments?: boolean;
}

export interface JsonDecoderOptions {
  allowFragments?: boolean;
}

function isContainerRoot(value: unknown): boolean {
  return typeof value === 'object' && value !== null;
}

/**
 * JSON document encoder. Only objects and arrays are valid document roots
 * unless `allowFragments` is set; anything JSON would silently mangle
 * (undefined, functions, symbols, NaN, Infinity) is rejected instead.
 */
export class JsonEncoder implements Encoder {
  private readonly space?: number;
  private readonly allowFragments: boolean;

  constructor(options: JsonEncoderOptions = {}) {
    this.space = options.space;
    this.allowFragments = options.allowFragments ?? false;
  }

  encode(value: unknown): Uint8Array {
    let text: string | undefined;
    try {
      text = JSON.stringify(value, strictReplacer, this.space);
    } catch (error) {
      if (error instanceof EncodeError) throw error;
      throw new EncodeError('Value is not JSON serializable', { cause: error });
    }

    if (text === undefined) {
      throw new EncodeError('Value has no JSON representation');
    }
    // toJSON() may turn an object into a scalar, so check the output not the input
    if (!this.allowFragments && !(text.startsWith('{') || text.startsWith('['))) {
      throw new EncodeError('Top-level value must be a JSON object or array');
    }
    return Buffer.from(text, 'utf8');
  }
}

function strictReplacer(key: string, value: unknown): unknown {
  // stringify drops undefined members and turns array holes into null
  if (value === undefined) {
    throw new EncodeError(`Undefined value at "${key}"`);
  }
  if (typeof value === 'function' || typeof value === 'symbol') {
    throw new EncodeError(`Unsupported ${typeof value} at "${key}"`);
  }
  if (typeof value === 'number' && !Number.isFinite(value)) {
    throw new EncodeError(`Non-finite number at "${key}"`);
  }
  return value;
}

export class JsonDecoder implements Decoder {
  private readonly allowFragments: boolean;

  constructor(options: JsonDecoderOptions = {}) {
    this.allowFragments = options.allowFragments ?? false;
  }

  decode<T>(data: Uint8Array, schema: Schema<T>): T {
    let parsed: unknown;
    try {
      const text = new TextDecoder('utf-8', { fatal: true }).decode(data);
      parsed = JSON.parse(text);
    } catch (error) {
      throw new DecodeError('Data is not valid JSON', { cause: error });
    }

    if (!this.allowFragments && !isContainerRoot(parsed)) {
      throw new DecodeError('Top-level value must be a JSON object or array');
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
      throw new DecodeError('Data does not match the requested type', { cause: result.error });
    }
    return result.data;
  }
}

export { type TypeWrapper, wrap, wrapperSchema } from './typeWrapper';

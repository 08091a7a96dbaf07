/**
 * Body codec - MessagePack binary encoding with DEFLATE compression
 * @module transport/codec
 */

import { decode, encode } from '@msgpack/msgpack';
import { deflate, inflate } from 'pako';

export const MSGPACK_CONTENT_TYPE = 'application/msgpack+deflate';
export const JSON_CONTENT_TYPE = 'application/json';

export type CompressionLevel = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

/**
 * Codec options
 */
export interface CodecOptions {
  /**
   * Enable MessagePack binary encoding
   * @default true
   */
  useMessagePack?: boolean;

  /**
   * Enable DEFLATE compression
   * @default true
   */
  useCompression?: boolean;

  /**
   * @default 6
   */
  compressionLevel?: CompressionLevel;
}

const DEFAULT_OPTIONS: Required<CodecOptions> = {
  useMessagePack: true,
  useCompression: true,
  compressionLevel: 6,
};

export interface CodecStats {
  count: number;
  totalOriginalSize: number;
  totalEncodedSize: number;
  savedBytes: number;
}

/**
 * PayloadCodec - turns protocol messages into bytes and back. Decoded
 * values are untyped; callers validate them.
 */
export class PayloadCodec {
  private options: Required<CodecOptions>;
  private originalSize = 0;
  private encodedSize = 0;
  private count = 0;

  constructor(options: CodecOptions = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  get contentType(): string {
    return this.options.useMessagePack ? MSGPACK_CONTENT_TYPE : JSON_CONTENT_TYPE;
  }

  encode(data: unknown): Uint8Array {
    const json = JSON.stringify(data);
    let result = this.options.useMessagePack
      ? encode(data, { ignoreUndefined: true })
      : new TextEncoder().encode(json);

    if (this.options.useCompression) {
      result = deflate(result, { level: this.options.compressionLevel });
    }

    this.count++;
    this.originalSize += new TextEncoder().encode(json).length;
    this.encodedSize += result.length;

    return result;
  }

  decode(data: Uint8Array): unknown {
    const bytes = this.options.useCompression ? inflate(data) : data;

    if (this.options.useMessagePack) {
      return decode(bytes);
    }
    return JSON.parse(new TextDecoder().decode(bytes));
  }

  getStats(): CodecStats {
    return {
      count: this.count,
      totalOriginalSize: this.originalSize,
      totalEncodedSize: this.encodedSize,
      savedBytes: this.originalSize - this.encodedSize,
    };
  }

  resetStats(): void {
    this.count = 0;
    this.originalSize = 0;
    this.encodedSize = 0;
  }
}

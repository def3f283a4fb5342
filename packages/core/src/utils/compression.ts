import { promisify } from 'node:util';
import zlib from 'node:zlib';
import * as snappy from 'snappy';

const gzipAsync = promisify(zlib.gzip);

export type CompressionCodec = 'snappy' | 'gzip';

/**
 *  - false (default)            → disabled
 *  - true                       → snappy
 *  - { codec: 'gzip'|'snappy' } → explicit codec
 */
export type CompressionSetting = boolean | { codec: CompressionCodec };

/**
 * Resolves a setting to its codec, or `null` when compression is off.
 */
export function codecOf(setting: CompressionSetting | undefined): CompressionCodec | null {
  if (!setting) return null;
  return setting === true ? 'snappy' : setting.codec;
}

function toUint8(buf: Buffer): Uint8Array {
  return new Uint8Array(buf.buffer, buf.byteOffset, buf.byteLength);
}

function ensureBuffer(x: Buffer | string): Buffer {
  return Buffer.isBuffer(x) ? x : Buffer.from(x);
}

export async function compress(
  buf: Uint8Array,
  setting?: CompressionSetting
): Promise<Uint8Array> {
  const codec = codecOf(setting);
  if (!codec) return buf;

  if (codec === 'gzip') {
    const out = await gzipAsync(Buffer.from(buf));
    return toUint8(out);
  }

  const out = await snappy.compress(Buffer.from(buf));
  return toUint8(ensureBuffer(out));
}

export function decompress(
  buf: Uint8Array,
  setting?: CompressionSetting
): Uint8Array {
  const codec = codecOf(setting);
  if (!codec) return buf;

  if (codec === 'gzip') {
    const out = zlib.gunzipSync(Buffer.from(buf));
    return toUint8(out);
  }

  const out = snappy.uncompressSync(Buffer.from(buf), { asBuffer: true });
  return toUint8(ensureBuffer(out));
}

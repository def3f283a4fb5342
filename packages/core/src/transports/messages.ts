import type { ObjectEncoder } from './Transport.js';
import { BinaryFrame, TextFrame } from '../http/index.js';
import { decompress, type CompressionSetting } from '../utils/compression.js';

/**
 * Every gRPC message is already delimited, so frames carry their bare payload.
 */
export const grpcObjectEncoder: ObjectEncoder = (value) => {
  if (value instanceof Uint8Array) return value;
  if (typeof value === 'string') return Buffer.from(value, 'utf8');
  if (value instanceof TextFrame) return Buffer.from(value.text, 'utf8');
  if (value instanceof BinaryFrame) return value.data;
  return Buffer.from(JSON.stringify(value) ?? 'null', 'utf8');
};

export function toBuffer(bytes: Uint8Array): Buffer {
  return Buffer.isBuffer(bytes) ? bytes : Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

/**
 * Reads the messages of a call as body chunks, undoing compression.
 */
export async function* decodeMessages(
  source: AsyncIterable<unknown>,
  compression: CompressionSetting,
): AsyncGenerator<Uint8Array> {
  for await (const message of source) {
    if (typeof message === 'string') {
      yield decompress(Buffer.from(message, 'utf8'), compression);
    } else if (message instanceof Uint8Array) {
      yield decompress(message, compression);
    } else {
      throw new TypeError('Unexpected non-binary message on the call');
    }
  }
}

/**
 * Text message of a websocket exchange.
 */
export class TextFrame {
  constructor(public readonly text: string) { }
}

/**
 * Binary message of a websocket exchange.
 */
export class BinaryFrame {
  constructor(public readonly data: Uint8Array) { }
}

export type WebsocketFrame = TextFrame | BinaryFrame;

const OPCODE_TEXT = 0x1;
const OPCODE_BINARY = 0x2;
const FIN = 0x80;

/**
 * Encodes a final, unmasked (server to client) websocket frame.
 */
export function encodeFrame(frame: WebsocketFrame): Buffer {
  const payload = frame instanceof TextFrame
    ? Buffer.from(frame.text, 'utf8')
    : Buffer.from(frame.data.buffer, frame.data.byteOffset, frame.data.byteLength);
  const opcode = frame instanceof TextFrame ? OPCODE_TEXT : OPCODE_BINARY;

  let header: Buffer;
  if (payload.length < 126) {
    header = Buffer.from([FIN | opcode, payload.length]);
  } else if (payload.length <= 0xffff) {
    header = Buffer.alloc(4);
    header[0] = FIN | opcode;
    header[1] = 126;
    header.writeUInt16BE(payload.length, 2);
  } else {
    header = Buffer.alloc(10);
    header[0] = FIN | opcode;
    header[1] = 127;
    header.writeBigUInt64BE(BigInt(payload.length), 2);
  }
  return Buffer.concat([header, payload]);
}

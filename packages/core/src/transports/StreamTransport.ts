import type { Writable } from 'node:stream';
import type { ExchangeTransport, ObjectEncoder } from './Transport.js';
import type { Payload } from '../send/index.js';

import { BodyStreamError, HeaderCommitError } from '../errors/index.js';
import {
  BinaryFrame,
  encodeChunk,
  encodeFrame,
  encodeHead,
  LAST_CHUNK,
  mayHaveBody,
  TextFrame,
  type MessageHead,
} from '../http/index.js';
import { dlog } from '../utils/debug.js';
import { flush, pump, WriteQueue } from './WriteQueue.js';

/**
 * Configuration options for {@link StreamTransport}.
 */
export interface StreamTransportOptions {
  /**
   * Encodes elements passed to `writeObjects`.
   *
   * @default {@link defaultObjectEncoder}
   */
  encodeObject?: ObjectEncoder;

  /**
   * Ends the underlying stream when the message is finished. Leave it off
   * for a persistent connection that carries further exchanges.
   *
   * @default false
   */
  endOnFinish?: boolean;
}

/**
 * Bytes pass through, strings are UTF-8, websocket frames are framed,
 * anything else is JSON.
 */
export const defaultObjectEncoder: ObjectEncoder = (value) => {
  if (value instanceof Uint8Array) return value;
  if (typeof value === 'string') return Buffer.from(value, 'utf8');
  if (value instanceof TextFrame || value instanceof BinaryFrame) return encodeFrame(value);
  return Buffer.from(JSON.stringify(value) ?? 'null', 'utf8');
};

/**
 * StreamTransport writes HTTP/1.x messages to a Node {@link Writable}
 * (a socket, or any duplex standing in for one).
 *
 * Writes are serialized through a {@link WriteQueue}. When the head leaves
 * the body length open on HTTP/1.1, the transport switches to chunked
 * transfer coding and frames every body write.
 */
export class StreamTransport implements ExchangeTransport {
  private readonly queue = new WriteQueue();
  private readonly encodeObject: ObjectEncoder;
  private readonly endOnFinish: boolean;
  private chunked = false;
  private bodiless = false;
  private finished = false;

  constructor(private readonly stream: Writable, options: StreamTransportOptions = {}) {
    this.encodeObject = options.encodeObject ?? defaultObjectEncoder;
    this.endOnFinish = options.endOnFinish ?? false;

    this.stream.on('error', (err) => dlog('headgate:transport', `stream error: ${err.message}`));
  }

  public writeHead(head: MessageHead, signal: AbortSignal): Promise<void> {
    return this.queue.enqueue(async () => {
      const open = head.version === 'HTTP/1.1'
        && mayHaveBody(head)
        && !head.headers.has('content-length')
        && !head.headers.has('transfer-encoding');
      this.bodiless = head.kind === 'response' && head.bodiless === true;
      this.chunked = !this.bodiless && (open || isChunked(head));

      const bytes = encodeHead(head, open ? [{ name: 'Transfer-Encoding', value: 'chunked' }] : []);
      try {
        await flush(this.stream, bytes);
      } catch (err) {
        throw new HeaderCommitError(err);
      }
      dlog('headgate:transport', `head written (${bytes.length} bytes, chunked=${this.chunked})`);
    }, signal);
  }

  public writeBytes(source: Payload<Uint8Array>, signal: AbortSignal): Promise<void> {
    return this.queue.enqueue(() => this.writeBody(source, (chunk) => chunk, signal), signal);
  }

  public writeObjects(source: Payload<unknown>, signal: AbortSignal): Promise<void> {
    return this.queue.enqueue(() => this.writeBody(source, this.encodeObject, signal), signal);
  }

  public finish(signal: AbortSignal): Promise<void> {
    return this.queue.enqueue(async () => {
      if (this.finished) return;
      this.finished = true;
      try {
        if (this.chunked) await flush(this.stream, LAST_CHUNK);
        if (this.endOnFinish) this.stream.end();
      } catch (err) {
        throw new BodyStreamError(err);
      }
    }, signal);
  }

  public isDisposed(): boolean {
    return this.finished || this.stream.destroyed || this.stream.writableEnded;
  }

  public alloc(size: number): Buffer {
    return Buffer.alloc(size);
  }

  public getWritableInfo() {
    return {
      writableLength: this.stream.writableLength,
      writableNeedDrain: this.stream.writableNeedDrain,
    };
  }

  private async writeBody<T>(source: Payload<T>, encode: (value: T) => Uint8Array, signal: AbortSignal): Promise<void> {
    if (this.bodiless) {
      dlog('headgate:transport', 'body dropped: response to HEAD');
      return;
    }
    await pump(this.stream, source, (value) => this.frame(encode(value)), signal);
  }

  /**
   * Applies chunked framing when the head asked for it. Empty input stays
   * empty, since an empty chunk would read as the last one.
   */
  private frame(bytes: Uint8Array): Uint8Array {
    return this.chunked && bytes.byteLength > 0 ? encodeChunk(bytes) : bytes;
  }
}

function isChunked(head: MessageHead): boolean {
  const te = head.headers.get('transfer-encoding');
  return te !== undefined && te.toLowerCase().split(',').map((s) => s.trim()).includes('chunked');
}

import type { Writable } from 'node:stream';
import type { Metadata } from '@grpc/grpc-js';
import type { ExchangeTransport, ObjectEncoder } from './Transport.js';
import type { MessageHead } from '../http/index.js';
import type { Payload } from '../send/index.js';

import { HeaderCommitError } from '../errors/index.js';
import { headToMetadata, setBodyEncoding } from '../http/index.js';
import { codecOf, compress, type CompressionSetting } from '../utils/compression.js';
import { dlog } from '../utils/debug.js';
import { grpcObjectEncoder, toBuffer } from './messages.js';
import { pump, WriteQueue } from './WriteQueue.js';

/**
 * The parts of a gRPC server call the transport writes through.
 * `ServerWritableStream` and `ServerDuplexStream` both qualify.
 */
export type ServerCall = Writable & {
  cancelled: boolean;
  sendMetadata(metadata: Metadata): void;
};

/**
 * Configuration options shared by the gRPC transports.
 */
export interface GrpcTransportOptions {
  /**
   * Compresses every outbound body message; the codec is announced in the
   * head's metadata.
   *
   * @default false
   */
  compression?: CompressionSetting;

  /** @default {@link grpcObjectEncoder} */
  encodeObject?: ObjectEncoder;
}

/**
 * GrpcServerTransport carries the response of one exchange over a gRPC server call.
 *
 * The response head becomes the call's initial metadata and every body
 * chunk one message.
 */
export class GrpcServerTransport implements ExchangeTransport {
  private readonly queue = new WriteQueue();
  private readonly compression: CompressionSetting;
  private readonly encodeObject: ObjectEncoder;
  private finished = false;

  constructor(private readonly call: ServerCall, options: GrpcTransportOptions = {}) {
    this.compression = options.compression ?? false;
    this.encodeObject = options.encodeObject ?? grpcObjectEncoder;

    this.call.on('error', (err) => dlog('headgate:transport', `server call error: ${err.message}`));
  }

  public writeHead(head: MessageHead, signal: AbortSignal): Promise<void> {
    return this.queue.enqueue(async () => {
      if (this.call.cancelled || this.call.destroyed) {
        throw new HeaderCommitError(new Error('call is no longer writable'));
      }
      try {
        this.call.sendMetadata(setBodyEncoding(headToMetadata(head), codecOf(this.compression)));
      } catch (err) {
        throw new HeaderCommitError(err);
      }
    }, signal);
  }

  public writeBytes(source: Payload<Uint8Array>, signal: AbortSignal): Promise<void> {
    return this.queue.enqueue(() => pump(this.call, source, (chunk) => this.pack(chunk), signal), signal);
  }

  public writeObjects(source: Payload<unknown>, signal: AbortSignal): Promise<void> {
    return this.queue.enqueue(
      () => pump(this.call, source, (value) => this.pack(this.encodeObject(value)), signal),
      signal,
    );
  }

  public finish(signal: AbortSignal): Promise<void> {
    return this.queue.enqueue(async () => {
      if (this.finished) return;
      this.finished = true;
      this.call.end();
    }, signal);
  }

  public isDisposed(): boolean {
    return this.finished || this.call.cancelled || this.call.destroyed || this.call.writableEnded;
  }

  public alloc(size: number): Buffer {
    return Buffer.alloc(size);
  }

  public getWritableInfo() {
    return {
      writableLength: this.call.writableLength,
      writableNeedDrain: this.call.writableNeedDrain,
    };
  }

  private async pack(bytes: Uint8Array): Promise<Buffer> {
    return toBuffer(await compress(bytes, this.compression));
  }
}

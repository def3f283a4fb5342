import type { Writable } from 'node:stream';
import type { ExchangeTransport, ObjectEncoder } from './Transport.js';
import type { GrpcTransportOptions } from './GrpcServerTransport.js';
import type { MessageHead, ResponseHead } from '../http/index.js';
import type { Payload } from '../send/index.js';

import { once } from 'node:events';
import { Metadata } from '@grpc/grpc-js';
import { BodyStreamError, HeaderCommitError } from '../errors/index.js';
import { headToMetadata, metadataToResponseHead, readBodyEncoding, setBodyEncoding } from '../http/index.js';
import { codecOf, compress, type CompressionSetting } from '../utils/compression.js';
import { dlog } from '../utils/debug.js';
import { decodeMessages, grpcObjectEncoder, toBuffer } from './messages.js';
import { pump, WriteQueue } from './WriteQueue.js';

/**
 * The parts of a bidirectional gRPC client call the transport uses.
 * `ClientDuplexStream` qualifies.
 */
export type ClientCall = Writable & AsyncIterable<unknown> & { cancel(): void };

/**
 * Opens the call, sending `metadata` as its initial metadata.
 */
export type CallOpener = (metadata: Metadata) => ClientCall;

/**
 * Response of a request exchange sent over gRPC.
 */
export interface GrpcResponse {
  head: ResponseHead;
  body: AsyncIterable<Uint8Array>;
}

/**
 * GrpcClientTransport carries the request of one exchange over a
 * bidirectional gRPC call.
 *
 * The call itself is opened by the header commit: the request head travels
 * as the call's initial metadata, and each body chunk as one message.
 */
export class GrpcClientTransport implements ExchangeTransport {
  private readonly queue = new WriteQueue();
  private readonly compression: CompressionSetting;
  private readonly encodeObject: ObjectEncoder;
  private readonly opened: Promise<ClientCall>;
  private resolveOpened: (call: ClientCall) => void = () => undefined;
  private rejectOpened: (err: Error) => void = () => undefined;
  private call?: ClientCall;
  private received?: Metadata;
  private finished = false;

  constructor(private readonly open: CallOpener, options: GrpcTransportOptions = {}) {
    this.compression = options.compression ?? false;
    this.encodeObject = options.encodeObject ?? grpcObjectEncoder;
    this.opened = new Promise((resolve, reject) => {
      this.resolveOpened = resolve;
      this.rejectOpened = reject;
    });
    // observed by response() only
    this.opened.catch(() => undefined);
  }

  public writeHead(head: MessageHead, signal: AbortSignal): Promise<void> {
    return this.queue.enqueue(async () => {
      let call: ClientCall;
      try {
        call = this.open(setBodyEncoding(headToMetadata(head), codecOf(this.compression)));
      } catch (err) {
        const error = new HeaderCommitError(err);
        this.rejectOpened(error);
        throw error;
      }
      call.on('error', (err) => dlog('headgate:transport', `client call error: ${err.message}`));
      call.once('metadata', (metadata: Metadata) => (this.received = metadata));
      this.call = call;
      this.resolveOpened(call);
    }, signal);
  }

  public writeBytes(source: Payload<Uint8Array>, signal: AbortSignal): Promise<void> {
    return this.queue.enqueue(() => pump(this.requireCall(), source, (chunk) => this.pack(chunk), signal), signal);
  }

  public writeObjects(source: Payload<unknown>, signal: AbortSignal): Promise<void> {
    return this.queue.enqueue(
      () => pump(this.requireCall(), source, (value) => this.pack(this.encodeObject(value)), signal),
      signal,
    );
  }

  public finish(signal: AbortSignal): Promise<void> {
    return this.queue.enqueue(async () => {
      if (this.finished) return;
      this.finished = true;
      this.requireCall().end();
    }, signal);
  }

  public isDisposed(): boolean {
    if (this.finished) return true;
    return this.call !== undefined && (this.call.destroyed || this.call.writableEnded);
  }

  public alloc(size: number): Buffer {
    return Buffer.alloc(size);
  }

  public getWritableInfo() {
    if (!this.call) return null;
    return {
      writableLength: this.call.writableLength,
      writableNeedDrain: this.call.writableNeedDrain,
    };
  }

  /**
   * Waits for the response head, which arrives as the call's initial metadata.
   *
   * @remarks
   * Resolves only after the request head was committed, and rejects with the
   * `HeaderCommitError` when the call could not be opened. The body yields the
   * response messages, decompressed as announced by the server.
   */
  public async response(): Promise<GrpcResponse> {
    const call = await this.opened;
    let metadata = this.received;
    if (!metadata) {
      const [received] = await once(call, 'metadata');
      if (!(received instanceof Metadata)) throw new TypeError('Call emitted invalid metadata');
      metadata = received;
    }
    return {
      head: metadataToResponseHead(metadata),
      body: decodeMessages(call, readBodyEncoding(metadata)),
    };
  }

  /**
   * Cancels the call, if it was opened.
   */
  public cancel(): void {
    this.call?.cancel();
  }

  private requireCall(): ClientCall {
    if (!this.call) throw new BodyStreamError(new Error('call not opened: headers were not committed'));
    return this.call;
  }

  private async pack(bytes: Uint8Array): Promise<Buffer> {
    return toBuffer(await compress(bytes, this.compression));
  }
}

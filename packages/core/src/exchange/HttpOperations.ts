import type { ExchangeTransport } from '../transports/index.js';
import type { ExchangeOptions } from './types.js';

import { AlreadyClosedError } from '../errors/index.js';
import { SendGate } from '../gate/index.js';
import { TextFrame } from '../http/index.js';
import { mapPayload, SendUnit, type Payload } from '../send/index.js';
import { dlog } from '../utils/debug.js';

/**
 * HttpOperations is the outbound side of one HTTP exchange, with state
 * management for the status/request line and headers (the first packet).
 *
 * Every send method returns a fresh, lazy {@link SendUnit}. On activation a
 * unit races for the exchange's {@link SendGate}:
 * - the winner commits the headers, then (for body sends) streams its payload;
 * - a loser skips the commit and streams its payload right away.
 *
 * A loser does not wait for the winner's commit to complete. Ordering on the
 * wire comes from the transport, which writes in invocation order, and from
 * the winner invoking the head write synchronously upon winning.
 *
 * @example
 * await exchange.header('content-type', 'text/plain')
 *   .sendString(['hello'])
 *   .toPromise();
 */
export abstract class HttpOperations {
  protected readonly gate: SendGate;
  protected readonly charset: BufferEncoding;

  /**
   * @param transport - Outbound side of the connection.
   * @param options - Exchange settings.
   * @param replaced - Operations this one takes over from (e.g. a websocket
   *   upgrade). Its gate is shared, so headers are still sent at most once.
   */
  protected constructor(
    protected readonly transport: ExchangeTransport,
    options: ExchangeOptions = {},
    replaced?: HttpOperations,
  ) {
    this.gate = replaced ? replaced.gate : new SendGate();
    this.charset = options.charset ?? replaced?.charset ?? 'utf8';
  }

  /** Request method of the exchange. */
  public abstract method(): string;

  /** Target resource of the exchange. */
  public abstract uri(): string;

  public hasSentHeaders(): boolean {
    return this.gate.hasSent();
  }

  public isWebsocket(): boolean {
    return false;
  }

  public isDisposed(): boolean {
    return this.transport.isDisposed();
  }

  /**
   * Sends raw body bytes, committing the headers first if nobody did.
   */
  public send(source: Payload<Uint8Array>): SendUnit {
    if (this.isDisposed()) return SendUnit.error(new AlreadyClosedError());
    const stream = (signal: AbortSignal) => this.transport.writeBytes(source, signal);
    if (this.hasSentHeaders()) return this.passThrough(stream);
    return this.withHeaders(stream);
  }

  /**
   * Sends objects through the transport's object encoder, committing the
   * headers first if nobody did.
   */
  public sendObject(source: Payload<unknown>): SendUnit {
    if (this.isDisposed()) return SendUnit.error(new AlreadyClosedError());
    const stream = (signal: AbortSignal) => this.transport.writeObjects(source, signal);
    if (this.hasSentHeaders()) return this.passThrough(stream);
    return this.withHeaders(stream);
  }

  /**
   * Sends text.
   *
   * - Websocket exchanges wrap each chunk in a {@link TextFrame} and send it as an object.
   * - Other exchanges encode each chunk into one buffer with `charset`.
   *
   * @param charset - Defaults to the exchange's charset.
   */
  public sendString(source: Payload<string>, charset: BufferEncoding = this.charset): SendUnit {
    if (this.isDisposed()) return SendUnit.error(new AlreadyClosedError());
    if (this.isWebsocket()) {
      return this.sendObject(mapPayload(source, (text) => new TextFrame(text)));
    }
    return this.send(mapPayload(source, (text) => this.encode(text, charset)));
  }

  /**
   * Commits the status/request line and headers without a body.
   *
   * Resolves with no write when the headers are already sent or being sent.
   */
  public sendHeaders(): SendUnit {
    if (this.isDisposed()) return SendUnit.error(new AlreadyClosedError());
    if (this.hasSentHeaders()) return SendUnit.empty();

    return new SendUnit((signal) => {
      if (this.isDisposed()) return Promise.reject(new AlreadyClosedError());
      if (this.markHeadersAsSent()) return this.commitHeaders(signal);
      return Promise.resolve();
    });
  }

  /**
   * Terminates the outbound message, committing the headers first if nobody did.
   */
  public end(): SendUnit {
    if (this.isDisposed()) return SendUnit.error(new AlreadyClosedError());
    const finish = (signal: AbortSignal) => this.transport.finish(signal);
    if (this.hasSentHeaders()) return this.passThrough(finish);
    return this.withHeaders(finish);
  }

  public toString(): string {
    if (this.isWebsocket()) return `ws:${this.uri()}`;
    return `${this.method()}:${this.uri()}`;
  }

  /**
   * Marks the headers sent.
   *
   * @returns `true` if marked for the first time
   */
  protected markHeadersAsSent(): boolean {
    const won = this.gate.tryWin();
    dlog('headgate:gate', `${this} ${won ? 'won' : 'lost'} header commit`);
    return won;
  }

  /**
   * Writes the status/request line and headers.
   *
   * Implementations must call the transport's `writeHead` synchronously.
   * Called at most once per exchange, by the gate's winner.
   */
  protected abstract commitHeaders(signal: AbortSignal): Promise<void>;

  private passThrough(stream: (signal: AbortSignal) => Promise<void>): SendUnit {
    return new SendUnit((signal) => {
      if (this.isDisposed()) return Promise.reject(new AlreadyClosedError());
      return stream(signal);
    });
  }

  private withHeaders(stream: (signal: AbortSignal) => Promise<void>): SendUnit {
    return new SendUnit((signal) => {
      if (this.isDisposed()) return Promise.reject(new AlreadyClosedError());
      if (!this.markHeadersAsSent()) return stream(signal);

      return this.commitHeaders(signal).then(() => {
        if (signal.aborted) return;
        dlog('headgate:send', `${this} headers committed, streaming body`);
        return stream(signal);
      });
    });
  }

  private encode(text: string, charset: BufferEncoding): Buffer {
    const buffer = this.transport.alloc(Buffer.byteLength(text, charset));
    buffer.write(text, 0, charset);
    return buffer;
  }
}

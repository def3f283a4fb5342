import type { ExchangeTransport } from '../transports/index.js';
import type { ServerExchangeInit } from './types.js';

import { createHash } from 'node:crypto';
import { HeadersAlreadySentError } from '../errors/index.js';
import {
  assertValidHeader,
  HeaderMap,
  isValidStatusCode,
  type HttpVersion,
  type ResponseHead,
} from '../http/index.js';
import { HttpOperations } from './HttpOperations.js';
import { WebsocketOperations } from './WebsocketOperations.js';

const WEBSOCKET_GUID = '258EAFA5-E914-47DA-95CA-C5AB0DC85B11';

/**
 * Response side of an exchange: status and headers stay mutable until they
 * are committed, after which every mutator throws {@link HeadersAlreadySentError}.
 */
export class HttpServerOperations extends HttpOperations {
  private readonly requestMethod: string;
  private readonly target: string;
  private readonly httpVersion: HttpVersion;
  private readonly inboundHeaders: HeaderMap;
  private readonly headers = new HeaderMap();
  private statusCode = 200;
  private reason = '';

  constructor(transport: ExchangeTransport, init: ServerExchangeInit = {}) {
    super(transport, init);
    this.requestMethod = init.method ?? 'GET';
    this.target = init.uri ?? '/';
    this.httpVersion = init.version ?? 'HTTP/1.1';
    this.inboundHeaders = init.requestHeaders ?? new HeaderMap();
  }

  public method(): string {
    return this.requestMethod;
  }

  public uri(): string {
    return this.target;
  }

  public version(): HttpVersion {
    return this.httpVersion;
  }

  public requestHeaders(): HeaderMap {
    return this.inboundHeaders;
  }

  /**
   * Snapshot of the response headers set so far.
   */
  public responseHeaders(): HeaderMap {
    return this.headers.clone();
  }

  /** Current response status. */
  public status(): number;
  /** Sets the response status; the reason defaults to the standard phrase. */
  public status(code: number, reason?: string): this;
  public status(code?: number, reason = ''): number | this {
    if (code === undefined) return this.statusCode;
    this.assertMutable('set status');
    if (!isValidStatusCode(code)) throw new RangeError(`Invalid status code: ${code}`);
    this.statusCode = code;
    this.reason = reason;
    return this;
  }

  /**
   * Sets a response header, replacing previous values.
   */
  public header(name: string, value: string): this {
    this.assertMutable('set header');
    assertValidHeader(name, value);
    this.headers.set(name, value);
    return this;
  }

  public addHeader(name: string, value: string): this {
    this.assertMutable('add header');
    assertValidHeader(name, value);
    this.headers.append(name, value);
    return this;
  }

  public removeHeader(name: string): this {
    this.assertMutable('remove header');
    this.headers.delete(name);
    return this;
  }

  /**
   * Fixes the body length instead of leaving framing to the transport.
   */
  public contentLength(length: number): this {
    if (!Number.isSafeInteger(length) || length < 0) throw new RangeError(`Invalid content length: ${length}`);
    return this.header('Content-Length', String(length));
  }

  /**
   * Turns this response into a websocket handshake.
   *
   * The returned operations share this exchange's gate: their header commit
   * writes `101 Switching Protocols` with the upgrade headers, and the
   * handshake key comes from `key` or the request's `Sec-WebSocket-Key`.
   */
  public upgrade(key = this.inboundHeaders.get('sec-websocket-key')): WebsocketOperations {
    this.assertMutable('upgrade');

    const headers = this.headers.clone();
    headers.set('Upgrade', 'websocket');
    headers.set('Connection', 'Upgrade');
    if (key) headers.set('Sec-WebSocket-Accept', acceptKey(key));

    return new WebsocketOperations(this.transport, {
      kind: 'response',
      version: this.httpVersion,
      status: 101,
      reason: '',
      headers,
    }, this);
  }

  protected commitHeaders(signal: AbortSignal): Promise<void> {
    const head: ResponseHead = {
      kind: 'response',
      version: this.httpVersion,
      status: this.statusCode,
      reason: this.reason,
      headers: this.headers.clone(),
      bodiless: this.requestMethod === 'HEAD',
    };
    return this.transport.writeHead(head, signal);
  }

  private assertMutable(action: string): void {
    if (this.hasSentHeaders()) throw new HeadersAlreadySentError(action);
  }
}

/**
 * Computes `Sec-WebSocket-Accept` for a client key (RFC 6455 §4.2.2).
 */
export function acceptKey(key: string): string {
  return createHash('sha1').update(key + WEBSOCKET_GUID).digest('base64');
}

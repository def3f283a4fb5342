import type { ExchangeTransport } from '../transports/index.js';
import type { ClientExchangeInit } from './types.js';

import { HeadersAlreadySentError } from '../errors/index.js';
import { assertValidHeader, HeaderMap, isValidMethod, type HttpVersion } from '../http/index.js';
import { HttpOperations } from './HttpOperations.js';

/**
 * Request side of an exchange. Its header commit writes the request line.
 */
export class HttpClientOperations extends HttpOperations {
  private readonly requestMethod: string;
  private readonly target: string;
  private readonly httpVersion: HttpVersion;
  private readonly headers: HeaderMap;

  constructor(transport: ExchangeTransport, init: ClientExchangeInit) {
    super(transport, init);
    this.requestMethod = init.method ?? 'GET';
    if (!isValidMethod(this.requestMethod)) throw new TypeError(`Invalid method: "${this.requestMethod}"`);
    this.target = init.uri;
    this.httpVersion = init.version ?? 'HTTP/1.1';
    this.headers = init.headers?.clone() ?? new HeaderMap();
  }

  public method(): string {
    return this.requestMethod;
  }

  public uri(): string {
    return this.target;
  }

  public requestHeaders(): HeaderMap {
    return this.headers.clone();
  }

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

  protected commitHeaders(signal: AbortSignal): Promise<void> {
    return this.transport.writeHead({
      kind: 'request',
      version: this.httpVersion,
      method: this.requestMethod,
      uri: this.target,
      headers: this.headers.clone(),
    }, signal);
  }

  private assertMutable(action: string): void {
    if (this.hasSentHeaders()) throw new HeadersAlreadySentError(action);
  }
}

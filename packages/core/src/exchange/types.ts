import type { HeaderMap, HttpVersion } from '../http/index.js';

/**
 * Settings common to every exchange.
 */
export interface ExchangeOptions {
  /**
   * Encoding `sendString` uses when none is given.
   *
   * @default 'utf8'
   */
  charset?: BufferEncoding;
}

/**
 * Describes the request a server exchange answers.
 */
export interface ServerExchangeInit extends ExchangeOptions {
  /** @default 'GET' */
  method?: string;
  /** @default '/' */
  uri?: string;
  /** @default 'HTTP/1.1' */
  version?: HttpVersion;
  /** Headers of the inbound request, e.g. to find `Sec-WebSocket-Key`. */
  requestHeaders?: HeaderMap;
}

/**
 * Describes an outbound request.
 */
export interface ClientExchangeInit extends ExchangeOptions {
  /** @default 'GET' */
  method?: string;
  uri: string;
  /** @default 'HTTP/1.1' */
  version?: HttpVersion;
  headers?: HeaderMap;
}

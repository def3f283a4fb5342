import type {
  CompressionSetting,
  ExchangeConnectionHook,
  HttpServerOperations,
} from '@headgate/core';
import type { Metadata, ServerOptions } from '@grpc/grpc-js';

/**
 * What a handler receives besides the exchange itself.
 */
export interface ExchangeRequest<Ctx> {
  /** Initial metadata of the call, request head included. */
  metadata: Metadata;
  /** Inbound request body, one chunk per message, decompressed. */
  body: AsyncIterable<Uint8Array>;
  /** Value returned by `beforeConnect`, if it returned one. */
  context?: Ctx;
}

/**
 * Answers one exchange. The server ends the exchange once the returned promise settles.
 */
export type ExchangeHandler<Ctx> = (
  exchange: HttpServerOperations,
  request: ExchangeRequest<Ctx>,
) => void | Promise<void>;

/**
 * Configuration options for the {@link GrpcExchangeServer}.
 */
export interface GrpcExchangeServerOptions<Ctx extends object = {}> {
  /**
   * The host IP address the server should bind to.
   *
   * Examples:
   * - `'127.0.0.1'` for localhost only
   * - `'0.0.0.0'` to listen on all IPv4 interfaces
   * - `'::'` to support all IPv6 interfaces
   */
  host: string;

  /** The port number the server should listen on; `0` picks a free one. */
  port: number;

  handler: ExchangeHandler<Ctx>;

  /**
   * Optional hook to authenticate or inspect the call before the handler runs.
   * Can return a context object handed to the handler.
   */
  beforeConnect?: ExchangeConnectionHook<Ctx>;

  /**
   * Compresses response body messages.
   *
   * @default false
   */
  compression?: CompressionSetting;

  /**
   * Default text encoding of every exchange.
   *
   * @default 'utf8'
   */
  charset?: BufferEncoding;

  /**
   * Enable TLS by passing key/cert pair.
   * If not provided, insecure connection will be used.
   */
  tls?: {
    cert: Buffer | string;
    key: Buffer | string;
  };

  /**
   * Optional gRPC channel/server options (e.g. keepalive settings).
   */
  serverOptions?: ServerOptions;
}

/**
 * Event definitions for the {@link GrpcExchangeServer}.
 */
export interface GrpcExchangeServerEvents {
  /** Emitted when an exchange is about to be handed to the handler. */
  exchange: (exchange: HttpServerOperations) => void;

  /** Emitted once an exchange was ended without error. */
  completed: (exchange: HttpServerOperations) => void;

  /**
   * Emitted when a handler, a hook or the server fails.
   * @param exchange - The exchange concerned, if any.
   */
  error: (error: Error, exchange?: HttpServerOperations) => void;
}

import type { CompressionSetting, HttpClientOperations } from '@headgate/core';
import type { CallOptions, ClientOptions } from '@grpc/grpc-js';

/**
 * Configuration options for {@link GrpcExchangeClient}.
 */
export interface GrpcExchangeClientOptions {
  /** The server address to connect to (e.g. `localhost:50051`). */
  address: string;

  /**
   * Compresses request body messages.
   *
   * @default false
   */
  compression?: CompressionSetting;

  /**
   * Default text encoding of every request.
   *
   * @default 'utf8'
   */
  charset?: BufferEncoding;

  /**
   * Enable TLS. If true, uses default secure credentials.
   * Optional advanced: pass root cert if needed.
   */
  tls?: boolean | {
    rootCerts?: Buffer | string;
  };

  /**
   * Advanced: gRPC channel options (e.g. keepalive settings).
   * See: https://grpc.github.io/grpc/core/group__grpc__arg__keys.html
   */
  channelOptions?: ClientOptions;

  /** Per-call options, e.g. a deadline. */
  callOptions?: CallOptions;
}

/**
 * Event definitions for {@link GrpcExchangeClient}.
 */
export interface GrpcExchangeClientEvents {
  /** Emitted when a request exchange is created. */
  request: (exchange: HttpClientOperations) => void;

  /**
   * Emitted when a call fails.
   * @param error - The encountered error.
   */
  error: (error: Error, exchange: HttpClientOperations) => void;
}

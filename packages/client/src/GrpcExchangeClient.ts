import type { GrpcExchangeClientEvents, GrpcExchangeClientOptions } from './types.js';
import type { HeaderMap, HttpVersion } from '@headgate/core';

import {
  Client,
  credentials,
  type Metadata,
} from '@grpc/grpc-js';
import {
  dlog,
  exchangeService,
  GrpcClientTransport,
  TypedEventEmitter,
  type ClientCall,
} from '@headgate/core';
import { GrpcRequest } from './GrpcRequest.js';

/**
 * Extra request settings for {@link GrpcExchangeClient.request}.
 */
export interface GrpcRequestInit {
  version?: HttpVersion;
  headers?: HeaderMap;
  charset?: BufferEncoding;
}

/**
 * GrpcExchangeClient sends request exchanges to a {@link exchangeService} server.
 *
 * Each request opens its own bidirectional call, and only when its headers
 * are committed: nothing touches the network before the first send.
 *
 * @example
 * const req = client.request('POST', '/echo').header('content-type', 'text/plain');
 * await req.sendString(['hello']).andThen(() => req.end()).toPromise();
 * const { head, body } = await req.response();
 */
export class GrpcExchangeClient extends TypedEventEmitter<GrpcExchangeClientEvents> {
  private client?: Client;

  /**
   * Creates a new instance of {@link GrpcExchangeClient}. The channel is created on first use.
   *
   * @param options - Client configuration options.
   */
  constructor(private options: GrpcExchangeClientOptions) {
    super();

    if (typeof this.options.address !== 'string') {
      throw new TypeError(`Invalid gRPC server address: ${this.options.address}`);
    }
  }

  /**
   * Creates a request exchange. No call is opened until its headers are committed.
   */
  public request(method: string, uri: string, init: GrpcRequestInit = {}): GrpcRequest {
    let exchange: GrpcRequest | undefined;
    const transport = new GrpcClientTransport((metadata) => {
      const call = this.openCall(metadata);
      call.on('error', (err) => {
        if (exchange) this.fail(err, exchange);
      });
      return call;
    }, { compression: this.options.compression });

    exchange = new GrpcRequest(transport, {
      method,
      uri,
      version: init.version,
      headers: init.headers,
      charset: init.charset ?? this.options.charset,
    });
    this.emit('request', exchange);
    return exchange;
  }

  /**
   * Closes the channel. Requests created afterwards open a new one.
   */
  public close(): void {
    this.client?.close();
    this.client = undefined;
  }

  /**
   * Opens the bidirectional call of one exchange.
   */
  protected openCall(metadata: Metadata): ClientCall {
    dlog('headgate:client', `opening call to ${this.options.address}`);
    return this.channel().makeBidiStreamRequest(
      exchangeService.open.path,
      exchangeService.open.requestSerialize,
      exchangeService.open.responseDeserialize,
      metadata,
      this.options.callOptions,
    );
  }

  private channel(): Client {
    if (this.client) return this.client;

    const creds = this.options.tls
      ? credentials.createSsl(
        typeof this.options.tls === 'object' && this.options.tls.rootCerts
          ? Buffer.from(this.options.tls.rootCerts)
          : undefined
      )
      : credentials.createInsecure();

    this.client = new Client(this.options.address, creds, this.options.channelOptions);
    return this.client;
  }

  private fail(error: Error, exchange: GrpcRequest): void {
    if (this.listenerCount('error') > 0) {
      this.emit('error', error, exchange);
    } else {
      console.warn('[GrpcExchangeClient]', error.message);
    }
  }
}

import type { GrpcExchangeServerEvents, GrpcExchangeServerOptions } from './types.js';
import type { Metadata, ServerDuplexStream } from '@grpc/grpc-js';

import {
  Server,
  ServerCredentials,
} from '@grpc/grpc-js';
import {
  decodeMessages,
  dlog,
  exchangeService,
  GrpcServerTransport,
  HttpServerOperations,
  metadataToRequestHead,
  readBodyEncoding,
  toError,
  TypedEventEmitter,
  type ServerCall,
} from '@headgate/core';

/**
 * The parts of an accepted call the server drives. `ServerDuplexStream` qualifies.
 */
export type ExchangeCall = ServerCall & AsyncIterable<unknown> & { readonly metadata: Metadata };

/**
 * GrpcExchangeServer hosts the {@link exchangeService} method: every accepted
 * call becomes one {@link HttpServerOperations} handed to the configured handler.
 *
 * The request head is read from the call's metadata and the request body from
 * its messages. Once the handler settles the exchange is ended, unless the
 * handler ended it, which commits the headers if the handler never did. A failing handler gets a `500` answer
 * while the headers are still unsent; afterwards its call is destroyed.
 *
 * @template Ctx - Context returned by `beforeConnect`.
 */
export class GrpcExchangeServer<Ctx extends object = {}> extends TypedEventEmitter<GrpcExchangeServerEvents> {
  private server: Server;

  private calls = new Map<ExchangeCall, HttpServerOperations>();

  /**
   * Constructs a new {@link GrpcExchangeServer}. Nothing is bound until {@link listen}.
   *
   * @param options - Configuration for the server's behavior and transport.
   */
  constructor(private options: GrpcExchangeServerOptions<Ctx>) {
    super();

    this.server = new Server(this.options.serverOptions);
    this.server.addService(exchangeService, {
      open: (call: ServerDuplexStream<Buffer, Buffer>) => {
        void this.handle(call);
      },
    });
  }

  /** Exchanges whose call is still open. */
  public get activeExchanges(): number {
    return this.calls.size;
  }

  /**
   * Drives one exchange over an accepted call. Never rejects: failures are
   * reported through the `'error'` event.
   */
  public async handle(call: ExchangeCall): Promise<void> {
    const head = metadataToRequestHead(call.metadata);
    const exchange = new HttpServerOperations(
      new GrpcServerTransport(call, { compression: this.options.compression }),
      {
        method: head.method,
        uri: head.uri,
        version: head.version,
        requestHeaders: head.headers,
        charset: this.options.charset,
      },
    );

    this.calls.set(call, exchange);
    call.once('close', () => this.calls.delete(call));

    let context: Ctx | undefined;
    if (this.options.beforeConnect) {
      try {
        const maybeCtx = await this.options.beforeConnect({
          metadata: call.metadata,
          exchange,
          call,
        });

        if (maybeCtx && typeof maybeCtx === 'object') {
          context = maybeCtx;
        }
      } catch (err) {
        this.fail(toError(err), exchange);
        call.destroy(err instanceof Error ? err : new Error('Auth failed'));
        return;
      }
    }

    dlog('headgate:server', `exchange ${exchange}`);
    this.emit('exchange', exchange);

    try {
      await this.options.handler(exchange, {
        metadata: call.metadata,
        body: decodeMessages(call, readBodyEncoding(call.metadata)),
        context,
      });
      if (!call.writableEnded) await exchange.end().toPromise();
      this.emit('completed', exchange);
    } catch (err) {
      const error = toError(err);
      this.fail(error, exchange);
      await this.recover(call, exchange, error);
    }
  }

  /**
   * Binds the gRPC server to the configured address and starts listening for incoming calls.
   * Automatically selects between secure (TLS) and insecure modes based on provided credentials.
   *
   * @returns The bound port.
   */
  public listen(): Promise<number> {
    const creds = this.options.tls
      ? ServerCredentials.createSsl(
        // `null` means use self-signed / non-root-verified certs
        null,
        [{
          cert_chain: Buffer.isBuffer(this.options.tls.cert)
            ? this.options.tls.cert
            : Buffer.from(this.options.tls.cert),
          private_key: Buffer.isBuffer(this.options.tls.key)
            ? this.options.tls.key
            : Buffer.from(this.options.tls.key),
        }],
        false
      )
      : ServerCredentials.createInsecure();

    return new Promise((resolve, reject) => {
      this.server.bindAsync(
        `${this.options.host}:${this.options.port}`,
        creds,
        (err, port) => {
          if (err) {
            this.fail(err);
            reject(err);
            return;
          }
          console.debug(`[GrpcExchangeServer] Listening on ${this.options.host}:${port}`);
          resolve(port);
        }
      );
    });
  }

  /**
   * Gracefully shuts down the gRPC server and destroys every open call.
   */
  public async destroy(): Promise<void> {
    for (const call of this.calls.keys()) {
      call.destroy();
    }
    this.calls.clear();

    return new Promise((resolve) => {
      const shutdownTimeout = setTimeout(() => {
        console.warn('[GrpcExchangeServer] Force shutting down gRPC server after timeout');
        this.server.forceShutdown();
        resolve();
      }, 5_000);

      this.server.tryShutdown((err) => {
        clearTimeout(shutdownTimeout);
        if (err) this.fail(err);
        this.removeAllListeners();
        resolve();
      });
    });
  }

  /**
   * Answers `500` when nothing went out yet, otherwise gives up on the call.
   */
  private async recover(call: ExchangeCall, exchange: HttpServerOperations, error: Error): Promise<void> {
    if (exchange.hasSentHeaders() || exchange.isDisposed()) {
      call.destroy(error);
      return;
    }
    try {
      await exchange.status(500).end().toPromise();
    } catch (err) {
      dlog('headgate:server', `${exchange} could not send the error response: ${toError(err).message}`);
      call.destroy(error);
    }
  }

  private fail(error: Error, exchange?: HttpServerOperations): void {
    if (this.listenerCount('error') > 0) {
      this.emit('error', error, exchange);
    } else {
      console.warn('[GrpcExchangeServer]', error.message);
    }
  }
}

import type { Metadata } from '@grpc/grpc-js';
import type { HttpServerOperations } from '../exchange/index.js';
import type { ServerCall } from '../transports/index.js';

/**
 * Runs before an exchange is handed to its handler. May authenticate the call
 * (by throwing) and return a context bound to the exchange.
 */
export type ExchangeConnectionHook<Ctx> = (
  info: {
    metadata: Metadata;
    exchange: HttpServerOperations;
    call: ServerCall;
  }
) => Promise<Ctx | void> | (Ctx | void);

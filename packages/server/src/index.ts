export { GrpcExchangeServer } from './GrpcExchangeServer.js';
export type { ExchangeCall } from './GrpcExchangeServer.js';
export type {
  ExchangeHandler,
  ExchangeRequest,
  GrpcExchangeServerEvents,
  GrpcExchangeServerOptions,
} from './types.js';
export * from '@headgate/core';

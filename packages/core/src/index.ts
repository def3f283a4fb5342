export type { ExchangeConnectionHook } from './context/index.js';
export * from './errors/index.js';
export { TypedEventEmitter } from './events/index.js';
export type { ClientExchangeInit, ExchangeOptions, ServerExchangeInit } from './exchange/index.js';
export {
  HttpOperations,
  HttpServerOperations,
  HttpClientOperations,
  WebsocketOperations,
  acceptKey,
} from './exchange/index.js';
export { SendGate } from './gate/index.js';
export * from './http/index.js';
export type { Payload, SendObserver, SendTask, Subscription } from './send/index.js';
export { SendUnit, mapPayload } from './send/index.js';
export * from './transports/index.js';
export type { CompressionCodec, CompressionSetting } from './utils/compression.js';
export { compress, decompress } from './utils/compression.js';
export { dlog } from './utils/debug.js';

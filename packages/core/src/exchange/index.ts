export type { ClientExchangeInit, ExchangeOptions, ServerExchangeInit } from './types.js';
export { HttpOperations } from './HttpOperations.js';
export { HttpServerOperations, acceptKey } from './HttpServerOperations.js';
export { HttpClientOperations } from './HttpClientOperations.js';
export { WebsocketOperations } from './WebsocketOperations.js';

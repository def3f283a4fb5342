export { GrpcExchangeClient } from './GrpcExchangeClient.js';
export type { GrpcRequestInit } from './GrpcExchangeClient.js';
export { GrpcRequest } from './GrpcRequest.js';
export type { GrpcExchangeClientEvents, GrpcExchangeClientOptions } from './types.js';
export * from '@headgate/core';

export type { ExchangeTransport, ObjectEncoder } from './Transport.js';
export type { StreamTransportOptions } from './StreamTransport.js';
export { StreamTransport, defaultObjectEncoder } from './StreamTransport.js';
export type { GrpcTransportOptions, ServerCall } from './GrpcServerTransport.js';
export { GrpcServerTransport } from './GrpcServerTransport.js';
export type { CallOpener, ClientCall, GrpcResponse } from './GrpcClientTransport.js';
export { GrpcClientTransport } from './GrpcClientTransport.js';
export { decodeMessages, grpcObjectEncoder } from './messages.js';
export { WriteQueue } from './WriteQueue.js';
export { exchangeService } from './service.js';

import type { ServiceDefinition } from '@grpc/grpc-js';

const passThrough = (value: Buffer): Buffer => value;

/**
 * A single bidirectional method carrying raw bytes both ways: each call is
 * one exchange. Heads travel as metadata.
 */
export const exchangeService = {
  open: {
    path: '/headgate.Exchange/Open',
    requestStream: true,
    responseStream: true,
    requestSerialize: passThrough,
    requestDeserialize: passThrough,
    responseSerialize: passThrough,
    responseDeserialize: passThrough,
  },
} satisfies ServiceDefinition;

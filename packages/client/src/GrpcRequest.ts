import {
  GrpcClientTransport,
  HttpClientOperations,
  type ClientExchangeInit,
  type GrpcResponse,
} from '@headgate/core';

/**
 * A request exchange sent over gRPC, with access to its response.
 */
export class GrpcRequest extends HttpClientOperations {
  constructor(private readonly grpcTransport: GrpcClientTransport, init: ClientExchangeInit) {
    super(grpcTransport, init);
  }

  /**
   * Resolves once the server committed its response head. The request
   * headers must have been sent for this to settle.
   */
  public response(): Promise<GrpcResponse> {
    return this.grpcTransport.response();
  }

  /**
   * Cancels the underlying call. Sends still queued fail.
   */
  public cancel(): void {
    this.grpcTransport.cancel();
  }
}

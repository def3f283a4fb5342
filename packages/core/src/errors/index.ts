/**
 * Failure categories of an outbound exchange.
 */
export type ExchangeErrorCode =
  | 'ALREADY_CLOSED'
  | 'HEADER_COMMIT_FAILED'
  | 'BODY_STREAM_FAILED'
  | 'CANCELLED'
  | 'HEADERS_ALREADY_SENT';

export class ExchangeError extends Error {
  constructor(
    public readonly code: ExchangeErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Raised by any send attempted once the exchange's transport is released.
 */
export class AlreadyClosedError extends ExchangeError {
  constructor() {
    super('ALREADY_CLOSED', 'This outbound is not active anymore');
  }
}

/**
 * The transport could not write the status/request line and headers.
 * The body of the failing send is never written.
 */
export class HeaderCommitError extends ExchangeError {
  constructor(cause: unknown) {
    super('HEADER_COMMIT_FAILED', `Failed to commit headers: ${describe(cause)}`, { cause });
  }
}

/**
 * Body bytes or objects could not be streamed after the headers went out.
 * Headers stay marked as sent.
 */
export class BodyStreamError extends ExchangeError {
  constructor(cause: unknown) {
    super('BODY_STREAM_FAILED', `Failed to stream body: ${describe(cause)}`, { cause });
  }
}

export class CancellationError extends ExchangeError {
  constructor() {
    super('CANCELLED', 'Send was cancelled');
  }
}

export class HeadersAlreadySentError extends ExchangeError {
  constructor(action: string) {
    super('HEADERS_ALREADY_SENT', `Cannot ${action}: status and headers already sent`);
  }
}

/**
 * Normalizes anything thrown into an `Error`.
 */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

import type { MessageHead } from '../http/index.js';
import type { Payload } from '../send/index.js';

/**
 * Outbound side of one connection, as seen by an exchange.
 *
 * Ordering contract: every write method enqueues its work synchronously, in
 * invocation order, and does not start iterating a payload before the work
 * queued ahead of it has been written. Exchanges rely on this to order a
 * losing sender's body after the winning sender's head.
 *
 * Failures are classified by the transport: a failed head write rejects with
 * `HeaderCommitError`, a failed body with `BodyStreamError`.
 */
export interface ExchangeTransport {
  /**
   * Write the status/request line and headers. Called at most once per exchange.
   */
  writeHead(head: MessageHead, signal: AbortSignal): Promise<void>;

  /**
   * Stream raw body bytes.
   */
  writeBytes(source: Payload<Uint8Array>, signal: AbortSignal): Promise<void>;

  /**
   * Stream higher-level objects (frames, messages) through the transport's encoder.
   */
  writeObjects(source: Payload<unknown>, signal: AbortSignal): Promise<void>;

  /**
   * Terminate the message once everything queued so far has been written.
   */
  finish(signal: AbortSignal): Promise<void>;

  /**
   * `true` once the underlying resource was released, errored or finished.
   */
  isDisposed(): boolean;

  /**
   * Allocate a buffer for encoding text into.
   */
  alloc(size: number): Buffer;

  /**
   * Optional: expose writable buffer stats for backpressure heuristics.
   */
  getWritableInfo?(): { writableLength: number; writableNeedDrain: boolean } | null;
}

/**
 * Turns one payload element into bytes.
 */
export type ObjectEncoder = (value: unknown) => Uint8Array;

import type { Writable } from 'node:stream';
import type { Payload } from '../send/index.js';

import { type queueAsPromised, promise as fastqPromise } from 'fastq';
import { BodyStreamError } from '../errors/index.js';

export type WriteJob = () => Promise<void>;

/**
 * Serializes the write jobs of one connection.
 *
 * `enqueue` registers the job synchronously, so jobs run in the order they
 * were enqueued, one at a time. A job whose signal is aborted before its turn
 * is skipped.
 */
export class WriteQueue {
  private readonly queue: queueAsPromised<WriteJob, void>;

  constructor() {
    this.queue = fastqPromise<WriteQueue, WriteJob, void>(this, runJob, 1);
  }

  public enqueue(job: WriteJob, signal: AbortSignal): Promise<void> {
    return this.queue.push(async () => {
      if (signal.aborted) return;
      await job();
    });
  }

  /** Jobs waiting plus the one running. */
  public get pending(): number {
    return this.queue.length() + this.queue.running();
  }
}

function runJob(job: WriteJob): Promise<void> {
  return job();
}

/**
 * Writes a chunk and resolves once the stream has accepted it.
 */
export function flush(stream: Writable, chunk: Uint8Array): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    stream.write(chunk, (err) => (err ? reject(err) : resolve()));
  });
}

/**
 * Writes a chunk, waiting for `drain` when the stream asks for it.
 */
export async function writeChunk(stream: Writable, chunk: Uint8Array): Promise<void> {
  if (stream.destroyed) throw stream.errored ?? new Error('stream destroyed');
  if (!stream.write(chunk)) await drain(stream);
}

function drain(stream: Writable): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const cleanup = () => {
      stream.off('drain', onDrain);
      stream.off('close', onClose);
    };
    const onDrain = () => {
      cleanup();
      resolve();
    };
    const onClose = () => {
      cleanup();
      reject(stream.errored ?? new Error('stream closed before drain'));
    };
    stream.once('drain', onDrain);
    stream.once('close', onClose);
  });
}

/**
 * Writes every element of a payload to the stream, in order.
 *
 * Stops issuing writes once `signal` is aborted. Empty chunks are skipped.
 * Any failure, from the source or the stream, rejects with {@link BodyStreamError}.
 */
export async function pump<T>(
  stream: Writable,
  source: Payload<T>,
  toChunk: (value: T) => Uint8Array | Promise<Uint8Array>,
  signal: AbortSignal,
): Promise<void> {
  try {
    for await (const value of source) {
      if (signal.aborted) return;
      const chunk = await toChunk(value);
      if (chunk.byteLength === 0) continue;
      await writeChunk(stream, chunk);
    }
  } catch (err) {
    throw new BodyStreamError(err);
  }
}

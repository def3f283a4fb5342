import type { ExchangeTransport, MessageHead, Payload } from '@headgate/core';

/**
 * In-memory transport. `calls` logs every invocation as it happens; `wire`
 * logs what got written, in the order the serialized jobs ran.
 */
export class RecordingTransport implements ExchangeTransport {
  public readonly calls: string[] = [];
  public readonly wire: string[] = [];
  public readonly heads: MessageHead[] = [];
  public readonly objects: unknown[] = [];
  public readonly chunks: Buffer[] = [];
  public allocations = 0;
  public disposed = false;

  /** Rejects the next head write with this error. */
  public headFailure?: Error;

  private chain: Promise<void> = Promise.resolve();
  private headLatch?: Promise<void>;

  /**
   * Keeps head writes pending until the returned function is called.
   */
  public holdHeads(): () => void {
    let release: () => void = () => undefined;
    this.headLatch = new Promise<void>((resolve) => {
      release = resolve;
    });
    return release;
  }

  public writeHead(head: MessageHead, _signal: AbortSignal): Promise<void> {
    this.calls.push('head');
    return this.enqueue(async () => {
      if (this.headLatch) await this.headLatch;
      if (this.headFailure) throw this.headFailure;
      this.heads.push(head);
      this.wire.push('head');
    });
  }

  public writeBytes(source: Payload<Uint8Array>, signal: AbortSignal): Promise<void> {
    this.calls.push('bytes');
    return this.enqueue(async () => {
      for await (const chunk of source) {
        if (signal.aborted) return;
        const buffer = Buffer.from(chunk);
        this.chunks.push(buffer);
        this.wire.push(`bytes:${buffer.toString('latin1')}`);
      }
    });
  }

  public writeObjects(source: Payload<unknown>, signal: AbortSignal): Promise<void> {
    this.calls.push('objects');
    return this.enqueue(async () => {
      for await (const value of source) {
        if (signal.aborted) return;
        this.objects.push(value);
        this.wire.push('object');
      }
    });
  }

  public finish(_signal: AbortSignal): Promise<void> {
    this.calls.push('finish');
    return this.enqueue(async () => {
      this.wire.push('finish');
      this.disposed = true;
    });
  }

  public isDisposed(): boolean {
    return this.disposed;
  }

  public alloc(size: number): Buffer {
    this.allocations++;
    return Buffer.alloc(size);
  }

  private enqueue(job: () => Promise<void>): Promise<void> {
    const run = this.chain.then(job);
    this.chain = run.catch(() => undefined);
    return run;
  }
}

/**
 * Lets every pending job and I/O callback run.
 */
export function settle(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

import { CancellationError, toError } from '../errors/index.js';

/**
 * Work performed by a {@link SendUnit} once a consumer attaches.
 *
 * The task must perform its first write synchronously (before its first
 * `await`) when ordering on the wire depends on it.
 */
export type SendTask = (signal: AbortSignal) => Promise<void>;

/**
 * Consumer of a send outcome. `error` is required so that no failure can go
 * unobserved.
 */
export interface SendObserver {
  complete?(): void;
  error(err: Error): void;
  cancelled?(): void;
}

export interface Subscription {
  /** `true` once a terminal signal was delivered or the subscription was cancelled. */
  readonly closed: boolean;
  cancel(): void;
}

/**
 * A lazy, cold unit of outbound work.
 *
 * Nothing happens when the unit is built. Each {@link SendUnit.subscribe}
 * runs the task anew with its own abort signal, and delivers at most one
 * terminal signal to its observer.
 *
 * @example
 * const unit = exchange.send(chunks);   // no side effect yet
 * await unit.toPromise();               // header commit + body
 */
export class SendUnit {
  constructor(private readonly task: SendTask) { }

  public static empty(): SendUnit {
    return new SendUnit(() => Promise.resolve());
  }

  public static error(err: Error): SendUnit {
    return new SendUnit(() => Promise.reject(err));
  }

  /**
   * Attaches a consumer and starts the task.
   *
   * @remarks
   * - The task runs synchronously up to its first `await`.
   * - After `cancel()`, the task's signal is aborted, `observer.cancelled`
   *   fires once and the eventual outcome of the task is dropped.
   */
  public subscribe(observer: SendObserver): Subscription {
    const controller = new AbortController();
    let closed = false;

    const subscription: Subscription = {
      get closed() {
        return closed;
      },
      cancel: () => {
        if (closed) return;
        closed = true;
        controller.abort(new CancellationError());
        observer.cancelled?.();
      },
    };

    let pending: Promise<void>;
    try {
      pending = this.task(controller.signal);
    } catch (err) {
      pending = Promise.reject(err);
    }

    pending.then(
      () => {
        if (closed) return;
        closed = true;
        observer.complete?.();
      },
      (err: unknown) => {
        if (closed) return;
        closed = true;
        observer.error(toError(err));
      },
    );

    return subscription;
  }

  /**
   * Subscribes and adapts the outcome to a promise.
   *
   * @param signal - Aborting it cancels the subscription; the promise then
   *   rejects with {@link CancellationError}.
   */
  public toPromise(signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new CancellationError());
        return;
      }

      const onAbort = () => subscription.cancel();
      const subscription = this.subscribe({
        complete: () => {
          signal?.removeEventListener('abort', onAbort);
          resolve();
        },
        error: (err) => {
          signal?.removeEventListener('abort', onAbort);
          reject(err);
        },
        cancelled: () => reject(new CancellationError()),
      });

      if (!subscription.closed) signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Runs `next()` after this unit completes. `next` is only called (and its
   * unit only built) once this one succeeded and the consumer is still attached.
   */
  public andThen(next: () => SendUnit): SendUnit {
    return new SendUnit(async (signal) => {
      await this.run(signal);
      if (signal.aborted) return;
      await next().run(signal);
    });
  }

  /**
   * Runs the task against an outer signal, forwarding its abort.
   *
   * @internal
   */
  private run(signal: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const onAbort = () => subscription.cancel();
      const subscription = this.subscribe({
        complete: () => {
          signal.removeEventListener('abort', onAbort);
          resolve();
        },
        error: (err) => {
          signal.removeEventListener('abort', onAbort);
          reject(err);
        },
        cancelled: () => resolve(),
      });
      if (!subscription.closed) signal.addEventListener('abort', onAbort, { once: true });
    });
  }
}

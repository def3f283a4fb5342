import { CancellationError, SendUnit } from '@headgate/core';
import { settle } from './src/recording';

describe('SendUnit', () => {
  test('does nothing until subscribed', async () => {
    let runs = 0;
    const unit = new SendUnit(async () => {
      runs++;
    });

    await settle();
    expect(runs).toBe(0);

    await unit.toPromise();
    expect(runs).toBe(1);
  });

  test('runs the task again for every subscription', async () => {
    let runs = 0;
    const unit = new SendUnit(async () => {
      runs++;
    });

    await unit.toPromise();
    await unit.toPromise();

    expect(runs).toBe(2);
  });

  test('runs the task synchronously on subscribe', () => {
    const steps: string[] = [];
    const unit = new SendUnit(async () => {
      steps.push('task');
    });

    unit.subscribe({ error: () => steps.push('error') });
    steps.push('after subscribe');

    expect(steps).toEqual(['task', 'after subscribe']);
  });

  test('delivers a single completion', async () => {
    const complete = jest.fn();
    const error = jest.fn();

    const subscription = SendUnit.empty().subscribe({ complete, error });
    await settle();

    expect(complete).toHaveBeenCalledTimes(1);
    expect(error).not.toHaveBeenCalled();
    expect(subscription.closed).toBe(true);
  });

  test('turns a synchronous throw into an error signal', async () => {
    const failure = new Error('boom');
    const unit = new SendUnit(() => {
      throw failure;
    });

    await expect(unit.toPromise()).rejects.toBe(failure);
  });

  test('normalizes non-Error rejections', async () => {
    const unit = new SendUnit(() => Promise.reject('plain'));

    await expect(unit.toPromise()).rejects.toEqual(new Error('plain'));
  });

  test('cancel aborts the task and suppresses its outcome', async () => {
    let seen: AbortSignal | undefined;
    let finish: () => void = () => undefined;
    const unit = new SendUnit((signal) => {
      seen = signal;
      return new Promise<void>((resolve) => {
        finish = resolve;
      });
    });
    const complete = jest.fn();
    const cancelled = jest.fn();

    const subscription = unit.subscribe({ complete, cancelled, error: jest.fn() });
    subscription.cancel();
    subscription.cancel();
    finish();
    await settle();

    expect(seen?.aborted).toBe(true);
    expect(seen?.reason).toBeInstanceOf(CancellationError);
    expect(cancelled).toHaveBeenCalledTimes(1);
    expect(complete).not.toHaveBeenCalled();
    expect(subscription.closed).toBe(true);
  });

  test('toPromise rejects right away on an aborted signal', async () => {
    let runs = 0;
    const unit = new SendUnit(async () => {
      runs++;
    });

    await expect(unit.toPromise(AbortSignal.abort())).rejects.toBeInstanceOf(CancellationError);
    expect(runs).toBe(0);
  });

  test('toPromise cancels the subscription when its signal aborts', async () => {
    let seen: AbortSignal | undefined;
    const unit = new SendUnit((signal) => {
      seen = signal;
      return new Promise<void>(() => undefined);
    });
    const controller = new AbortController();

    const pending = unit.toPromise(controller.signal);
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(CancellationError);
    expect(seen?.aborted).toBe(true);
  });

  test('andThen builds the next unit only after success', async () => {
    const steps: string[] = [];
    const first = new SendUnit(async () => {
      steps.push('first');
    });

    const unit = first.andThen(() => {
      steps.push('build second');
      return new SendUnit(async () => {
        steps.push('second');
      });
    });
    expect(steps).toEqual([]);

    await unit.toPromise();
    expect(steps).toEqual(['first', 'build second', 'second']);
  });

  test('andThen skips the next unit after a failure', async () => {
    const next = jest.fn(() => SendUnit.empty());
    const failure = new Error('first failed');

    await expect(SendUnit.error(failure).andThen(next).toPromise()).rejects.toBe(failure);
    expect(next).not.toHaveBeenCalled();
  });
});

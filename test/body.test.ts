import { HeaderCommitError, HttpServerOperations } from '@headgate/core';
import { RecordingTransport, settle } from './src/recording';

function setup() {
  const transport = new RecordingTransport();
  const exchange = new HttpServerOperations(transport, { method: 'GET', uri: '/feed' });
  return { transport, exchange };
}

const bytes = (text: string) => [Buffer.from(text, 'latin1')];

describe('sequenced body', () => {
  test('the winner writes the head before any body, losers follow in invocation order', async () => {
    const { transport, exchange } = setup();

    await Promise.all([
      exchange.send(bytes('a')).toPromise(),
      exchange.send(bytes('b')).toPromise(),
      exchange.send(bytes('c')).toPromise(),
    ]);

    expect(transport.calls).toEqual(['head', 'bytes', 'bytes', 'bytes']);
    expect(transport.wire).toEqual(['head', 'bytes:b', 'bytes:c', 'bytes:a']);
  });

  test('a failed commit never pulls the body source', async () => {
    const { transport, exchange } = setup();
    const failure = new HeaderCommitError(new Error('broken pipe'));
    transport.headFailure = failure;

    let pulled = false;
    async function* body() {
      pulled = true;
      yield Buffer.from('never');
    }

    await expect(exchange.send(body()).toPromise()).rejects.toBe(failure);

    expect(pulled).toBe(false);
    expect(transport.calls).toEqual(['head']);
    expect(transport.chunks).toEqual([]);
  });

  test('sends after the commit skip the gate', async () => {
    const { transport, exchange } = setup();
    await exchange.sendHeaders().toPromise();

    await exchange.send(bytes('x')).toPromise();
    await exchange.sendObject([{ n: 1 }]).toPromise();

    expect(transport.calls).toEqual(['head', 'bytes', 'objects']);
    expect(transport.objects).toEqual([{ n: 1 }]);
  });

  test('cancelling during the commit drops the body', async () => {
    const { transport, exchange } = setup();
    const release = transport.holdHeads();

    const observer = { complete: jest.fn(), error: jest.fn(), cancelled: jest.fn() };
    const subscription = exchange.send(bytes('late')).subscribe(observer);
    subscription.cancel();

    release();
    await settle();

    expect(transport.calls).toEqual(['head']);
    expect(transport.wire).toEqual(['head']);
    expect(observer.cancelled).toHaveBeenCalledTimes(1);
    expect(observer.complete).not.toHaveBeenCalled();
    expect(observer.error).not.toHaveBeenCalled();
  });

  test('every subscription re-sends its payload', async () => {
    const { transport, exchange } = setup();
    const unit = exchange.send(bytes('again'));

    await unit.toPromise();
    await unit.toPromise();

    expect(transport.wire).toEqual(['head', 'bytes:again', 'bytes:again']);
  });

  test('end() commits the head, then finishes', async () => {
    const { transport, exchange } = setup();

    await exchange.status(204).end().toPromise();

    expect(transport.wire).toEqual(['head', 'finish']);
    const [head] = transport.heads;
    expect(head.kind === 'response' && head.status).toBe(204);
  });

  test('end() after a body only finishes', async () => {
    const { transport, exchange } = setup();

    await exchange.send(bytes('done')).toPromise();
    await exchange.end().toPromise();

    expect(transport.calls).toEqual(['head', 'bytes', 'finish']);
  });

  test('body chunks pass through unchanged and in order', async () => {
    const { transport, exchange } = setup();

    async function* body() {
      yield Buffer.from('one ');
      yield Buffer.from('two');
    }
    await exchange.send(body()).toPromise();

    expect(Buffer.concat(transport.chunks).toString()).toBe('one two');
  });
});

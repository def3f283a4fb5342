import { gunzipSync } from 'node:zlib';
import type { Metadata } from '@grpc/grpc-js';
import { GrpcExchangeClient, HeaderCommitError, type HttpClientOperations } from '@headgate/client';
import { FakeClientCall, metadataOf } from './src/streams';
import { settle } from './src/recording';

class TestClient extends GrpcExchangeClient {
  public readonly opened: Array<{ metadata: Metadata; call: FakeClientCall }> = [];

  protected override openCall(metadata: Metadata): FakeClientCall {
    const call = new FakeClientCall();
    this.opened.push({ metadata, call });
    return call;
  }
}

class UnreachableClient extends GrpcExchangeClient {
  protected override openCall(): FakeClientCall {
    throw new Error('channel closed');
  }
}

async function collect(body: AsyncIterable<Uint8Array>): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of body) chunks.push(Buffer.from(chunk));
  return Buffer.concat(chunks).toString();
}

describe('GrpcExchangeClient', () => {
  test('opens no call before the headers are committed', () => {
    const client = new TestClient({ address: 'localhost:50051' });
    const created: HttpClientOperations[] = [];
    client.on('request', (exchange) => created.push(exchange));

    const request = client.request('POST', '/echo');
    request.sendString(['unsent']);

    expect(created).toHaveLength(1);
    expect(created[0]).toBe(request);
    expect(client.opened).toEqual([]);
  });

  test('sends the request head as call metadata and the body as messages', async () => {
    const client = new TestClient({ address: 'localhost:50051' });
    const request = client.request('POST', '/echo').header('Content-Type', 'text/plain');

    await request.sendString(['hi', 'there']).andThen(() => request.end()).toPromise();

    expect(client.opened).toHaveLength(1);
    const [{ metadata, call }] = client.opened;
    expect(metadata.get('http-method')).toEqual(['POST']);
    expect(metadata.get('http-uri')).toEqual(['/echo']);
    expect(metadata.get('http-h-content-type')).toEqual(['text/plain']);
    expect(call.messages.map((message) => message.toString())).toEqual(['hi', 'there']);
    expect(call.writableEnded).toBe(true);
    expect(request.isDisposed()).toBe(true);
  });

  test('reads the response head and body', async () => {
    const client = new TestClient({ address: 'localhost:50051' });
    const request = client.request('GET', '/status');
    await request.end().toPromise();

    const pending = request.response();
    await settle();
    client.opened[0].call.respond(metadataOf({ 'http-status': '201', 'http-h-location': '/things/1' }), [
      Buffer.from('cre'),
      Buffer.from('ated'),
    ]);
    const { head, body } = await pending;

    expect(head.status).toBe(201);
    expect(head.headers.get('location')).toBe('/things/1');
    expect(await collect(body)).toBe('created');
  });

  test('response metadata received early is kept', async () => {
    const client = new TestClient({ address: 'localhost:50051' });
    const request = client.request('GET', '/early');
    await request.sendHeaders().toPromise();

    client.opened[0].call.respond(metadataOf({ 'http-status': '404' }), []);
    const { head, body } = await request.response();

    expect(head.status).toBe(404);
    expect(await collect(body)).toBe('');
  });

  test('compresses request messages', async () => {
    const client = new TestClient({ address: 'localhost:50051', compression: { codec: 'gzip' } });
    const request = client.request('PUT', '/blob');

    await request.send([Buffer.from('packed')]).toPromise();

    const [{ metadata, call }] = client.opened;
    expect(metadata.get('body-encoding')).toEqual(['gzip']);
    expect(gunzipSync(call.messages[0]).toString()).toBe('packed');
  });

  test('reports call failures with their exchange', async () => {
    const client = new TestClient({ address: 'localhost:50051' });
    const errors: string[] = [];
    client.on('error', (error, exchange) => errors.push(`${exchange} ${error.message}`));
    const request = client.request('GET', '/flaky');
    await request.sendHeaders().toPromise();

    client.opened[0].call.emit('error', new Error('unavailable'));

    expect(errors).toEqual(['GET:/flaky unavailable']);
  });

  test('cancel() cancels the opened call', async () => {
    const client = new TestClient({ address: 'localhost:50051' });
    const request = client.request('GET', '/slow');
    await request.sendHeaders().toPromise();

    request.cancel();

    expect(client.opened[0].call.cancelled).toBe(true);
  });

  test('response() fails when the call could not be opened', async () => {
    const client = new UnreachableClient({ address: 'localhost:50051' });
    const request = client.request('GET', '/down');

    await expect(request.sendHeaders().toPromise()).rejects.toBeInstanceOf(HeaderCommitError);
    await expect(request.response()).rejects.toThrow('Failed to commit headers: channel closed');
  });

  test('rejects invalid methods', () => {
    const client = new TestClient({ address: 'localhost:50051' });

    expect(() => client.request('BAD METHOD', '/')).toThrow(TypeError);
  });
});

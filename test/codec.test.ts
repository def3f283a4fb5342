import {
  BinaryFrame,
  compress,
  decompress,
  encodeChunk,
  encodeFrame,
  encodeHead,
  HeaderMap,
  isValidHeaderValue,
  mayHaveBody,
  TextFrame,
} from '@headgate/core';

describe('HeaderMap', () => {
  test('looks names up regardless of case', () => {
    const headers = new HeaderMap();
    headers.set('Content-Type', 'text/html');

    expect(headers.get('content-type')).toBe('text/html');
    expect(headers.has('CONTENT-TYPE')).toBe(true);
    expect(headers.get('content-length')).toBeUndefined();
  });

  test('keeps every value of a repeated header', () => {
    const headers = new HeaderMap();
    headers.append('Set-Cookie', 'a=1');
    headers.append('set-cookie', 'b=2');

    expect(headers.get('set-cookie')).toBe('a=1, b=2');
    expect(headers.getAll('SET-COOKIE')).toEqual(['a=1', 'b=2']);
    expect([...headers]).toEqual([
      { name: 'Set-Cookie', value: 'a=1' },
      { name: 'Set-Cookie', value: 'b=2' },
    ]);
    expect(headers.size).toBe(1);
  });

  test('set() replaces and delete() removes', () => {
    const headers = new HeaderMap([{ name: 'Accept', value: 'a' }, { name: 'Accept', value: 'b' }]);

    headers.set('accept', 'c');
    expect([...headers]).toEqual([{ name: 'accept', value: 'c' }]);

    expect(headers.delete('ACCEPT')).toBe(true);
    expect(headers.size).toBe(0);
  });

  test('clones are independent', () => {
    const headers = new HeaderMap([{ name: 'X-One', value: '1' }]);
    const copy = headers.clone();

    copy.append('X-One', '2');

    expect(headers.getAll('x-one')).toEqual(['1']);
    expect(copy.getAll('x-one')).toEqual(['1', '2']);
  });
});

describe('head encoding', () => {
  test('writes the start line, headers and extra lines', () => {
    const bytes = encodeHead(
      {
        kind: 'response',
        version: 'HTTP/1.1',
        status: 404,
        reason: '',
        headers: new HeaderMap([{ name: 'Content-Length', value: '0' }]),
      },
      [{ name: 'Connection', value: 'close' }],
    );

    expect(bytes.toString('latin1')).toBe('HTTP/1.1 404 Not Found\r\nContent-Length: 0\r\nConnection: close\r\n\r\n');
  });

  test('writes header values as latin1', () => {
    const bytes = encodeHead({
      kind: 'request',
      version: 'HTTP/1.1',
      method: 'GET',
      uri: '/',
      headers: new HeaderMap([{ name: 'X-Name', value: 'café' }]),
    });

    expect([...bytes.subarray(24, 29)]).toEqual([0x63, 0x61, 0x66, 0xe9, 0x0d]);
  });

  test('rejects control characters in values', () => {
    expect(isValidHeaderValue('plain value')).toBe(true);
    expect(isValidHeaderValue('tab\tok')).toBe(true);
    expect(isValidHeaderValue('line\nbreak')).toBe(false);
    expect(isValidHeaderValue('nul\u0000')).toBe(false);
  });

  test('knows which responses carry no body', () => {
    const response = (status: number) => ({
      kind: 'response' as const,
      version: 'HTTP/1.1' as const,
      status,
      reason: '',
      headers: new HeaderMap(),
    });

    expect([101, 200, 204, 304, 500].map((status) => mayHaveBody(response(status))))
      .toEqual([false, true, false, false, true]);
    expect(mayHaveBody({ ...response(200), bodiless: true })).toBe(false);
  });

  test('frames a chunk with its hex length', () => {
    expect(encodeChunk(Buffer.from('0123456789abcdef')).toString('latin1')).toBe('10\r\n0123456789abcdef\r\n');
  });
});

describe('websocket frames', () => {
  test.each([
    [125, 2, 125],
    [126, 4, 126],
    [65535, 4, 126],
    [65536, 10, 127],
  ])('a %i byte payload gets a %i byte header', (size, headerLength, marker) => {
    const frame = encodeFrame(new BinaryFrame(Buffer.alloc(size)));

    expect(frame.length).toBe(size + headerLength);
    expect(frame[0]).toBe(0x82);
    expect(frame[1]).toBe(marker);
    if (headerLength === 4) expect(frame.readUInt16BE(2)).toBe(size);
    if (headerLength === 10) expect(frame.readBigUInt64BE(2)).toBe(BigInt(size));
  });

  test('text frames carry UTF-8', () => {
    expect([...encodeFrame(new TextFrame('é'))]).toEqual([0x81, 0x02, 0xc3, 0xa9]);
  });
});

describe('compression', () => {
  test.each([true, { codec: 'gzip' as const }])('restores what %p compressed', async (setting) => {
    const input = Buffer.from('abcabcabcabcabcabcabcabc');

    const packed = await compress(input, setting);

    expect(Buffer.from(packed).equals(input)).toBe(false);
    expect(Buffer.from(decompress(packed, setting)).toString()).toBe('abcabcabcabcabcabcabcabc');
  });

  test('passes data through when disabled', async () => {
    const input = Buffer.from('raw');

    expect(await compress(input, false)).toBe(input);
  });
});

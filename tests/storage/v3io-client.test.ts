import {
  FetchFn,
  V3ioStoreClient,
  decodeWireValue,
  encodeWireValue,
} from '../../src/storage/v3io-client';
import { BackendError, NotFoundError } from '../../src/domain/errors';

interface RecordedCall {
  url: string;
  init: RequestInit;
}

/** Replays canned responses in order and records every request. */
function fakeFetch(responses: Response[]): { calls: RecordedCall[]; fetchFn: FetchFn } {
  const calls: RecordedCall[] = [];
  const fetchFn: FetchFn = async (input, init) => {
    calls.push({ url: String(input), init: init ?? {} });
    const next = responses.shift();
    if (!next) throw new Error('No canned response left');
    return next;
  };
  return { calls, fetchFn };
}

function header(call: RecordedCall, name: string): string | null {
  return new Headers(call.init.headers).get(name);
}

function jsonBody(call: RecordedCall): unknown {
  if (typeof call.init.body !== 'string') throw new Error('Expected a JSON request body');
  return JSON.parse(call.init.body);
}

function json(value: unknown, status = 200): Response {
  return new Response(JSON.stringify(value), { status });
}

function client(fetchFn: FetchFn, withAccessKey = true): V3ioStoreClient {
  return new V3ioStoreClient({
    endpoint: 'http://webapi:8081/',
    container: 'users',
    accessKey: withAccessKey ? 'test-secret' : undefined,
    pageLimit: 2,
    fetchFn,
  });
}

describe('Wire values', () => {
  test('encodes each attribute kind', () => {
    expect(encodeWireValue('text')).toEqual({ S: 'text' });
    expect(encodeWireValue(2)).toEqual({ N: '2' });
    expect(encodeWireValue(0.5)).toEqual({ N: '0.5' });
    expect(encodeWireValue(1710496800000000000n)).toEqual({ N: '1710496800000000000' });
    expect(encodeWireValue(true)).toEqual({ BOOL: true });
    expect(encodeWireValue(Buffer.from('hi'))).toEqual({ B: 'aGk=' });
  });

  test('decodes each attribute kind', () => {
    expect(decodeWireValue({ S: 'text' })).toBe('text');
    expect(decodeWireValue({ N: '42' })).toBe(42);
    expect(decodeWireValue({ N: '-0.25' })).toBe(-0.25);
    expect(decodeWireValue({ N: '1710496800000000000' })).toBe(1710496800000000000n);
    expect(decodeWireValue({ BOOL: false })).toBe(false);
    expect(decodeWireValue({ B: 'aGk=' })).toEqual(Buffer.from('hi'));
  });

  test('ignores values it does not understand', () => {
    expect(decodeWireValue({ N: 'abc' })).toBeUndefined();
    expect(decodeWireValue({ SS: ['a'] })).toBeUndefined();
    expect(decodeWireValue('raw')).toBeUndefined();
  });
});

describe('V3ioStoreClient', () => {
  test('putObject writes the raw body under the container', async () => {
    const { calls, fetchFn } = fakeFetch([new Response('', { status: 200 })]);
    await client(fetchFn).putObject('/log/p-u1', Buffer.from('line one\n'));

    expect(calls).toHaveLength(1);
    expect(calls[0].url).toBe('http://webapi:8081/users/log/p-u1');
    expect(calls[0].init.method).toBe('PUT');
    expect(header(calls[0], 'X-v3io-session-key')).toBe('test-secret');
    expect(header(calls[0], 'X-v3io-function')).toBeNull();
    const sent = calls[0].init.body;
    expect(sent).toBeInstanceOf(Uint8Array);
    if (!(sent instanceof Uint8Array)) return;
    expect(Buffer.from(sent).toString()).toBe('line one\n');
  });

  test('getObject returns the response bytes', async () => {
    const { calls, fetchFn } = fakeFetch([new Response('stored', { status: 200 })]);
    const body = await client(fetchFn).getObject('/log/p-u1');

    expect(body.toString()).toBe('stored');
    expect(calls[0].init.method).toBe('GET');
  });

  test('omits the session key when none is configured', async () => {
    const { calls, fetchFn } = fakeFetch([new Response('', { status: 200 })]);
    await client(fetchFn, false).deleteObject('/run/p/u1');

    expect(calls[0].init.method).toBe('DELETE');
    expect(header(calls[0], 'X-v3io-session-key')).toBeNull();
  });

  test('getItem names the attributes and decodes the item', async () => {
    const { calls, fetchFn } = fakeFetch([
      json({ Item: { _data_: { B: Buffer.from('{"a":1}').toString('base64') }, status_lasttimeEpoch: { N: '1710496800000000000' } } }),
    ]);
    const item = await client(fetchFn).getItem('/run/p/u1', ['_data_', 'status_lasttimeEpoch']);

    expect(calls[0].init.method).toBe('PUT');
    expect(header(calls[0], 'X-v3io-function')).toBe('GetItem');
    expect(header(calls[0], 'Content-Type')).toBe('application/json');
    expect(jsonBody(calls[0])).toEqual({ AttributesToGet: '_data_,status_lasttimeEpoch' });
    expect(item.getFieldBytes('_data_')?.toString()).toBe('{"a":1}');
    expect(item.getFieldInt('status_lasttimeEpoch')).toBe(1710496800000000000n);
  });

  test('putItem sends the whole item typed', async () => {
    const { calls, fetchFn } = fakeFetch([new Response('', { status: 200 })]);
    await client(fetchFn).putItem('/run/p/u1', {
      metadata_name: 'train',
      metadata_iteration: 2,
      status_lasttimeEpoch: 1710496800000000000n,
      done: true,
      _data_: Buffer.from('{}'),
    });

    expect(calls[0].url).toBe('http://webapi:8081/users/run/p/u1');
    expect(calls[0].init.method).toBe('PUT');
    expect(header(calls[0], 'X-v3io-function')).toBe('PutItem');
    expect(jsonBody(calls[0])).toEqual({
      Item: {
        metadata_name: { S: 'train' },
        metadata_iteration: { N: '2' },
        status_lasttimeEpoch: { N: '1710496800000000000' },
        done: { BOOL: true },
        _data_: { B: 'e30=' },
      },
    });
  });

  test('updateItem upserts the named attributes', async () => {
    const { calls, fetchFn } = fakeFetch([new Response('', { status: 200 })]);
    await client(fetchFn).updateItem('/run/p/u1', { status_state: 'completed' });

    expect(calls[0].init.method).toBe('POST');
    expect(header(calls[0], 'X-v3io-function')).toBe('UpdateItem');
    expect(jsonBody(calls[0])).toEqual({
      UpdateMode: 'CreateOrReplaceAttributes',
      Item: { status_state: { S: 'completed' } },
    });
  });

  test('query follows markers until the last page', async () => {
    const { calls, fetchFn } = fakeFetch([
      json({ Items: [{ __name: { S: 'u1' } }, { __name: { S: 'u2' } }], NextMarker: 'm1', LastItemIncluded: 'FALSE' }),
      json({ Items: [{ __name: { S: 'u3' } }], LastItemIncluded: 'TRUE' }),
    ]);
    const cursor = await client(fetchFn).query({
      path: '/run/p/',
      attributeNames: ['__name'],
      filter: "status_state == 'completed'",
    });
    const items = await cursor.all();

    expect(items.map((item) => item.getFieldString('__name'))).toEqual(['u1', 'u2', 'u3']);
    expect(calls).toHaveLength(2);
    expect(calls[0].url).toBe('http://webapi:8081/users/run/p/');
    expect(header(calls[0], 'X-v3io-function')).toBe('GetItems');
    expect(jsonBody(calls[0])).toEqual({
      AttributesToGet: '__name',
      Limit: 2,
      Filter: "status_state == 'completed'",
    });
    expect(jsonBody(calls[1])).toEqual({
      AttributesToGet: '__name',
      Limit: 2,
      Filter: "status_state == 'completed'",
      Marker: 'm1',
    });
  });

  test('query without a filter sends none', async () => {
    const { calls, fetchFn } = fakeFetch([json({ Items: [], LastItemIncluded: 'TRUE' })]);
    const cursor = await client(fetchFn).query({ path: '/artifact/p/', attributeNames: ['*'] });

    expect(await cursor.all()).toEqual([]);
    expect(jsonBody(calls[0])).toEqual({ AttributesToGet: '*', Limit: 2 });
  });

  test('a 404 is NotFoundError', async () => {
    const { fetchFn } = fakeFetch([new Response('no such path', { status: 404 })]);
    await expect(client(fetchFn).getObject('/log/p-missing')).rejects.toBeInstanceOf(NotFoundError);
  });

  test('other failures keep the backend status', async () => {
    const { fetchFn } = fakeFetch([new Response('busy', { status: 503 })]);
    const error = await client(fetchFn).getItem('/run/p/u1', ['_data_']).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(BackendError);
    if (!(error instanceof BackendError)) return;
    expect(error.statusCode).toBe(503);
    expect(error.message).toBe('GetItem /run/p/u1 failed with status 503: busy');
    expect(error.typedError.retryable).toBe(true);
  });

  test('masks the session key in backend messages', async () => {
    const { fetchFn } = fakeFetch([new Response('session key test-secret denied', { status: 403 })]);
    const error = await client(fetchFn).getItem('/run/p/u1', ['_data_']).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(BackendError);
    if (!(error instanceof BackendError)) return;
    expect(error.message).toBe('GetItem /run/p/u1 failed with status 403: session key *******cret denied');
  });

  test('a non-JSON item response is a 502', async () => {
    const { fetchFn } = fakeFetch([new Response('<html>', { status: 200 })]);
    const error = await client(fetchFn).getItem('/run/p/u1', ['_data_']).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(BackendError);
    if (!(error instanceof BackendError)) return;
    expect(error.statusCode).toBe(502);
  });

  test('network failures propagate unchanged', async () => {
    const failure = new TypeError('fetch failed');
    const fetchFn: FetchFn = async () => {
      throw failure;
    };
    await expect(client(fetchFn).getObject('/log/p-u1')).rejects.toBe(failure);
  });
});

/**
 * Transport invoker tests against stubbed fetch functions: request encoding,
 * status and decode failures, and cancellation.
 */

import { describe, it, expect, vi } from 'vitest';
import { Endpoint, createCursorId, createTransactionId } from '@remote-kv/shared-types';
import { resolveClientConfig } from '../config.js';
import {
  CancelledError,
  ClientClosedError,
  ConfigError,
  DomainError,
  HttpStatusError,
  NetworkError,
  ProtocolError,
  TimeoutError,
} from '../errors.js';
import { MemorySink, createLogger } from '../logging.js';
import { HttpInvoker } from '../transport.js';
import type { FetchLike } from '../types.js';

const TX = createTransactionId('t1');

function reply(body: string, status = 200): Response {
  return new Response(body, { status, headers: { 'content-type': 'application/json' } });
}

function stubFetch(body: string, status = 200) {
  return vi.fn<FetchLike>(async () => reply(body, status));
}

/** Settles only when the request's signal aborts. */
const hangingFetch: FetchLike = (_url, init) =>
  new Promise<Response>((_resolve, reject) => {
    init.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
  });

function createInvoker(fetch: FetchLike, sink = new MemorySink(), token?: string): HttpInvoker {
  return new HttpInvoker(
    resolveClientConfig({
      url: 'http://kv.test/db',
      token,
      fetch,
      logger: createLogger({ level: 'debug', sink }),
    })
  );
}

describe('HttpInvoker request encoding', () => {
  it('POSTs the JSON body to the base path plus the operation path', async () => {
    const fetch = stubFetch('{"Error":"","Value":"aGk="}');
    const invoker = createInvoker(fetch, new MemorySink(), 'test-secret');

    const result = await invoker.invoke(Endpoint.TX_GET, { Transaction: TX, Key: 'aw==' });

    expect(result).toEqual({ Error: '', Value: new Uint8Array([104, 105]) });
    expect(fetch).toHaveBeenCalledTimes(1);
    const [url, init] = fetch.mock.calls[0];
    expect(url).toBe('http://kv.test/db/tx/get');
    expect(init.method).toBe('POST');
    expect(init.body).toBe('{"Transaction":"t1","Key":"aw=="}');
    expect(init.headers).toEqual({
      authorization: 'Bearer test-secret',
      'content-type': 'application/json',
      accept: 'application/json',
    });
  });

  it('treats a null error and missing byte fields as empty', async () => {
    const invoker = createInvoker(stubFetch('{"Error":null,"Key":null}'));

    const result = await invoker.invoke(Endpoint.ITERATOR_NEXT, { Iterator: createCursorId('c1') });

    expect(result.Error).toBe('');
    expect(result.Key).toEqual(new Uint8Array(0));
    expect(result.Value).toEqual(new Uint8Array(0));
  });
});

describe('HttpInvoker failures', () => {
  it('raises HttpStatusError for a non-2xx status', async () => {
    const invoker = createInvoker(stubFetch('oops', 500));

    const error = await invoker.invoke(Endpoint.TX_COMMIT, { Transaction: TX }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HttpStatusError);
    expect(error).toMatchObject({
      status: 500,
      message: 'received non-ok http status 500 from http://kv.test/db/tx/commit',
      context: { path: '/tx/commit' },
    });
  });

  it('cancels the body of a non-2xx reply', async () => {
    let cancelled = false;
    const body = new ReadableStream<Uint8Array>({
      cancel() {
        cancelled = true;
      },
    });
    const invoker = createInvoker(vi.fn<FetchLike>(async () => new Response(body, { status: 500 })));

    const error = await invoker.invoke(Endpoint.TX_COMMIT, { Transaction: TX }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HttpStatusError);
    expect(cancelled).toBe(true);
  });

  it('still raises HttpStatusError when cancelling the body fails', async () => {
    const sink = new MemorySink();
    const body = new ReadableStream<Uint8Array>({
      cancel() {
        throw new Error('stream broken');
      },
    });
    const invoker = createInvoker(vi.fn<FetchLike>(async () => new Response(body, { status: 502 })), sink);

    const error = await invoker.invoke(Endpoint.TX_COMMIT, { Transaction: TX }).catch((e: unknown) => e);

    expect(error).toMatchObject({ status: 502 });
    expect(sink.entries.find((entry) => entry.message === 'reply body cancel failed')?.context).toMatchObject({
      path: '/tx/commit',
      reason: 'stream broken',
    });
  });

  it('raises ProtocolError for a body that is not JSON', async () => {
    const invoker = createInvoker(stubFetch('not json'));

    const error = await invoker.invoke(Endpoint.TX_COMMIT, { Transaction: TX }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProtocolError);
    expect(error).toMatchObject({ message: 'invalid JSON in reply from /tx/commit', rawBody: 'not json' });
  });

  it('raises ProtocolError for a reply of the wrong shape', async () => {
    const invoker = createInvoker(stubFetch('{"Error":"","Value":"***"}'));

    await expect(invoker.invoke(Endpoint.TX_GET, { Transaction: TX, Key: '' })).rejects.toThrow(
      'unexpected reply from /tx/get: Value: Expected standard base64'
    );
  });

  it('raises DomainError for a reply with an error text', async () => {
    const invoker = createInvoker(stubFetch('{"Error":"unknown transaction id \\"t1\\""}'));

    const error = await invoker
      .invoke(Endpoint.TX_COMMIT, { Transaction: TX }, {}, { sessionId: TX })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DomainError);
    expect(error).toMatchObject({
      message: 'unknown transaction id "t1"',
      kind: 'unknown-session',
      context: { path: '/tx/commit', sessionId: 't1' },
    });
  });

  it('raises NetworkError when fetch rejects', async () => {
    const invoker = createInvoker(vi.fn<FetchLike>().mockRejectedValue(new TypeError('fetch failed')));

    await expect(invoker.invoke(Endpoint.TX_COMMIT, { Transaction: TX })).rejects.toThrow(
      new NetworkError('request to http://kv.test/db/tx/commit failed: fetch failed')
    );
  });

  it('raises TimeoutError when the call outlives its timeout', async () => {
    const invoker = createInvoker(hangingFetch);

    const error = await invoker
      .invoke(Endpoint.TX_COMMIT, { Transaction: TX }, { timeout: 20 })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toMatchObject({ message: 'request timeout after 20ms', timeoutMs: 20 });
  });

  it('rejects an invalid per-call timeout before sending', async () => {
    const fetch = stubFetch('{"Error":""}');
    const invoker = createInvoker(fetch);

    await expect(invoker.invoke(Endpoint.TX_COMMIT, { Transaction: TX }, { timeout: -1 })).rejects.toBeInstanceOf(
      ConfigError
    );
    expect(fetch).not.toHaveBeenCalled();
  });
});

describe('HttpInvoker cancellation', () => {
  it('raises CancelledError when the signal aborts mid-call', async () => {
    const invoker = createInvoker(hangingFetch);
    const controller = new AbortController();

    const pending = invoker.invoke(Endpoint.TX_COMMIT, { Transaction: TX }, { signal: controller.signal });
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });

  it('does not send when the signal is already aborted', async () => {
    const fetch = stubFetch('{"Error":""}');
    const invoker = createInvoker(fetch);
    const controller = new AbortController();
    controller.abort();

    await expect(
      invoker.invoke(Endpoint.TX_COMMIT, { Transaction: TX }, { signal: controller.signal })
    ).rejects.toBeInstanceOf(CancelledError);
    expect(fetch).not.toHaveBeenCalled();
  });

  it('refuses calls after close', async () => {
    const fetch = stubFetch('{"Error":""}');
    const invoker = createInvoker(fetch);
    invoker.close();

    await expect(invoker.invoke(Endpoint.TX_COMMIT, { Transaction: TX })).rejects.toThrow(ClientClosedError);
    expect(invoker.isClosed).toBe(true);
    expect(fetch).not.toHaveBeenCalled();
  });
});

describe('HttpInvoker logging', () => {
  it('logs each call at debug with its path and outcome', async () => {
    const sink = new MemorySink();
    const invoker = createInvoker(stubFetch('{"Error":"file does not exist"}'), sink);

    await invoker.invoke(Endpoint.TX_COMMIT, { Transaction: TX }).catch(() => undefined);

    expect(sink.entries).toHaveLength(1);
    expect(sink.entries[0]).toMatchObject({
      level: 'debug',
      message: 'kv call failed',
      context: { component: 'transport', path: '/tx/commit', code: 'NOT_FOUND' },
    });
  });
});

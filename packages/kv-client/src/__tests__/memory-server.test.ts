/**
 * The in-process server's own wire behaviour, exercised with raw requests.
 */

import { describe, it, expect } from 'vitest';
import { createMemoryServer } from '../testing/index.js';

async function post(
  server: ReturnType<typeof createMemoryServer>,
  path: string,
  body: unknown,
  method = 'POST'
): Promise<{ status: number; text: string }> {
  const response = await server.fetch(`http://kv.test/db${path}`, {
    method,
    body: typeof body === 'string' ? body : JSON.stringify(body),
  });
  return { status: response.status, text: await response.text() };
}

describe('MemoryServer', () => {
  it('strips its base path before routing', async () => {
    const server = createMemoryServer({ basePath: '/db/' });

    expect(await post(server, '/new-snapshot', { Name: 's1' })).toEqual({ status: 200, text: '{"Error":""}' });
    expect(server.requests[0].path).toBe('/new-snapshot');
  });

  it('answers unknown paths with 404 and other methods with 405', async () => {
    const server = createMemoryServer({ basePath: '/db' });

    expect((await post(server, '/tx/merge', {})).status).toBe(404);
    expect((await post(server, '/tx/get', {}, 'PUT')).status).toBe(405);
  });

  it('answers malformed bodies with 400', async () => {
    const server = createMemoryServer({ basePath: '/db' });

    expect(await post(server, '/new-transaction', '{')).toMatchObject({ status: 400 });
    expect(await post(server, '/new-transaction', '[1]')).toEqual({
      status: 400,
      text: 'request body must be a JSON object',
    });
    expect(await post(server, '/new-transaction', { Name: 7 })).toEqual({
      status: 400,
      text: 'field Name must be a string',
    });
  });

  it('rejects byte fields that are not base64', async () => {
    const server = createMemoryServer({ basePath: '/db' });
    await post(server, '/new-snapshot', { Name: 's1' });

    expect(await post(server, '/snap/get', { Snapshot: 's1', Key: '%%' })).toEqual({
      status: 400,
      text: 'field Key must be base64',
    });
  });

  it('returns null key and value at the end of a cursor', async () => {
    const server = createMemoryServer({ basePath: '/db' });
    server.seed({ a: '1' });
    await post(server, '/new-snapshot', { Name: 's1' });
    await post(server, '/snap/scan', { Snapshot: 's1', Name: 'c1' });

    expect((await post(server, '/it/next', { Iterator: 'c1' })).text).toBe('{"Error":"","Key":"YQ==","Value":"MQ=="}');
    expect((await post(server, '/it/next', { Iterator: 'c1' })).text).toBe('{"Error":"","Key":null,"Value":null}');
  });

  it('reports unknown iterators in the reply', async () => {
    const server = createMemoryServer({ basePath: '/db' });

    expect((await post(server, '/it/next', { Iterator: 'nope' })).text).toBe(
      '{"Error":"unknown iterator id \\"nope\\"","Key":null,"Value":null}'
    );
  });

  it('keeps abandoned cursors until the server reclaims them', async () => {
    const server = createMemoryServer({ basePath: '/db' });
    await post(server, '/new-snapshot', { Name: 's1' });
    await post(server, '/snap/scan', { Snapshot: 's1', Name: 'c1' });

    expect(server.openCursors).toBe(1);
    expect((await post(server, '/snap/scan', { Snapshot: 's1', Name: 'c1' })).text).toBe(
      '{"Error":"iterator name \\"c1\\" already exists"}'
    );
  });

  it('drops the cursors of a session once it ends', async () => {
    const server = createMemoryServer({ basePath: '/db' });
    await post(server, '/new-transaction', { Name: 't1' });
    await post(server, '/new-snapshot', { Name: 's1' });
    await post(server, '/tx/scan', { Transaction: 't1', Name: 'c1' });
    await post(server, '/snap/scan', { Snapshot: 's1', Name: 'c2' });
    expect(server.openCursors).toBe(2);

    await post(server, '/tx/commit', { Transaction: 't1' });
    expect(server.openCursors).toBe(1);
    expect((await post(server, '/it/next', { Iterator: 'c1' })).text).toBe(
      '{"Error":"unknown iterator id \\"c1\\"","Key":null,"Value":null}'
    );

    await post(server, '/snap/discard', { Snapshot: 's1' });
    expect(server.openCursors).toBe(0);
  });

  it('replays injected replies in order', async () => {
    const server = createMemoryServer();
    server.replyNext('not json');
    server.failNext(418, 'teapot');

    const first = await server.fetch('http://kv.test/new-snapshot', { method: 'POST', body: '{}' });
    const second = await server.fetch('http://kv.test/new-snapshot', { method: 'POST', body: '{}' });

    expect([first.status, await first.text()]).toEqual([200, 'not json']);
    expect([second.status, await second.text()]).toEqual([418, 'teapot']);
  });

  it('fails the request at the network level when disconnected', async () => {
    const server = createMemoryServer();
    server.disconnectNext();

    await expect(server.fetch('http://kv.test/new-snapshot', { method: 'POST', body: '{}' })).rejects.toThrow(
      'fetch failed'
    );
  });
});

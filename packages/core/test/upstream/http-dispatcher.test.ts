import { describe, expect, test } from 'vitest';
import { UpstreamError } from '../../src/errors';
import { createFetchTransport } from '../../src/runtime/fetch-transport';
import type { Transport } from '../../src/runtime/types';
import type { HttpEndpoint } from '../../src/types';
import { HttpDispatcher } from '../../src/upstream/http-dispatcher';
import { jsonResponse } from '../utils/streams';

type Call = { url: string; method: string | undefined; headers: Headers; body: unknown; signal?: AbortSignal };

function recordingTransport(answer: () => Response | Promise<Response> = () => jsonResponse({})) {
  const calls: Call[] = [];
  const transport: Transport = {
    async fetch(url, init, ctx) {
      const call: Call = { url, method: init.method, headers: new Headers(init.headers), body: init.body };
      if (ctx.signal) call.signal = ctx.signal;
      calls.push(call);
      return await answer();
    }
  };
  return { transport, calls };
}

const endpoint: HttpEndpoint = {
  name: 'remote',
  transport: 'http',
  url: 'http://upstream.test/mcp',
  headers: { authorization: 'Bearer test-token' }
};

describe('HttpDispatcher', () => {
  test('POSTs payloads with session headers', async () => {
    const { transport, calls } = recordingTransport();
    const dispatcher = new HttpDispatcher(endpoint, { transport });

    await dispatcher.send(
      { jsonrpc: '2.0', id: 1, method: 'tools/list' },
      { upstreamSessionId: 'up-1', protocolVersion: '2025-03-26' }
    );

    const [call] = calls;
    expect(call?.url).toBe('http://upstream.test/mcp');
    expect(call?.method).toBe('POST');
    expect(call?.body).toBe('{"jsonrpc":"2.0","id":1,"method":"tools/list"}');
    expect(Object.fromEntries(call?.headers ?? [])).toEqual({
      accept: 'application/json, text/event-stream',
      authorization: 'Bearer test-token',
      'content-type': 'application/json',
      'mcp-protocol-version': '2025-03-26',
      'mcp-session-id': 'up-1'
    });
  });

  test('GETs the server stream with the resumption marker', async () => {
    const { transport, calls } = recordingTransport();
    const dispatcher = new HttpDispatcher(endpoint, { transport });
    const controller = new AbortController();

    await dispatcher.openStream({ lastEventId: '42', signal: controller.signal });

    expect(calls[0]?.method).toBe('GET');
    expect(calls[0]?.headers.get('accept')).toBe('text/event-stream');
    expect(calls[0]?.headers.get('last-event-id')).toBe('42');
    expect(calls[0]?.signal).toBe(controller.signal);
  });

  test('only DELETEs when the upstream asserted a session', async () => {
    const { transport, calls } = recordingTransport(() => new Response(null, { status: 405 }));
    const dispatcher = new HttpDispatcher(endpoint, { transport });

    await dispatcher.terminate({});
    await dispatcher.terminate({ upstreamSessionId: 'up-1' });

    expect(calls.map((call) => call.method)).toEqual(['DELETE']);
  });

  test('reports a refused termination', async () => {
    const { transport } = recordingTransport(() => new Response(null, { status: 500 }));
    const dispatcher = new HttpDispatcher(endpoint, { transport });

    await expect(dispatcher.terminate({ upstreamSessionId: 'up-1' })).rejects.toMatchObject({
      name: 'UpstreamError',
      status: 500
    });
  });

  test('wraps network failures', async () => {
    const { transport } = recordingTransport(() => {
      throw new TypeError('fetch failed');
    });
    const dispatcher = new HttpDispatcher(endpoint, { transport });

    const attempt = dispatcher.send({ jsonrpc: '2.0', method: 'ping' }, {});
    await expect(attempt).rejects.toBeInstanceOf(UpstreamError);
    await expect(attempt).rejects.toThrow('Upstream remote unreachable: fetch failed');
  });
});

describe('createFetchTransport', () => {
  test('passes the context signal to fetch', async () => {
    const seen: Array<RequestInit | undefined> = [];
    const transport = createFetchTransport(async (_input, init) => {
      seen.push(init);
      return new Response('ok');
    });
    const controller = new AbortController();

    await transport.fetch('http://upstream.test', { method: 'GET' }, { signal: controller.signal });
    await transport.fetch('http://upstream.test', { method: 'GET' }, {});

    expect(seen[0]?.signal).toBe(controller.signal);
    expect(seen[1]).toEqual({ method: 'GET' });
  });
});

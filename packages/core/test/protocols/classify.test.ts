import { describe, expect, test } from 'vitest';
import { BodyAlreadyConsumedError } from '../../src/errors';
import { classifyResponse, describeResponse } from '../../src/protocols/classify';
import { jsonResponse, sseResponse } from '../utils/streams';

describe('classifyResponse', () => {
  test('json reply is buffered', () => {
    const classified = classifyResponse(jsonResponse({ jsonrpc: '2.0', id: 1, result: {} }));
    expect(classified.strategy).toBe('buffer');
    expect(classified.meta.category).toBe('single-reply');
  });

  test('event stream with a charset parameter is streamed', () => {
    const response = new Response('', { headers: { 'content-type': 'text/event-stream; charset=utf-8' } });
    expect(classifyResponse(response).strategy).toBe('stream');
  });

  test('zero-length event stream is still a stream', () => {
    const response = new Response(null, {
      headers: { 'content-type': 'text/event-stream', 'content-length': '0' }
    });
    const classified = classifyResponse(response);
    expect(classified.strategy).toBe('stream');
    expect(classified.meta.contentLength).toBe(0);
    expect(classified.meta.indeterminateLength).toBe(false);
  });

  test('missing or unknown content type passes through', () => {
    expect(classifyResponse(new Response(null, { status: 204 })).strategy).toBe('passthrough');
    const html = new Response('<p>hi</p>', { headers: { 'content-type': 'text/html' } });
    expect(classifyResponse(html).strategy).toBe('passthrough');
    const broken = new Response('x', { headers: { 'content-type': 'application/' } });
    expect(classifyResponse(broken).strategy).toBe('passthrough');
  });

  test('classification does not read the body', () => {
    const response = sseResponse(['data: a\n\n']);
    classifyResponse(response);
    expect(response.bodyUsed).toBe(false);
  });

  test('body can be taken once', () => {
    const classified = classifyResponse(sseResponse(['data: a\n\n']));
    expect(classified.body.consumed).toBe(false);
    expect(classified.body.take()).not.toBeNull();
    expect(classified.body.consumed).toBe(true);
    expect(() => classified.body.take()).toThrow(BodyAlreadyConsumedError);
  });

  test('discard after take is a no-op', async () => {
    const classified = classifyResponse(sseResponse(['data: a\n\n']));
    classified.body.take();
    await expect(classified.body.discard()).resolves.toBeUndefined();
  });
});

describe('describeResponse', () => {
  test('captures status, length and upstream session id', () => {
    const meta = describeResponse(
      jsonResponse({}, { status: 201, headers: { 'content-length': '2', 'mcp-session-id': ' up-1 ' } })
    );
    expect(meta).toEqual({
      status: 201,
      category: 'single-reply',
      mediaType: { type: 'application', subtype: 'json', essence: 'application/json', parameters: {} },
      contentLength: 2,
      indeterminateLength: false,
      sessionId: 'up-1'
    });
  });

  test('non-numeric content length counts as indeterminate', () => {
    const meta = describeResponse(jsonResponse({}, { headers: { 'content-length': 'abc' } }));
    expect(meta.contentLength).toBeUndefined();
    expect(meta.indeterminateLength).toBe(true);
  });
});

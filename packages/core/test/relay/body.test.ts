import { describe, expect, test } from 'vitest';
import { ReplyTooLargeError } from '../../src/errors';
import { classifyResponse } from '../../src/protocols/classify';
import { readBoundedText } from '../../src/relay/body';
import { chunkedStream, controlledStream } from '../utils/streams';

function reply(body: ReadableStream<Uint8Array> | string | null, headers: Record<string, string> = {}) {
  return classifyResponse(new Response(body, { headers: { 'content-type': 'application/json', ...headers } }));
}

describe('readBoundedText', () => {
  test('joins chunks into one string', async () => {
    const classified = reply(chunkedStream(['{"jsonrpc":', '"2.0"}']));
    expect(await readBoundedText(classified, 1024)).toBe('{"jsonrpc":"2.0"}');
  });

  test('decodes multi-byte characters split across chunks', async () => {
    const bytes = new TextEncoder().encode('"héllo"');
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.enqueue(bytes.slice(0, 3));
        controller.enqueue(bytes.slice(3));
        controller.close();
      }
    });
    expect(await readBoundedText(reply(body), 1024)).toBe('"héllo"');
  });

  test('returns an empty string for a missing body', async () => {
    expect(await readBoundedText(reply(null), 10)).toBe('');
  });

  test('rejects a declared length over the limit without reading', async () => {
    const upstream = controlledStream();
    const classified = reply(upstream.stream, { 'content-length': '2048' });

    await expect(readBoundedText(classified, 1024)).rejects.toThrow(
      new ReplyTooLargeError(1024, 2048).message
    );
    await upstream.cancelled;
    expect(classified.body.consumed).toBe(true);
  });

  test('stops reading once an undeclared body crosses the limit', async () => {
    const classified = reply(chunkedStream(['12345', '67890', 'never read']));
    await expect(readBoundedText(classified, 8)).rejects.toThrow('Upstream reply exceeds limit of 8 bytes');
  });
});

import { describe, expect, test } from 'vitest';
import { formatSseComment, formatSseEvent, parseSseStream, SseParser } from '../../src/protocols/sse';
import { chunkedStream, collect } from '../utils/streams';

describe('SseParser', () => {
  test('parses a complete record', () => {
    const parser = new SseParser();
    const { events } = parser.push('id: 1\nevent: message\ndata: {"a":1}\nretry: 500\n\n');
    expect(events).toEqual([{ id: '1', event: 'message', data: '{"a":1}', retry: 500 }]);
  });

  test('joins multi-line data with newlines', () => {
    const parser = new SseParser();
    const { events } = parser.push('data: first\ndata: second\n\n');
    expect(events).toEqual([{ data: 'first\nsecond' }]);
  });

  test('handles records split across chunks, including CRLF at a chunk edge', () => {
    const parser = new SseParser();
    expect(parser.push('id: 7\r').events).toEqual([]);
    expect(parser.push('\ndata: he').events).toEqual([]);
    expect(parser.hasPartialRecord).toBe(true);
    expect(parser.push('llo\r\n\r\n').events).toEqual([{ id: '7', data: 'hello' }]);
    expect(parser.hasPartialRecord).toBe(false);
  });

  test('decodes multi-byte characters split across byte chunks', () => {
    const parser = new SseParser();
    const bytes = new TextEncoder().encode('data: é\n\n');
    const events = [...parser.push(bytes.slice(0, 7)).events, ...parser.push(bytes.slice(7)).events];
    expect(events).toEqual([{ data: 'é' }]);
  });

  test('counts comments and ignores them', () => {
    const parser = new SseParser();
    const result = parser.push(': keep-alive\n\ndata: x\n\n');
    expect(result.comments).toBe(1);
    expect(result.events).toEqual([{ data: 'x' }]);
  });

  test('drops malformed records whole and counts them', () => {
    const parser = new SseParser();
    const { events } = parser.push('id: 1\nbogus: y\ndata: lost\n\nretry: soon\ndata: lost\n\ndata: kept\n\n');
    expect(events).toEqual([{ data: 'kept' }]);
    expect(parser.skipped).toBe(2);
  });

  test('dispatches a named event without data', () => {
    const parser = new SseParser();
    expect(parser.push('event: close\n\n').events).toEqual([{ event: 'close', data: '' }]);
  });

  test('dispatches a record carrying only an id as a position update', () => {
    const parser = new SseParser();
    expect(parser.push('id: 3\n\n').events).toEqual([{ id: '3', data: '' }]);
    expect(parser.skipped).toBe(0);
  });

  test('skips a record with neither data, event nor id', () => {
    const parser = new SseParser();
    expect(parser.push('retry: 10\nid:\n\n').events).toEqual([]);
    expect(parser.skipped).toBe(0);
  });

  test('end reports a record cut off mid-way', () => {
    const parser = new SseParser();
    parser.push('id: 2\ndata: {"partial"');
    expect(parser.end()).toEqual({ partial: true });

    const clean = new SseParser();
    clean.push('data: done\n\n');
    expect(clean.end()).toEqual({ partial: false });
  });
});

describe('parseSseStream', () => {
  test('yields every complete record of a body', async () => {
    const events = await collect(parseSseStream(chunkedStream(['id: 1\ndata: a\n', '\nid: 2\nda', 'ta: b\n\n'])));
    expect(events).toEqual([
      { id: '1', data: 'a' },
      { id: '2', data: 'b' }
    ]);
  });
});

describe('formatSseEvent', () => {
  test('writes every field and splits data lines', () => {
    expect(formatSseEvent({ id: '4', event: 'message', retry: 100, data: 'a\nb' })).toBe(
      'event: message\nid: 4\nretry: 100\ndata: a\ndata: b\n\n'
    );
  });

  test('formatted output parses back to the same event', () => {
    const parser = new SseParser();
    const event = { id: '9', data: '{"jsonrpc":"2.0","method":"ping"}' };
    expect(parser.push(formatSseEvent(event)).events).toEqual([event]);
  });

  test('formats comments', () => {
    expect(formatSseComment('ping')).toBe(': ping\n\n');
  });
});

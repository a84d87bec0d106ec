import { describe, expect, test } from 'vitest';
import { accepts, isEventStream, isJson, parseMediaType } from '../../src/protocols/media-type';

describe('parseMediaType', () => {
  test('parses type, subtype and parameters', () => {
    const parsed = parseMediaType('text/event-stream; charset=utf-8');
    expect(parsed).toEqual({
      type: 'text',
      subtype: 'event-stream',
      essence: 'text/event-stream',
      parameters: { charset: 'utf-8' }
    });
  });

  test('lower-cases type and parameter names but keeps value case', () => {
    const parsed = parseMediaType('Text/Event-Stream ; Charset="UTF-8"');
    expect(parsed?.essence).toBe('text/event-stream');
    expect(parsed?.parameters).toEqual({ charset: 'UTF-8' });
  });

  test('unescapes quoted parameter values', () => {
    const parsed = parseMediaType('application/json; profile="a\\"b;c"');
    expect(parsed?.parameters['profile']).toBe('a"b;c');
  });

  test('records a structured syntax suffix', () => {
    expect(parseMediaType('application/vnd.api+json')?.suffix).toBe('json');
    expect(parseMediaType('application/json')?.suffix).toBeUndefined();
  });

  test('keeps the first occurrence of a repeated parameter', () => {
    expect(parseMediaType('text/plain; charset=ascii; charset=utf-8')?.parameters).toEqual({ charset: 'ascii' });
  });

  test.each([
    [undefined],
    [null],
    [''],
    ['json'],
    ['/json'],
    ['application/'],
    ['application/json; charset'],
    ['application/json; charset="utf-8'],
    ['text/event stream']
  ])('rejects malformed value %j', (header) => {
    expect(parseMediaType(header)).toBeUndefined();
  });
});

describe('isEventStream / isJson', () => {
  test('event stream matches on essence only', () => {
    expect(isEventStream(parseMediaType('text/event-stream;charset=utf-8'))).toBe(true);
    expect(isEventStream(parseMediaType('text/event-stream-ish'))).toBe(false);
    expect(isEventStream(undefined)).toBe(false);
  });

  test('json matches application/json and +json suffixes', () => {
    expect(isJson(parseMediaType('application/json; charset=utf-8'))).toBe(true);
    expect(isJson(parseMediaType('application/problem+json'))).toBe(true);
    expect(isJson(parseMediaType('text/json-ish'))).toBe(false);
    expect(isJson(undefined)).toBe(false);
  });
});

describe('accepts', () => {
  test('missing header accepts everything', () => {
    expect(accepts(undefined, 'text/event-stream')).toBe(true);
    expect(accepts('  ', 'text/event-stream')).toBe(true);
  });

  test('matches exact and wildcard ranges', () => {
    expect(accepts('application/json, text/event-stream', 'text/event-stream')).toBe(true);
    expect(accepts('text/*', 'text/event-stream')).toBe(true);
    expect(accepts('*/*', 'text/event-stream')).toBe(true);
    expect(accepts('application/json', 'text/event-stream')).toBe(false);
  });

  test('q=0 excludes a range', () => {
    expect(accepts('text/event-stream;q=0, application/json', 'text/event-stream')).toBe(false);
  });
});

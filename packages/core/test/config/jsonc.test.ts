import { describe, expect, test } from 'vitest';
import { parseJsonc, stripJsonComments } from '../../src/config';

describe('JSONC', () => {
  describe('stripJsonComments', () => {
    test('removes single-line comments and trims whitespace before them', () => {
      const input = `{
  "port": 4100 // listen here
}`;
      expect(stripJsonComments(input)).toBe(`{
  "port": 4100
}`);
    });

    test('preserves // inside strings', () => {
      const input = `{
  "url": "http://localhost:3000/mcp", // upstream
  "ok": true
}`;
      expect(stripJsonComments(input)).toBe(`{
  "url": "http://localhost:3000/mcp",
  "ok": true
}`);
    });

    test('keeps line breaks of block comments', () => {
      expect(stripJsonComments('{/* one\ntwo */"a":1}')).toBe('{\n"a":1}');
    });

    test('handles a comment at end of file without newline', () => {
      expect(stripJsonComments('{"a":1}// trailing')).toBe('{"a":1}');
    });

    test('leaves escaped quotes inside strings alone', () => {
      expect(stripJsonComments('{"a":"say \\"//hi\\""}')).toBe('{"a":"say \\"//hi\\""}');
    });
  });

  describe('parseJsonc', () => {
    test('parses comments and trailing commas', () => {
      const input = `{
  // upstreams
  "upstreams": [
    { "name": "local", "transport": "http", "url": "http://localhost:3000/mcp", },
  ],
}`;
      expect(parseJsonc(input)).toEqual({
        upstreams: [{ name: 'local', transport: 'http', url: 'http://localhost:3000/mcp' }]
      });
    });

    test('keeps commas inside strings', () => {
      expect(parseJsonc('{"a": "x, }"}')).toEqual({ a: 'x, }' });
    });

    test('reports invalid content as a SyntaxError', () => {
      expect(() => parseJsonc('{"a": }')).toThrow(SyntaxError);
      expect(() => parseJsonc('{"a": }')).toThrow(/^Invalid JSONC: /);
    });
  });
});

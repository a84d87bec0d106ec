/**
 * Media type parsing (`type/subtype; name=value; ...`).
 *
 * Content-type decisions go through here rather than substring checks:
 * `text/event-stream-ish` must not match `text/event-stream`, while
 * `Text/Event-Stream ; charset="utf-8"` must.
 */

export interface MediaType {
  type: string;
  subtype: string;
  /** Lower-cased `type/subtype` */
  essence: string;
  /** Structured syntax suffix, e.g. `json` for `application/vnd.api+json` */
  suffix?: string;
  /** Parameter names are lower-cased; values keep their case */
  parameters: Record<string, string>;
}

// RFC 7230 tchar
const TOKEN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;
const WHITESPACE = /[\t ]/;

function isToken(value: string): boolean {
  return TOKEN.test(value);
}

function skipWhitespace(input: string, index: number): number {
  let i = index;
  while (i < input.length && WHITESPACE.test(input.charAt(i))) i++;
  return i;
}

/**
 * Read a quoted-string starting at `index` (which must point at `"`).
 * Returns the unescaped value and the index after the closing quote,
 * or undefined when the string is unterminated.
 */
function readQuotedString(input: string, index: number): { value: string; next: number } | undefined {
  let value = '';
  let i = index + 1;
  while (i < input.length) {
    const char = input.charAt(i);
    if (char === '\\') {
      if (i + 1 >= input.length) return undefined;
      value += input.charAt(i + 1);
      i += 2;
      continue;
    }
    if (char === '"') {
      return { value, next: i + 1 };
    }
    value += char;
    i++;
  }
  return undefined;
}

/**
 * Parse a Content-Type / media-type header value.
 * Returns undefined when the value is absent or malformed.
 */
export function parseMediaType(header: string | null | undefined): MediaType | undefined {
  if (header === null || header === undefined) return undefined;

  const input = header.trim();
  const semicolon = input.indexOf(';');
  const head = (semicolon === -1 ? input : input.slice(0, semicolon)).trim();
  const slash = head.indexOf('/');
  if (slash <= 0 || slash === head.length - 1) return undefined;

  const type = head.slice(0, slash).toLowerCase();
  const subtype = head.slice(slash + 1).toLowerCase();
  if (!isToken(type) || !isToken(subtype)) return undefined;

  const parameters: Record<string, string> = {};
  let i = semicolon === -1 ? input.length : semicolon;

  while (i < input.length) {
    // At a ';'
    i = skipWhitespace(input, i + 1);
    if (i >= input.length) break;
    if (input.charAt(i) === ';') continue;

    const eq = input.indexOf('=', i);
    const nextSemicolon = input.indexOf(';', i);
    if (eq === -1 || (nextSemicolon !== -1 && nextSemicolon < eq)) {
      // Parameter without a value
      return undefined;
    }

    const name = input.slice(i, eq).trim().toLowerCase();
    if (!isToken(name)) return undefined;

    let value: string;
    i = eq + 1;
    if (input.charAt(i) === '"') {
      const quoted = readQuotedString(input, i);
      if (!quoted) return undefined;
      value = quoted.value;
      i = skipWhitespace(input, quoted.next);
      if (i < input.length && input.charAt(i) !== ';') return undefined;
    } else {
      const end = input.indexOf(';', i);
      value = (end === -1 ? input.slice(i) : input.slice(i, end)).trim();
      if (!isToken(value)) return undefined;
      i = end === -1 ? input.length : end;
    }

    // First occurrence wins
    if (!(name in parameters)) {
      parameters[name] = value;
    }
  }

  const plus = subtype.lastIndexOf('+');
  const mediaType: MediaType = {
    type,
    subtype,
    essence: `${type}/${subtype}`,
    parameters
  };
  if (plus > 0 && plus < subtype.length - 1) {
    mediaType.suffix = subtype.slice(plus + 1);
  }
  return mediaType;
}

export function isEventStream(mediaType: MediaType | undefined): boolean {
  return mediaType?.essence === 'text/event-stream';
}

export function isJson(mediaType: MediaType | undefined): boolean {
  if (!mediaType) return false;
  return mediaType.essence === 'application/json' || mediaType.suffix === 'json';
}

/**
 * Whether an Accept header admits the given essence (`*` ranges included).
 * A missing header accepts everything.
 */
export function accepts(acceptHeader: string | null | undefined, essence: string): boolean {
  if (acceptHeader === null || acceptHeader === undefined || acceptHeader.trim() === '') {
    return true;
  }
  const [wantedType] = essence.split('/');
  for (const range of acceptHeader.split(',')) {
    const parsed = parseMediaType(range);
    if (!parsed) {
      if (range.trim() === '*/*') return true;
      continue;
    }
    if (parsed.parameters['q'] === '0') continue;
    if (parsed.essence === essence) return true;
    if (parsed.essence === '*/*') return true;
    if (parsed.subtype === '*' && parsed.type === wantedType) return true;
  }
  return false;
}

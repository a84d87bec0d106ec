/**
 * JSONC (JSON with comments and trailing commas).
 *
 * Comments become whitespace (newlines kept so error positions still point at
 * the right line); a comma followed only by whitespace and a closing bracket
 * is dropped. String literals are copied verbatim, so `//` inside a URL stays.
 */

function skipString(content: string, start: number): number {
  let i = start + 1;
  while (i < content.length) {
    const char = content.charAt(i);
    if (char === '\\') {
      i += 2;
      continue;
    }
    i++;
    if (char === '"') break;
  }
  return i;
}

export function stripJsonComments(content: string): string {
  let out = '';
  let i = 0;

  while (i < content.length) {
    const char = content.charAt(i);
    const next = content.charAt(i + 1);

    if (char === '"') {
      const end = skipString(content, i);
      out += content.slice(i, end);
      i = end;
    } else if (char === '/' && next === '/') {
      out = out.replace(/[ \t]+$/, '');
      i += 2;
      while (i < content.length && content.charAt(i) !== '\n' && content.charAt(i) !== '\r') i++;
    } else if (char === '/' && next === '*') {
      const end = content.indexOf('*/', i + 2);
      const body = content.slice(i + 2, end === -1 ? content.length : end);
      out += body.replace(/[^\r\n]/g, '');
      i = end === -1 ? content.length : end + 2;
    } else {
      out += char;
      i++;
    }
  }

  return out;
}

function stripTrailingCommas(content: string): string {
  let out = '';
  let i = 0;

  while (i < content.length) {
    const char = content.charAt(i);
    if (char === '"') {
      const end = skipString(content, i);
      out += content.slice(i, end);
      i = end;
      continue;
    }
    if (char === ',') {
      let j = i + 1;
      while (j < content.length && /\s/.test(content.charAt(j))) j++;
      const closer = content.charAt(j);
      if (closer === '}' || closer === ']') {
        i++;
        continue;
      }
    }
    out += char;
    i++;
  }

  return out;
}

/**
 * Parse JSONC text.
 *
 * @throws {SyntaxError} if the content is not valid JSON once comments and
 * trailing commas are removed
 */
export function parseJsonc(content: string): unknown {
  const cleaned = stripTrailingCommas(stripJsonComments(content));
  try {
    return JSON.parse(cleaned);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new SyntaxError(`Invalid JSONC: ${err.message}`);
    }
    throw err;
  }
}

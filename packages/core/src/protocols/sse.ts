import type { StreamEvent } from '../types';

/**
 * Incremental event-stream parser.
 *
 * SSE format:
 *   event: <type>
 *   id: <id>
 *   data: <payload>
 *   retry: <ms>
 *   <blank line> (record boundary)
 *   : comment (keep-alive)
 *
 * Lines end in `\n`, `\r\n` or `\r`. One space after the colon is stripped.
 * Multi-line data fields are joined with `\n`.
 *
 * A record with an `id` and no data is dispatched with empty data and no
 * `event`; consumers treat it as a position update.
 *
 * A record carrying an unknown field, an `id` with NUL, or a non-numeric
 * `retry` is malformed: it is dropped whole and counted in `skipped`.
 */

const KNOWN_FIELDS = new Set(['id', 'event', 'data', 'retry']);

type PendingRecord = {
  id?: string;
  event?: string;
  dataLines: string[];
  retry?: number;
  malformed: boolean;
  /** Any field line seen since the last boundary */
  touched: boolean;
};

function emptyRecord(): PendingRecord {
  return { dataLines: [], malformed: false, touched: false };
}

export type SseFeedResult = {
  events: StreamEvent[];
  /** Number of comment lines seen (keep-alives) */
  comments: number;
};

export class SseParser {
  private decoder = new TextDecoder();
  private buffer = '';
  private record: PendingRecord = emptyRecord();
  /** Trailing `\r` seen at a chunk edge; a following `\n` belongs to it */
  private pendingCarriageReturn = false;
  private skippedRecords = 0;

  get skipped(): number {
    return this.skippedRecords;
  }

  /**
   * True when bytes of an unfinished record are buffered.
   */
  get hasPartialRecord(): boolean {
    return this.buffer.length > 0 || this.record.touched;
  }

  push(chunk: Uint8Array | string): SseFeedResult {
    const text = typeof chunk === 'string' ? chunk : this.decoder.decode(chunk, { stream: true });
    return this.feedText(text);
  }

  /**
   * Flush the decoder at end of body. Returns whether the body ended mid-record;
   * an unfinished record is never dispatched.
   */
  end(): { partial: boolean } {
    const tail = this.decoder.decode();
    if (tail.length > 0) {
      this.feedText(tail);
    }
    return { partial: this.hasPartialRecord };
  }

  private feedText(text: string): SseFeedResult {
    const result: SseFeedResult = { events: [], comments: 0 };
    let input = text;

    if (this.pendingCarriageReturn) {
      this.pendingCarriageReturn = false;
      if (input.startsWith('\n')) input = input.slice(1);
    }

    this.buffer += input;

    let start = 0;
    for (let i = 0; i < this.buffer.length; i++) {
      const char = this.buffer.charAt(i);
      if (char !== '\n' && char !== '\r') continue;

      const line = this.buffer.slice(start, i);
      if (char === '\r') {
        if (i + 1 < this.buffer.length) {
          if (this.buffer.charAt(i + 1) === '\n') i++;
        } else {
          this.pendingCarriageReturn = true;
        }
      }
      start = i + 1;
      this.processLine(line, result);
    }

    this.buffer = this.buffer.slice(start);
    return result;
  }

  private processLine(line: string, result: SseFeedResult): void {
    if (line === '') {
      this.dispatch(result);
      return;
    }

    if (line.startsWith(':')) {
      result.comments++;
      return;
    }

    const record = this.record;
    record.touched = true;
    if (record.malformed) return;

    const colon = line.indexOf(':');
    const field = colon === -1 ? line : line.slice(0, colon);
    let value = colon === -1 ? '' : line.slice(colon + 1);
    if (value.startsWith(' ')) value = value.slice(1);

    if (!KNOWN_FIELDS.has(field)) {
      record.malformed = true;
      return;
    }

    switch (field) {
      case 'id':
        if (value.includes('\u0000')) {
          record.malformed = true;
        } else {
          record.id = value;
        }
        break;
      case 'event':
        record.event = value;
        break;
      case 'data':
        record.dataLines.push(value);
        break;
      case 'retry':
        if (/^\d+$/.test(value)) {
          record.retry = Number.parseInt(value, 10);
        } else {
          record.malformed = true;
        }
        break;
    }
  }

  private dispatch(result: SseFeedResult): void {
    const record = this.record;
    this.record = emptyRecord();

    if (!record.touched) return;
    if (record.malformed) {
      this.skippedRecords++;
      return;
    }
    // Without data only a named event (e.g. a termination record) or an id is
    // worth dispatching; an id alone still moves the stream position
    const hasId = record.id !== undefined && record.id !== '';
    if (record.dataLines.length === 0 && !record.event && !hasId) return;

    const event: StreamEvent = { data: record.dataLines.join('\n') };
    if (record.id !== undefined && record.id !== '') event.id = record.id;
    if (record.event !== undefined && record.event !== '') event.event = record.event;
    if (record.retry !== undefined) event.retry = record.retry;
    result.events.push(event);
  }
}

/**
 * Parse a complete event-stream body. Useful for tests and small payloads;
 * the pipeline feeds `SseParser` chunk by chunk instead.
 */
export async function* parseSseStream(
  stream: ReadableStream<Uint8Array>
): AsyncGenerator<StreamEvent, void, unknown> {
  const parser = new SseParser();
  const reader = stream.getReader();
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      for (const event of parser.push(value).events) {
        yield event;
      }
    }
    parser.end();
  } finally {
    reader.releaseLock();
  }
}

/**
 * Format a StreamEvent into the SSE wire format.
 *
 * Each line of multi-line data is prefixed with "data: ". A blank line
 * terminates the record.
 */
export function formatSseEvent(event: StreamEvent): string {
  let result = '';
  if (event.event) result += `event: ${event.event}\n`;
  if (event.id) result += `id: ${event.id}\n`;
  if (event.retry !== undefined) result += `retry: ${event.retry}\n`;
  for (const line of event.data.split(/\r\n|\r|\n/)) {
    result += `data: ${line}\n`;
  }
  result += '\n';
  return result;
}

export function formatSseComment(comment: string): string {
  return `: ${comment}\n\n`;
}

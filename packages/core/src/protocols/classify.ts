import { BodyAlreadyConsumedError } from '../errors';
import { isEventStream, isJson, type MediaType, parseMediaType } from './media-type';

export const SESSION_ID_HEADER = 'mcp-session-id';

export type ContentCategory = 'single-reply' | 'event-stream' | 'other';

/**
 * Description of an upstream response whose body has not been read.
 */
export interface UpstreamResponseMeta {
  status: number;
  category: ContentCategory;
  mediaType?: MediaType;
  /** Declared Content-Length, when present and valid */
  contentLength?: number;
  /** True when no usable Content-Length was declared */
  indeterminateLength: boolean;
  /** Session id asserted by the upstream */
  sessionId?: string;
}

/**
 * One-shot owner of an unconsumed response body.
 * Exactly one handling path may `take()` it; a second take throws.
 */
export class ResponseBody {
  private taken = false;

  constructor(private readonly stream: ReadableStream<Uint8Array> | null) {}

  get consumed(): boolean {
    return this.taken;
  }

  /**
   * Take ownership of the byte stream. `null` means the response had no body.
   */
  take(): ReadableStream<Uint8Array> | null {
    if (this.taken) {
      throw new BodyAlreadyConsumedError();
    }
    this.taken = true;
    return this.stream;
  }

  /**
   * Release the body without reading it (e.g. a rejected resume attempt).
   */
  async discard(): Promise<void> {
    if (this.taken) return;
    const stream = this.take();
    if (stream) {
      await stream.cancel();
    }
  }
}

type ClassifiedBase = {
  meta: UpstreamResponseMeta;
  body: ResponseBody;
  headers: Headers;
};

/**
 * The three handling strategies, decided from headers alone.
 */
export type ClassifiedResponse =
  | ({ strategy: 'buffer' } & ClassifiedBase)
  | ({ strategy: 'stream' } & ClassifiedBase)
  | ({ strategy: 'passthrough' } & ClassifiedBase);

export type HandlingStrategy = ClassifiedResponse['strategy'];

function parseContentLength(value: string | null): number | undefined {
  if (value === null) return undefined;
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) return undefined;
  const length = Number(trimmed);
  return Number.isSafeInteger(length) ? length : undefined;
}

function categorize(mediaType: MediaType | undefined): ContentCategory {
  if (isEventStream(mediaType)) return 'event-stream';
  if (isJson(mediaType)) return 'single-reply';
  return 'other';
}

const STRATEGY_BY_CATEGORY: Record<ContentCategory, HandlingStrategy> = {
  'single-reply': 'buffer',
  'event-stream': 'stream',
  other: 'passthrough'
};

/**
 * Inspect a response's status and headers without touching its body.
 *
 * A missing or malformed content type classifies as `other` (pass-through).
 */
export function describeResponse(response: Response): UpstreamResponseMeta {
  const mediaType = parseMediaType(response.headers.get('content-type'));
  const contentLength = parseContentLength(response.headers.get('content-length'));
  const sessionId = response.headers.get(SESSION_ID_HEADER)?.trim();

  const meta: UpstreamResponseMeta = {
    status: response.status,
    category: categorize(mediaType),
    indeterminateLength: contentLength === undefined
  };
  if (mediaType) meta.mediaType = mediaType;
  if (contentLength !== undefined) meta.contentLength = contentLength;
  if (sessionId) meta.sessionId = sessionId;
  return meta;
}

export function classifyResponse(response: Response): ClassifiedResponse {
  const meta = describeResponse(response);
  return {
    strategy: STRATEGY_BY_CATEGORY[meta.category],
    meta,
    body: new ResponseBody(response.body),
    headers: response.headers
  };
}

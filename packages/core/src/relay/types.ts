import type { Interceptor } from '../interceptor/types';
import type { Logger } from '../logger';
import type { ProtocolPayload } from '../protocols/jsonrpc';
import type { SessionStore } from '../session/store';
import type { PipelineOutcome } from '../stream/pipeline';
import type { ReconnectPolicy, SleepFn } from '../stream/reconnect';
import type { StreamEvent, TransportKind, UpstreamSelector } from '../types';
import type { UpstreamDispatcher } from '../upstream/types';

export const DEFAULT_PROTOCOL_VERSION = '2025-03-26';

export interface RelayOptions {
  /** Events buffered between a stream pipeline and its client writer */
  channelCapacity: number;
  dedupCapacity: number;
  idleTimeoutMs: number;
  terminationEvents: string[];
  reconnect: ReconnectPolicy;
  maxReplyBytes: number;
  interceptorTimeoutMs: number;
  /** Sessions unused for this long are removed by `sweepIdleSessions` */
  idleTtlMs: number;
  defaultProtocolVersion: string;
}

export interface CreateRelayOptions {
  store: SessionStore;
  selector: UpstreamSelector;
  /** Keyed by upstream endpoint name */
  dispatchers: Map<string, UpstreamDispatcher>;
  interceptors?: Interceptor[];
  options?: Partial<Omit<RelayOptions, 'reconnect'>> & { reconnect?: Partial<ReconnectPolicy> };
  logger?: Logger;
  now?: () => number;
  /** Backoff randomness and sleeping, swappable in tests */
  random?: () => number;
  sleep?: SleepFn;
}

export type HandleMessageInput = {
  /** Relay session id from the client; absent on first contact */
  sessionId?: string;
  protocolVersion?: string;
  payload: ProtocolPayload;
  clientTransport?: TransportKind;
  /** Client disconnect */
  signal?: AbortSignal;
};

export type OpenStreamInput = {
  sessionId: string;
  /** Client's `Last-Event-ID`; the stored marker is used when absent */
  lastEventId?: string;
  signal?: AbortSignal;
};

/**
 * How the client should be answered.
 * - `reply`: one buffered JSON body, already intercepted
 * - `stream`: events to write as they come; `done` settles when the stream ends
 * - `passthrough`: raw upstream bytes, read at the client's pace
 * - `accepted`: nothing to return (notifications and responses only)
 */
export type RelayResult =
  | { type: 'reply'; sessionId: string; status: number; body: string }
  | {
      type: 'stream';
      sessionId: string;
      events: AsyncIterable<StreamEvent>;
      /** Client went away; stops the pipeline and the upstream read */
      cancel: () => void;
      done: Promise<PipelineOutcome>;
    }
  | {
      type: 'passthrough';
      sessionId: string;
      status: number;
      headers: Headers;
      body: ReadableStream<Uint8Array> | null;
    }
  | { type: 'accepted'; sessionId: string };

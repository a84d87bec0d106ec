import type { ProtocolPayload } from '../protocols/jsonrpc';
import type { TransportKind } from '../types';

export const PROTOCOL_VERSION_HEADER = 'mcp-protocol-version';
export const LAST_EVENT_ID_HEADER = 'last-event-id';

/**
 * Per-call session facts a dispatcher needs to address the upstream.
 */
export type DispatchContext = {
  /** Relay session the call belongs to; never sent upstream */
  sessionId?: string;
  /** Session id the upstream asserted earlier, echoed back on every call */
  upstreamSessionId?: string;
  protocolVersion?: string;
  /** Resumption marker for `openStream` */
  lastEventId?: string;
  signal?: AbortSignal;
};

/**
 * One upstream endpoint, whatever it speaks underneath.
 *
 * Every call answers with a standard `Response` so the classifier and the
 * stream pipeline never need to know which transport produced it.
 */
export interface UpstreamDispatcher {
  readonly name: string;
  readonly kind: Exclude<TransportKind, 'sse'>;
  send(payload: ProtocolPayload, ctx: DispatchContext): Promise<Response>;
  /** Open (or resume) the server-initiated event stream */
  openStream(ctx: DispatchContext): Promise<Response>;
  /** End the upstream session; failures are the caller's to log */
  terminate(ctx: DispatchContext): Promise<void>;
  close(): Promise<void>;
}

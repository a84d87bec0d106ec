import type { ProtocolMessage } from './protocols/jsonrpc';

// ============================================================================
// Transports
// ============================================================================

/**
 * How bytes travel on one side of the relay.
 * - `stdio`: newline-delimited JSON over a child process' stdin/stdout
 * - `http`: one HTTP request, one bounded reply
 * - `sse`: HTTP responses that stream event frames
 */
export type TransportKind = 'stdio' | 'http' | 'sse';

// ============================================================================
// Session
// ============================================================================

/**
 * The relay's record of one client conversation.
 *
 * `clientTransport` and `upstreamTransport` are fixed at creation; the relay
 * may bridge between them (e.g. a stdio client talking to an HTTP upstream).
 */
export interface SessionRecord {
  readonly id: string;
  readonly clientTransport: TransportKind;
  readonly upstreamTransport: TransportKind;
  /** Name of the upstream endpoint chosen when the session was created */
  readonly upstreamName: string;
  protocolVersion: string;
  /** Last event id delivered to the client; absent until first delivery */
  lastEventId?: string;
  /** Session id asserted by the upstream (`Mcp-Session-Id`) */
  upstreamSessionId?: string;
  createdAt: number;
  lastUsedAt: number;
}

export type CreateSessionInput = {
  id?: string;
  clientTransport: TransportKind;
  upstreamTransport: TransportKind;
  upstreamName: string;
  protocolVersion: string;
  upstreamSessionId?: string;
};

/**
 * Fields that may change after creation. Transport kinds are deliberately absent.
 * A `null` marker clears the stored position.
 */
export type SessionPatch = {
  protocolVersion?: string;
  lastEventId?: string | null;
  upstreamSessionId?: string;
  lastUsedAt?: number;
};

export type SessionUpdate = {
  sessionId: string;
  patch: SessionPatch;
};

// ============================================================================
// History
// ============================================================================

export type MessageDirection = 'inbound' | 'outbound';

export interface HistoryEntry {
  seq: number;
  direction: MessageDirection;
  message: ProtocolMessage;
  recordedAt: number;
  eventId?: string;
}

export type NewHistoryEntry = Omit<HistoryEntry, 'seq' | 'recordedAt'> & { recordedAt?: number };

export type ListHistoryOptions = {
  afterSeq?: number;
  limit?: number;
};

// ============================================================================
// Event Stream
// ============================================================================

/**
 * One dispatched event-stream record.
 */
export interface StreamEvent {
  id?: string;
  event?: string;
  data: string;
  retry?: number;
}

// ============================================================================
// Upstream endpoints
// ============================================================================

export type HttpEndpoint = {
  name: string;
  transport: 'http';
  url: string;
  headers: Record<string, string>;
};

export type StdioEndpoint = {
  name: string;
  transport: 'stdio';
  command: string[];
  env: Record<string, string>;
  cwd?: string;
};

export type UpstreamEndpoint = HttpEndpoint | StdioEndpoint;

export interface UpstreamSelector {
  select(): UpstreamEndpoint;
}

// Errors
export {
  BodyAlreadyConsumedError,
  ConfigError,
  errorMessage,
  isRelayError,
  ReconnectExhaustedError,
  RelayError,
  ReplyTooLargeError,
  SessionNotFoundError,
  ShuttingDownError,
  StoreUnavailableError,
  UpstreamError,
  ValidationError
} from './errors';
// Interceptors
export * from './interceptor';
// Logging
export {
  type CreateLoggerOptions,
  createLogger,
  type Logger,
  type LogLevel,
  type LogSink,
  silentLogger,
  stderrSink
} from './logger';
// Protocol: JSON-RPC, media types, classification, SSE
export * from './protocols';
// Relay
export * from './relay';
// Runtime adapters
export { createFetchTransport, type FetchLike, type Transport, type TransportContext } from './runtime';
// Sessions
export * from './session';
// Streaming
export * from './stream';
// Core types
export type {
  CreateSessionInput,
  HistoryEntry,
  HttpEndpoint,
  ListHistoryOptions,
  MessageDirection,
  NewHistoryEntry,
  SessionPatch,
  SessionRecord,
  SessionUpdate,
  StdioEndpoint,
  StreamEvent,
  TransportKind,
  UpstreamEndpoint,
  UpstreamSelector
} from './types';
// Upstream dispatch
export * from './upstream';

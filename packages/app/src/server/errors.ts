import {
  ReplyTooLargeError,
  SessionNotFoundError,
  ShuttingDownError,
  StoreUnavailableError,
  UpstreamError,
  ValidationError
} from '@mcp-relay/core';

// ============================================================================
// Status Code Mapping
// ============================================================================

// Valid HTTP status codes for Hono responses
export type HttpErrorStatus = 400 | 404 | 413 | 500 | 502 | 503;

/**
 * Map errors to HTTP status codes.
 */
export function getStatusForError(err: Error): HttpErrorStatus {
  if (err instanceof SessionNotFoundError) return 404;
  if (err instanceof ValidationError) return 400;
  if (err instanceof ReplyTooLargeError) return 413;
  if (err instanceof UpstreamError) return 502;
  if (err instanceof StoreUnavailableError) return 503;
  if (err instanceof ShuttingDownError) return 503;
  return 500;
}

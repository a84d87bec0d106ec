// ============================================================================
// Error Taxonomy
// ============================================================================

/**
 * Base error class for all relay errors.
 * Provides consistent error structure with code and message.
 */
export class RelayError extends Error {
  constructor(
    public readonly code: string,
    message: string
  ) {
    super(message);
    this.name = 'RelayError';
  }

  toObject() {
    return { error: { code: this.code, message: this.message } };
  }
}

// ============================================================================
// Specific Error Types
// ============================================================================

export class SessionNotFoundError extends RelayError {
  constructor(id: string) {
    super('SESSION_NOT_FOUND', `Session '${id}' not found`);
    this.name = 'SessionNotFoundError';
  }
}

export class StoreUnavailableError extends RelayError {
  constructor(
    operation: string,
    public readonly reason?: unknown
  ) {
    const detail = reason instanceof Error ? `: ${reason.message}` : '';
    super('STORE_UNAVAILABLE', `Session store unavailable during ${operation}${detail}`);
    this.name = 'StoreUnavailableError';
  }
}

export class ValidationError extends RelayError {
  constructor(message: string) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
  }
}

export class ReplyTooLargeError extends RelayError {
  constructor(limit: number, declared?: number) {
    super(
      'REPLY_TOO_LARGE',
      declared !== undefined
        ? `Upstream reply of ${declared} bytes exceeds limit of ${limit} bytes`
        : `Upstream reply exceeds limit of ${limit} bytes`
    );
    this.name = 'ReplyTooLargeError';
  }
}

export class BodyAlreadyConsumedError extends RelayError {
  constructor() {
    super('BODY_ALREADY_CONSUMED', 'Upstream response body has already been taken');
    this.name = 'BodyAlreadyConsumedError';
  }
}

export class UpstreamError extends RelayError {
  constructor(
    message: string,
    public readonly status?: number
  ) {
    super('UPSTREAM_ERROR', message);
    this.name = 'UpstreamError';
  }
}

export class ReconnectExhaustedError extends RelayError {
  constructor(
    public readonly attempts: number,
    public readonly lastEventId?: string
  ) {
    super('RECONNECT_EXHAUSTED', `Upstream stream could not be resumed after ${attempts} attempts`);
    this.name = 'ReconnectExhaustedError';
  }
}

export class ShuttingDownError extends RelayError {
  constructor() {
    super('SHUTTING_DOWN', 'Relay is shutting down');
    this.name = 'ShuttingDownError';
  }
}

export class ConfigError extends RelayError {
  constructor(message: string) {
    super('CONFIG_ERROR', message);
    this.name = 'ConfigError';
  }
}

export function isRelayError(err: unknown): err is RelayError {
  return err instanceof RelayError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

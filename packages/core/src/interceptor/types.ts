import type { ProtocolMessage } from '../protocols/jsonrpc';
import type { MessageDirection, TransportKind } from '../types';

// ============================================================================
// Intercept actions
// ============================================================================

export type InterceptAction =
  | { type: 'continue' }
  | { type: 'modify'; message: ProtocolMessage }
  | { type: 'block'; reason: string }
  /** No decision from this interceptor; the chain moves on */
  | { type: 'defer' };

export const Intercept = {
  continue: (): InterceptAction => ({ type: 'continue' }),
  modify: (message: ProtocolMessage): InterceptAction => ({ type: 'modify', message }),
  block: (reason: string): InterceptAction => ({ type: 'block', reason }),
  defer: (): InterceptAction => ({ type: 'defer' })
} as const;

// ============================================================================
// Context
// ============================================================================

export interface InterceptContext {
  sessionId: string;
  /** `inbound`: client → upstream, `outbound`: upstream → client */
  direction: MessageDirection;
  upstreamName: string;
  clientTransport: TransportKind;
  upstreamTransport: TransportKind;
  /** Present for messages carried by an event stream */
  eventId?: string;
  signal?: AbortSignal;
}

// ============================================================================
// Interceptor
// ============================================================================

export interface Interceptor {
  readonly name: string;
  process(message: ProtocolMessage, ctx: InterceptContext): InterceptAction | Promise<InterceptAction>;
}

/**
 * Final verdict of a chain run.
 * `message` is the (possibly substituted) message to forward.
 */
export type ChainOutcome =
  | { type: 'forward'; message: ProtocolMessage; modified: boolean }
  | { type: 'block'; reason: string; interceptor: string };

/**
 * Typed identity helper for interceptor definitions.
 */
export function defineInterceptor(interceptor: Interceptor): Interceptor {
  return interceptor;
}

import { errorMessage, ReconnectExhaustedError } from '../errors';
import type { InterceptorChain } from '../interceptor/chain';
import type { InterceptContext } from '../interceptor/types';
import { type Logger, silentLogger } from '../logger';
import type { ClassifiedResponse } from '../protocols/classify';
import {
  createErrorResponse,
  isResponse,
  type JsonRpcId,
  type ProtocolMessage,
  parseProtocolMessage,
  RelayErrorCodes
} from '../protocols/jsonrpc';
import { SseParser } from '../protocols/sse';
import type { EventTracker } from '../session/event-tracker';
import { WriteBehindQueue } from '../session/resilience';
import type { SessionStore } from '../session/store';
import type { StreamEvent } from '../types';
import { type BoundedChannel, ChannelClosedError } from './channel';
import { IdleWatchdog } from './idle-watchdog';
import type { ReconnectionManager } from './reconnect';

export const DEFAULT_TERMINATION_EVENTS = ['close'];
export const DEFAULT_IDLE_TIMEOUT_MS = 30_000;

export type PipelineEndReason = 'completed' | 'cancelled' | 'exhausted' | 'failed';

export interface PipelineOutcome {
  reason: PipelineEndReason;
  delivered: number;
  duplicates: number;
  blocked: number;
  /** Malformed records dropped by the parser */
  skipped: number;
  reconnects: number;
  lastEventId?: string;
}

export interface StreamPipelineOptions {
  sessionId: string;
  /** Initial upstream response, classified as `stream` and still unread */
  source: ClassifiedResponse;
  sink: BoundedChannel<StreamEvent>;
  tracker: EventTracker;
  store: SessionStore;
  chain: InterceptorChain;
  reconnection: ReconnectionManager;
  context: Omit<InterceptContext, 'direction' | 'eventId' | 'signal'>;
  idleTimeoutMs?: number;
  /** Event types that end the stream normally; consumed, not forwarded */
  terminationEvents?: string[];
  /** Request ids whose responses complete the stream (POST-initiated streams) */
  awaitingResponseIds?: JsonRpcId[];
  /** Client disconnect */
  signal?: AbortSignal;
  logger?: Logger;
  /** Called after each forwarded event with its parsed message, if any */
  onDelivered?: (event: StreamEvent, message: ProtocolMessage | undefined) => void;
}

type ConsumeResult = 'completed' | 'disconnected' | 'cancelled';

class ClientGoneError extends Error {
  constructor() {
    super('Client stream closed');
    this.name = 'ClientGoneError';
  }
}

/** Stream position reached once the client has taken an event */
type Position = { id: string | undefined };

function idKey(id: JsonRpcId | null): string {
  return typeof id === 'number' ? `n:${id}` : `s:${String(id)}`;
}

/**
 * Drives one upstream event stream to the client.
 *
 * Streaming → (Reconnecting → Streaming)* → Closed. Each record is parsed
 * incrementally, deduplicated by id, passed through the interceptor chain and
 * handed to the bounded sink; the upstream is only read again once the sink
 * has accepted the previous event. End of body without a termination record
 * counts as a disconnect and is resumed from the last recorded id.
 *
 * The stored marker follows what the client has taken from the sink, not what
 * was queued for it. When the client leaves, the tracker is rewound to that
 * position so a resumed stream replays the events it never read.
 */
export class StreamPipeline {
  private readonly logger: Logger;
  private readonly terminationEvents: Set<string>;
  private readonly awaiting: Set<string>;
  private readonly awaitsResponses: boolean;
  private readonly idleTimeoutMs: number;
  private readonly writes: WriteBehindQueue;
  private readonly stats = { delivered: 0, duplicates: 0, blocked: 0, skipped: 0, reconnects: 0 };
  private readonly unread = new WeakMap<StreamEvent, Position>();
  private newestUnread: Position | undefined;
  private unreadCount = 0;
  private acknowledged: string | undefined;
  private positionSettled = false;
  private running = false;

  constructor(private readonly options: StreamPipelineOptions) {
    this.logger = options.logger ?? silentLogger;
    this.terminationEvents = new Set(options.terminationEvents ?? DEFAULT_TERMINATION_EVENTS);
    this.awaiting = new Set((options.awaitingResponseIds ?? []).map(idKey));
    this.awaitsResponses = this.awaiting.size > 0;
    this.idleTimeoutMs = options.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS;
    this.writes = new WriteBehindQueue(this.logger);
    this.acknowledged = options.tracker.lastId();
    options.sink.onReceive((event) => this.acknowledge(event));
  }

  /**
   * Run until the stream completes, the client leaves, or reconnection gives up.
   * Never rejects; the outcome says how it ended. The sink is closed on return.
   */
  async run(): Promise<PipelineOutcome> {
    if (this.running) {
      throw new Error('StreamPipeline.run() may only be called once');
    }
    this.running = true;

    const { reconnection, tracker, signal } = this.options;
    const neverAborted = new AbortController().signal;
    // A client that leaves also frees a send waiting on a full sink
    const onAbort = () => {
      this.rewindToClient();
      this.options.sink.close();
    };
    let source = this.options.source;

    if (signal?.aborted) onAbort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      while (true) {
        const result = await this.consume(source);
        if (result === 'completed') return await this.finish('completed');
        if (result === 'cancelled') {
          this.rewindToClient();
          return await this.finish('cancelled');
        }

        this.logger.info(
          `Upstream stream for session ${this.options.sessionId} dropped; resuming after ${tracker.lastId() ?? 'start'}`
        );
        try {
          source = await reconnection.reconnect(tracker.lastId(), signal ?? neverAborted);
          this.stats.reconnects++;
        } catch (err) {
          if (signal?.aborted) {
            this.rewindToClient();
            return await this.finish('cancelled');
          }
          if (err instanceof ReconnectExhaustedError) {
            await this.sendTerminalError(RelayErrorCodes.STREAM_EXHAUSTED, err.message);
            this.clearStreamState();
            return await this.finish('exhausted');
          }
          throw err;
        }
      }
    } catch (err) {
      this.logger.error(`Stream pipeline for session ${this.options.sessionId} failed: ${errorMessage(err)}`);
      await this.sendTerminalError(RelayErrorCodes.UPSTREAM_UNAVAILABLE, errorMessage(err));
      return await this.finish('failed');
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }

  // --------------------------------------------------------------------------
  // One upstream body
  // --------------------------------------------------------------------------

  private async consume(source: ClassifiedResponse): Promise<ConsumeResult> {
    const { signal } = this.options;
    if (signal?.aborted) return 'cancelled';

    const body = source.body.take();
    const parser = new SseParser();

    if (!body) {
      // Empty stream: nothing to deliver
      const { partial } = parser.end();
      return this.isComplete() && !partial ? 'completed' : 'disconnected';
    }

    const reader = body.getReader();
    const cancelReader = () => {
      reader.cancel().catch((err: unknown) => {
        this.logger.debug(`Cancelling upstream body failed: ${errorMessage(err)}`);
      });
    };
    const watchdog = new IdleWatchdog(this.idleTimeoutMs, () => {
      this.logger.warn(
        `Upstream stream for session ${this.options.sessionId} idle for ${this.idleTimeoutMs}ms; treating as stalled`
      );
      cancelReader();
    });
    signal?.addEventListener('abort', cancelReader, { once: true });
    watchdog.start();

    try {
      while (true) {
        let chunk: Awaited<ReturnType<typeof reader.read>>;
        try {
          chunk = await reader.read();
        } catch (err) {
          if (signal?.aborted) return 'cancelled';
          this.logger.warn(`Upstream read failed: ${errorMessage(err)}`);
          return 'disconnected';
        }

        if (signal?.aborted) return 'cancelled';
        if (chunk.done) break;

        watchdog.touch();
        const { events } = parser.push(chunk.value);

        for (const event of events) {
          // The upstream is not the one holding things up while the client drains
          watchdog.stop();
          const complete = await this.deliver(event);
          if (complete) {
            cancelReader();
            return 'completed';
          }
          watchdog.start();
        }
      }

      const { partial } = parser.end();
      if (watchdog.hasStalled) return 'disconnected';
      if (this.isComplete()) return 'completed';
      this.logger.debug(
        partial ? 'Upstream body ended mid-record' : 'Upstream body ended without a termination record'
      );
      return 'disconnected';
    } catch (err) {
      if (err instanceof ClientGoneError) return 'cancelled';
      throw err;
    } finally {
      watchdog.stop();
      signal?.removeEventListener('abort', cancelReader);
      this.stats.skipped += parser.skipped;
      reader.releaseLock();
    }
  }

  // --------------------------------------------------------------------------
  // One event
  // --------------------------------------------------------------------------

  /**
   * Forward one parsed record. Resolves true when the stream is complete.
   */
  private async deliver(event: StreamEvent): Promise<boolean> {
    const { tracker, chain, context, sessionId } = this.options;

    if (this.options.signal?.aborted) {
      throw new ClientGoneError();
    }

    if (event.event !== undefined && this.terminationEvents.has(event.event)) {
      return true;
    }

    if (event.id !== undefined && !tracker.record(event.id)) {
      this.stats.duplicates++;
      this.logger.debug(`Dropping duplicate event ${event.id} in session ${sessionId}`);
      return false;
    }

    if (event.data === '' && event.event === undefined) {
      // An id with no payload only moves the position
      this.advancePast(event.id);
      return false;
    }

    let outgoing = event;
    const message = parseProtocolMessage(event.data);
    let delivered = message;

    if (message) {
      const ctx: InterceptContext = { ...context, direction: 'outbound' };
      if (event.id !== undefined) ctx.eventId = event.id;
      if (this.options.signal) ctx.signal = this.options.signal;

      const outcome = await chain.run(message, ctx);
      if (outcome.type === 'block') {
        this.stats.blocked++;
        if (!isResponse(message)) {
          this.advancePast(event.id);
          return false;
        }
        // A blocked response still has to answer its request
        delivered = createErrorResponse(
          message.id,
          RelayErrorCodes.BLOCKED,
          `Blocked by ${outcome.interceptor}: ${outcome.reason}`
        );
        outgoing = { ...event, data: JSON.stringify(delivered) };
      } else if (outcome.modified) {
        delivered = outcome.message;
        outgoing = { ...event, data: JSON.stringify(outcome.message) };
      }
    }

    const position: Position = { id: event.id };
    this.unread.set(outgoing, position);
    this.unreadCount++;
    this.newestUnread = position;

    try {
      await this.options.sink.send(outgoing);
    } catch (err) {
      if (err instanceof ChannelClosedError) throw new ClientGoneError();
      throw err;
    }

    this.stats.delivered++;
    this.options.reconnection.noteProgress();
    this.options.onDelivered?.(outgoing, delivered);

    if (message && isResponse(message) && this.awaiting.delete(idKey(message.id))) {
      return this.isComplete();
    }
    return false;
  }

  private isComplete(): boolean {
    return this.awaitsResponses && this.awaiting.size === 0;
  }

  /**
   * A dropped event moves the position once everything queued before it has
   * been taken.
   */
  private advancePast(eventId: string | undefined): void {
    if (eventId === undefined) return;
    if (this.newestUnread) {
      this.newestUnread.id = eventId;
      return;
    }
    this.markTaken(eventId);
  }

  private acknowledge(event: StreamEvent): void {
    const position = this.unread.get(event);
    if (!position) return;
    this.unread.delete(event);
    this.unreadCount--;
    if (this.unreadCount === 0) this.newestUnread = undefined;
    if (position.id !== undefined) this.markTaken(position.id);
  }

  private markTaken(eventId: string): void {
    if (this.positionSettled) return;
    this.acknowledged = eventId;
    const { store, sessionId } = this.options;
    this.writes.enqueue(`Persisting marker ${eventId} for session ${sessionId}`, () =>
      store.setLastEventId(sessionId, eventId)
    );
  }

  /** Forget ids recorded for events the client never took */
  private rewindToClient(): void {
    if (this.positionSettled) return;
    this.positionSettled = true;
    if (this.options.tracker.lastId() !== this.acknowledged) {
      this.logger.debug(
        `Client left session ${this.options.sessionId} at ${this.acknowledged ?? 'start'}; rewinding`
      );
      this.options.tracker.rewind(this.acknowledged);
    }
  }

  private clearStreamState(): void {
    const { store, sessionId, tracker } = this.options;
    this.positionSettled = true;
    tracker.reset();
    this.writes.enqueue(`Clearing marker for session ${sessionId}`, () =>
      store.setLastEventId(sessionId, null)
    );
  }

  private async sendTerminalError(code: number, message: string): Promise<void> {
    const event: StreamEvent = {
      event: 'error',
      data: JSON.stringify(createErrorResponse(null, code, message))
    };
    try {
      await this.options.sink.send(event);
    } catch (err) {
      this.logger.debug(`Terminal error not delivered: ${errorMessage(err)}`);
    }
  }

  private async finish(reason: PipelineEndReason): Promise<PipelineOutcome> {
    this.options.reconnection.close();
    this.options.sink.close();
    await this.writes.flush();

    const outcome: PipelineOutcome = { reason, ...this.stats };
    const lastEventId = this.options.tracker.lastId();
    if (lastEventId !== undefined) outcome.lastEventId = lastEventId;

    this.logger.debug(
      `Stream for session ${this.options.sessionId} ${reason}: ${outcome.delivered} delivered, ` +
        `${outcome.duplicates} duplicates, ${outcome.blocked} blocked, ${outcome.skipped} skipped, ` +
        `${outcome.reconnects} reconnects`
    );
    return outcome;
  }
}

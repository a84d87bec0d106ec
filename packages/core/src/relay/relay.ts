import { errorMessage, SessionNotFoundError, ShuttingDownError, UpstreamError } from '../errors';
import { DEFAULT_INTERCEPTOR_TIMEOUT_MS, InterceptorChain } from '../interceptor/chain';
import type { InterceptContext } from '../interceptor/types';
import { type Logger, silentLogger } from '../logger';
import { type ClassifiedResponse, classifyResponse } from '../protocols/classify';
import {
  createErrorResponse,
  isRequest,
  isResponse,
  type JsonRpcId,
  type ProtocolMessage,
  type ProtocolPayload,
  parseProtocolPayload,
  pendingRequestIds,
  RelayErrorCodes,
  toMessageList
} from '../protocols/jsonrpc';
import { DEFAULT_DEDUP_CAPACITY, EventTrackerRegistry } from '../session/event-tracker';
import type { SessionStore } from '../session/store';
import { readMarkerOrNone, WriteBehindQueue, writeBestEffort } from '../session/resilience';
import { BoundedChannel, ChannelClosedError } from '../stream/channel';
import { DEFAULT_IDLE_TIMEOUT_MS, DEFAULT_TERMINATION_EVENTS, StreamPipeline } from '../stream/pipeline';
import {
  DEFAULT_RECONNECT_POLICY,
  ReconnectionManager,
  type ReconnectionManagerOptions
} from '../stream/reconnect';
import type { MessageDirection, NewHistoryEntry, SessionRecord, StreamEvent } from '../types';
import type { DispatchContext, UpstreamDispatcher } from '../upstream/types';
import { setOptional } from '../utils/optional';
import { DEFAULT_MAX_REPLY_BYTES, readBoundedText } from './body';
import {
  type CreateRelayOptions,
  DEFAULT_PROTOCOL_VERSION,
  type HandleMessageInput,
  type OpenStreamInput,
  type RelayOptions,
  type RelayResult
} from './types';

export const DEFAULT_RELAY_OPTIONS: RelayOptions = {
  channelCapacity: 64,
  dedupCapacity: DEFAULT_DEDUP_CAPACITY,
  idleTimeoutMs: DEFAULT_IDLE_TIMEOUT_MS,
  terminationEvents: DEFAULT_TERMINATION_EVENTS,
  reconnect: DEFAULT_RECONNECT_POLICY,
  maxReplyBytes: DEFAULT_MAX_REPLY_BYTES,
  interceptorTimeoutMs: DEFAULT_INTERCEPTOR_TIMEOUT_MS,
  idleTtlMs: 30 * 60 * 1000,
  defaultProtocolVersion: DEFAULT_PROTOCOL_VERSION
};

type ActiveStream = {
  cancel: () => void;
  done: Promise<unknown>;
};

type ResponseContext = {
  /** Request ids the client is still waiting on */
  awaiting: JsonRpcId[];
  /** Id of an `initialize` request in the forwarded payload */
  initializeId?: JsonRpcId;
  /** Answers the relay produced itself (blocked inbound requests) */
  extra: ProtocolMessage[];
  batch: boolean;
  signal?: AbortSignal;
};

type InterceptedBatch = {
  messages: ProtocolMessage[];
  changed: boolean;
};

function sameId(a: JsonRpcId | null, b: JsonRpcId | undefined): boolean {
  return b !== undefined && a === b;
}

function negotiatedVersion(message: ProtocolMessage, initializeId: JsonRpcId | undefined): string | undefined {
  if (!isResponse(message) || !sameId(message.id, initializeId) || !('result' in message)) return undefined;
  const result = message.result;
  if (typeof result === 'object' && result !== null && 'protocolVersion' in result) {
    return typeof result.protocolVersion === 'string' ? result.protocolVersion : undefined;
  }
  return undefined;
}

function requestedVersion(messages: ProtocolMessage[]): string | undefined {
  for (const message of messages) {
    if (!isRequest(message) || message.method !== 'initialize') continue;
    const params = message.params;
    if (typeof params === 'object' && params !== null && 'protocolVersion' in params) {
      return typeof params.protocolVersion === 'string' ? params.protocolVersion : undefined;
    }
  }
  return undefined;
}

function serialize(messages: ProtocolMessage[], batch: boolean): string {
  const [first] = messages;
  return JSON.stringify(batch || messages.length !== 1 || !first ? messages : first);
}

/**
 * Ties sessions, upstream dispatch, interception and stream pipelines together.
 *
 * Stateless apart from the injected store and dispatchers plus the in-memory
 * set of live streams, which is what `shutdown` drains.
 */
export class Relay {
  readonly options: RelayOptions;
  private readonly store: SessionStore;
  private readonly dispatchers: Map<string, UpstreamDispatcher>;
  private readonly chain: InterceptorChain;
  private readonly trackers: EventTrackerRegistry;
  private readonly writes: WriteBehindQueue;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly streams = new Map<string, Set<ActiveStream>>();
  private closing = false;

  constructor(private readonly deps: CreateRelayOptions) {
    const { reconnect, ...rest } = deps.options ?? {};
    this.options = {
      ...DEFAULT_RELAY_OPTIONS,
      ...rest,
      reconnect: { ...DEFAULT_RELAY_OPTIONS.reconnect, ...reconnect }
    };
    this.store = deps.store;
    this.dispatchers = deps.dispatchers;
    this.logger = deps.logger ?? silentLogger;
    this.now = deps.now ?? Date.now;
    this.chain = new InterceptorChain(deps.interceptors ?? [], {
      timeoutMs: this.options.interceptorTimeoutMs,
      logger: this.logger.child('interceptors')
    });
    this.trackers = new EventTrackerRegistry(this.options.dedupCapacity);
    this.writes = new WriteBehindQueue(this.logger);
  }

  /** Live stream pipelines across all sessions */
  get activeStreams(): number {
    let count = 0;
    for (const set of this.streams.values()) count += set.size;
    return count;
  }

  /** Sessions currently held by the store */
  async sessionCount(): Promise<number> {
    return (await this.store.listSessions()).length;
  }

  // --------------------------------------------------------------------------
  // Client → upstream
  // --------------------------------------------------------------------------

  async handleMessage(input: HandleMessageInput): Promise<RelayResult> {
    this.assertOpen();
    const messages = toMessageList(input.payload);
    const batch = Array.isArray(input.payload);
    const session = await this.resolveSession(input, messages);
    const dispatcher = this.dispatcherFor(session);

    this.recordHistory(session.id, 'inbound', messages);
    const { forward, answers } = await this.interceptInbound(session, messages, input.signal);
    this.touch(session.id);

    if (forward.length === 0) {
      return answers.length > 0
        ? { type: 'reply', sessionId: session.id, status: 200, body: this.answer(session.id, answers, batch) }
        : { type: 'accepted', sessionId: session.id };
    }

    const [first] = forward;
    const payload: ProtocolPayload = batch || !first ? forward : first;
    const response = await this.dispatch(dispatcher, () =>
      dispatcher.send(payload, this.dispatchContext(session, input.signal))
    );
    const classified = classifyResponse(response);
    await this.captureUpstreamSession(session, classified.meta.sessionId);

    const initialize = forward.find((message) => isRequest(message) && message.method === 'initialize');
    const context: ResponseContext = { awaiting: pendingRequestIds(payload), extra: answers, batch };
    if (initialize && isRequest(initialize)) context.initializeId = initialize.id;
    if (input.signal) context.signal = input.signal;

    return await this.respond(session, classified, context);
  }

  /**
   * Open or resume the session's server-initiated stream.
   */
  async openStream(input: OpenStreamInput): Promise<RelayResult> {
    this.assertOpen();
    const session = await this.requireSession(input.sessionId);
    const dispatcher = this.dispatcherFor(session);

    const marker = input.lastEventId ?? (await readMarkerOrNone(this.store, session.id, this.logger));
    const tracker = this.trackers.get(session.id, marker);
    // Ids past the client's own position were queued for it but never read
    if (input.lastEventId !== undefined) tracker.rewind(input.lastEventId);

    const ctx = this.dispatchContext(session, input.signal);
    if (marker !== undefined) ctx.lastEventId = marker;
    const response = await this.dispatch(dispatcher, () => dispatcher.openStream(ctx));
    const classified = classifyResponse(response);
    await this.captureUpstreamSession(session, classified.meta.sessionId);
    this.touch(session.id);

    const context: ResponseContext = { awaiting: [], extra: [], batch: false };
    if (input.signal) context.signal = input.signal;
    return await this.respond(session, classified, context);
  }

  // --------------------------------------------------------------------------
  // Session lifecycle
  // --------------------------------------------------------------------------

  async terminateSession(sessionId: string): Promise<void> {
    const session = await this.requireSession(sessionId);
    this.cancelStreams(sessionId);

    const dispatcher = this.dispatchers.get(session.upstreamName);
    if (dispatcher) {
      try {
        await dispatcher.terminate(this.dispatchContext(session, undefined));
      } catch (err) {
        this.logger.warn(`Upstream termination for session ${sessionId} failed: ${errorMessage(err)}`);
      }
    }

    await writeBestEffort(
      `Deleting history of session ${sessionId}`,
      () => this.store.deleteHistory(sessionId),
      this.logger
    );
    await this.store.deleteSession(sessionId);
    this.trackers.delete(sessionId);
    this.logger.info(`Session ${sessionId} terminated`);
  }

  /**
   * Remove sessions idle for longer than `idleTtlMs` that have no live stream.
   * Returns the removed ids.
   */
  async sweepIdleSessions(): Promise<string[]> {
    const cutoff = this.now() - this.options.idleTtlMs;
    const sessions = await this.store.listSessions();
    const removed: string[] = [];

    for (const session of sessions) {
      if (session.lastUsedAt > cutoff || this.streams.has(session.id)) continue;
      try {
        await this.terminateSession(session.id);
        removed.push(session.id);
      } catch (err) {
        if (err instanceof SessionNotFoundError) continue;
        this.logger.warn(`Could not expire session ${session.id}: ${errorMessage(err)}`);
      }
    }

    if (removed.length > 0) {
      this.logger.debug(`Expired ${removed.length} idle session(s)`);
    }
    return removed;
  }

  /**
   * Stop taking work, give live streams `graceMs` to finish, then cancel them
   * and release the store and dispatchers.
   */
  async shutdown(graceMs: number): Promise<void> {
    if (this.closing) return;
    this.closing = true;

    const live = [...this.streams.values()].flatMap((set) => [...set]);
    if (live.length > 0) {
      this.logger.info(`Draining ${live.length} stream(s) for up to ${graceMs}ms`);
      let timer: ReturnType<typeof setTimeout> | undefined;
      const grace = new Promise<void>((resolve) => {
        timer = setTimeout(resolve, graceMs);
      });
      await Promise.race([Promise.allSettled(live.map((stream) => stream.done)), grace]);
      clearTimeout(timer);

      for (const stream of live) stream.cancel();
      await Promise.allSettled(live.map((stream) => stream.done));
    }

    await this.writes.flush();
    for (const dispatcher of this.dispatchers.values()) {
      try {
        await dispatcher.close();
      } catch (err) {
        this.logger.warn(`Closing upstream ${dispatcher.name} failed: ${errorMessage(err)}`);
      }
    }
    try {
      await this.store.close();
    } catch (err) {
      this.logger.warn(`Closing session store failed: ${errorMessage(err)}`);
    }
    this.trackers.clear();
  }

  // --------------------------------------------------------------------------
  // Response handling
  // --------------------------------------------------------------------------

  private async respond(
    session: SessionRecord,
    classified: ClassifiedResponse,
    context: ResponseContext
  ): Promise<RelayResult> {
    const { status } = classified.meta;

    if (status === 202) {
      await classified.body.discard();
      return context.extra.length > 0
        ? { type: 'reply', sessionId: session.id, status: 200, body: this.answer(session.id, context.extra, true) }
        : { type: 'accepted', sessionId: session.id };
    }

    switch (classified.strategy) {
      case 'buffer':
        return await this.bufferReply(session, classified, context);
      case 'stream':
        if (status >= 200 && status < 300) {
          return this.startStream(session, classified, context);
        }
        return this.passThrough(session, classified, context);
      case 'passthrough':
        return this.passThrough(session, classified, context);
    }
  }

  private async bufferReply(
    session: SessionRecord,
    classified: ClassifiedResponse,
    context: ResponseContext
  ): Promise<RelayResult> {
    const text = await readBoundedText(classified, this.options.maxReplyBytes);
    const status = classified.meta.status;
    const parsed = parseProtocolPayload(text);

    if (!parsed) {
      // Not JSON-RPC (e.g. an upstream error document): relay as is
      return { type: 'reply', sessionId: session.id, status, body: text };
    }

    const intercepted = await this.interceptOutbound(session, toMessageList(parsed), context.signal);
    for (const message of intercepted.messages) {
      this.observeOutbound(session, message, context.initializeId);
    }
    this.recordHistory(session.id, 'outbound', intercepted.messages);

    const messages = [...context.extra, ...intercepted.messages];
    if (messages.length === 0) {
      return { type: 'accepted', sessionId: session.id };
    }
    const changed = intercepted.changed || context.extra.length > 0;
    const batch = Array.isArray(parsed) || context.extra.length > 0;
    return {
      type: 'reply',
      sessionId: session.id,
      status,
      body: changed ? serialize(messages, batch) : text
    };
  }

  private passThrough(session: SessionRecord, classified: ClassifiedResponse, context: ResponseContext): RelayResult {
    if (context.extra.length > 0) {
      this.logger.warn(
        `Session ${session.id}: ${context.extra.length} blocked request(s) cannot be answered on a pass-through reply`
      );
    }
    const headers = new Headers();
    for (const name of ['content-type', 'content-length']) {
      const value = classified.headers.get(name);
      if (value !== null) headers.set(name, value);
    }
    return {
      type: 'passthrough',
      sessionId: session.id,
      status: classified.meta.status,
      headers,
      body: classified.body.take()
    };
  }

  private startStream(session: SessionRecord, classified: ClassifiedResponse, context: ResponseContext): RelayResult {
    const controller = new AbortController();
    const channel = new BoundedChannel<StreamEvent>(this.options.channelCapacity);
    const cancel = () => {
      controller.abort();
      channel.close();
    };
    const clientSignal = context.signal;
    if (clientSignal?.aborted) cancel();
    clientSignal?.addEventListener('abort', cancel, { once: true });

    const dispatcher = this.dispatcherFor(session);
    const logger = this.logger.child(`stream:${session.id}`);
    const reconnection = new ReconnectionManager(
      setOptional<ReconnectionManagerOptions>({
        resume: async (lastEventId, _attempt, signal) => {
          const ctx = this.dispatchContext(session, signal);
          if (lastEventId !== undefined) ctx.lastEventId = lastEventId;
          return await dispatcher.openStream(ctx);
        },
        policy: this.options.reconnect,
        logger,
        onStateChange: (state, previous) => logger.debug(`${previous} -> ${state}`)
      })
        .ifDefined('random', this.deps.random)
        .ifDefined('sleep', this.deps.sleep)
        .build()
    );

    const pipeline = new StreamPipeline({
      sessionId: session.id,
      source: classified,
      sink: channel,
      tracker: this.trackers.get(session.id),
      store: this.store,
      chain: this.chain,
      reconnection,
      context: this.interceptContext(session),
      idleTimeoutMs: this.options.idleTimeoutMs,
      terminationEvents: this.options.terminationEvents,
      awaitingResponseIds: context.awaiting,
      signal: controller.signal,
      logger,
      onDelivered: (event, message) => {
        if (!message) return;
        this.observeOutbound(session, message, context.initializeId);
        this.recordHistory(session.id, 'outbound', [message], event.id);
      }
    });

    const entry: ActiveStream = { cancel, done: Promise.resolve() };
    const done = this.sendPreamble(channel, context.extra)
      .then(() => pipeline.run())
      .finally(() => {
        clientSignal?.removeEventListener('abort', cancel);
        this.untrack(session.id, entry);
        this.touch(session.id);
      });
    entry.done = done;
    this.track(session.id, entry);

    return { type: 'stream', sessionId: session.id, events: channel, cancel, done };
  }

  private async sendPreamble(channel: BoundedChannel<StreamEvent>, messages: ProtocolMessage[]): Promise<void> {
    for (const message of messages) {
      try {
        await channel.send({ data: JSON.stringify(message) });
      } catch (err) {
        if (err instanceof ChannelClosedError) return;
        throw err;
      }
    }
  }

  // --------------------------------------------------------------------------
  // Interception
  // --------------------------------------------------------------------------

  private interceptContext(session: SessionRecord): Omit<InterceptContext, 'direction' | 'eventId' | 'signal'> {
    return {
      sessionId: session.id,
      upstreamName: session.upstreamName,
      clientTransport: session.clientTransport,
      upstreamTransport: session.upstreamTransport
    };
  }

  /**
   * Blocked requests are answered here with an error; blocked notifications
   * and responses are dropped.
   */
  private async interceptInbound(
    session: SessionRecord,
    messages: ProtocolMessage[],
    signal: AbortSignal | undefined
  ): Promise<{ forward: ProtocolMessage[]; answers: ProtocolMessage[] }> {
    const forward: ProtocolMessage[] = [];
    const answers: ProtocolMessage[] = [];
    const ctx: InterceptContext = { ...this.interceptContext(session), direction: 'inbound' };
    if (signal) ctx.signal = signal;

    for (const message of messages) {
      const outcome = await this.chain.run(message, ctx);
      if (outcome.type === 'forward') {
        forward.push(outcome.message);
      } else if (isRequest(message)) {
        answers.push(
          createErrorResponse(message.id, RelayErrorCodes.BLOCKED, `Blocked by ${outcome.interceptor}: ${outcome.reason}`)
        );
      }
    }
    return { forward, answers };
  }

  /**
   * Blocked responses become error responses for the same id so the client is
   * still answered; other blocked messages are dropped.
   */
  private async interceptOutbound(
    session: SessionRecord,
    messages: ProtocolMessage[],
    signal: AbortSignal | undefined
  ): Promise<InterceptedBatch> {
    const result: ProtocolMessage[] = [];
    let changed = false;
    const ctx: InterceptContext = { ...this.interceptContext(session), direction: 'outbound' };
    if (signal) ctx.signal = signal;

    for (const message of messages) {
      const outcome = await this.chain.run(message, ctx);
      if (outcome.type === 'forward') {
        result.push(outcome.message);
        changed ||= outcome.modified;
        continue;
      }
      changed = true;
      if (isResponse(message)) {
        result.push(
          createErrorResponse(message.id, RelayErrorCodes.BLOCKED, `Blocked by ${outcome.interceptor}: ${outcome.reason}`)
        );
      }
    }
    return { messages: result, changed };
  }

  // --------------------------------------------------------------------------
  // Sessions
  // --------------------------------------------------------------------------

  private async resolveSession(input: HandleMessageInput, messages: ProtocolMessage[]): Promise<SessionRecord> {
    if (input.sessionId !== undefined) {
      return await this.requireSession(input.sessionId);
    }

    const endpoint = this.deps.selector.select();
    const session = await this.store.createSession({
      clientTransport: input.clientTransport ?? 'http',
      upstreamTransport: endpoint.transport,
      upstreamName: endpoint.name,
      protocolVersion: input.protocolVersion ?? requestedVersion(messages) ?? this.options.defaultProtocolVersion
    });
    this.logger.info(`Session ${session.id} created for upstream ${endpoint.name}`);
    return session;
  }

  private async requireSession(sessionId: string): Promise<SessionRecord> {
    const session = await this.store.getSession(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return session;
  }

  private async captureUpstreamSession(session: SessionRecord, upstreamSessionId: string | undefined): Promise<void> {
    if (upstreamSessionId === undefined || upstreamSessionId === session.upstreamSessionId) return;
    session.upstreamSessionId = upstreamSessionId;
    await writeBestEffort(
      `Recording upstream session for ${session.id}`,
      () => this.store.updateSession(session.id, { upstreamSessionId }),
      this.logger
    );
  }

  private observeOutbound(session: SessionRecord, message: ProtocolMessage, initializeId: JsonRpcId | undefined): void {
    const version = negotiatedVersion(message, initializeId);
    if (version === undefined || version === session.protocolVersion) return;
    session.protocolVersion = version;
    this.writes.enqueue(`Recording protocol version for ${session.id}`, () =>
      this.store.updateSession(session.id, { protocolVersion: version })
    );
  }

  private touch(sessionId: string): void {
    const lastUsedAt = this.now();
    this.writes.enqueue(`Touching session ${sessionId}`, () => this.store.updateSession(sessionId, { lastUsedAt }));
  }

  private recordHistory(
    sessionId: string,
    direction: MessageDirection,
    messages: ProtocolMessage[],
    eventId?: string
  ): void {
    for (const message of messages) {
      const entry = setOptional<NewHistoryEntry>({ direction, message })
        .ifDefined('eventId', eventId)
        .build();
      this.writes.enqueue(`Recording history for ${sessionId}`, () => this.store.appendHistory(sessionId, entry));
    }
  }

  private answer(sessionId: string, answers: ProtocolMessage[], batch: boolean): string {
    this.recordHistory(sessionId, 'outbound', answers);
    return serialize(answers, batch);
  }

  // --------------------------------------------------------------------------
  // Upstream
  // --------------------------------------------------------------------------

  private dispatcherFor(session: SessionRecord): UpstreamDispatcher {
    const dispatcher = this.dispatchers.get(session.upstreamName);
    if (!dispatcher) {
      throw new UpstreamError(`No upstream named '${session.upstreamName}' is configured`);
    }
    return dispatcher;
  }

  private dispatchContext(session: SessionRecord, signal: AbortSignal | undefined): DispatchContext {
    return setOptional<DispatchContext>({ sessionId: session.id, protocolVersion: session.protocolVersion })
      .ifDefined('upstreamSessionId', session.upstreamSessionId)
      .ifDefined('signal', signal)
      .build();
  }

  private async dispatch(dispatcher: UpstreamDispatcher, call: () => Promise<Response>): Promise<Response> {
    try {
      return await call();
    } catch (err) {
      if (err instanceof UpstreamError) throw err;
      throw new UpstreamError(`Upstream ${dispatcher.name} failed: ${errorMessage(err)}`);
    }
  }

  private assertOpen(): void {
    if (this.closing) {
      throw new ShuttingDownError();
    }
  }

  private track(sessionId: string, stream: ActiveStream): void {
    let set = this.streams.get(sessionId);
    if (!set) {
      set = new Set();
      this.streams.set(sessionId, set);
    }
    set.add(stream);
  }

  private untrack(sessionId: string, stream: ActiveStream): void {
    const set = this.streams.get(sessionId);
    if (!set) return;
    set.delete(stream);
    if (set.size === 0) this.streams.delete(sessionId);
  }

  private cancelStreams(sessionId: string): void {
    for (const stream of this.streams.get(sessionId) ?? []) {
      stream.cancel();
    }
  }
}

export function createRelay(options: CreateRelayOptions): Relay {
  return new Relay(options);
}

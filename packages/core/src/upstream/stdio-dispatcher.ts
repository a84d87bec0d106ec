import { type ChildProcess, spawn } from 'node:child_process';
import { once } from 'node:events';
import { errorMessage, UpstreamError } from '../errors';
import { type Logger, silentLogger } from '../logger';
import {
  isRequest,
  isResponse,
  type JsonRpcId,
  type JsonRpcResponse,
  type ProtocolMessage,
  type ProtocolPayload,
  toMessageList,
  toProtocolMessage
} from '../protocols/jsonrpc';
import { formatSseEvent } from '../protocols/sse';
import type { StdioEndpoint } from '../types';
import type { DispatchContext, UpstreamDispatcher } from './types';

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;
const DEFAULT_MAX_RESTARTS = 3;
const DEFAULT_GRACE_PERIOD_MS = 500;
const DEFAULT_REPLAY_CAPACITY = 256;
const MAX_STDOUT_BYTES = 10 * 1024 * 1024; // 10MB

// ============================================================================
// Types
// ============================================================================

export interface StdioDispatcherOptions {
  logger?: Logger;
  requestTimeoutMs?: number;
  /** Respawns allowed after the child exits unexpectedly */
  maxRestarts?: number;
  gracePeriodMs?: number;
  /** Server-initiated messages kept for stream resumption */
  replayCapacity?: number;
}

interface PendingRequest {
  originalId: JsonRpcId;
  resolve: (response: JsonRpcResponse) => void;
  reject: (error: Error) => void;
}

interface LoggedEvent {
  seq: number;
  message: ProtocolMessage;
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error('Request aborted');
}

function consumerKey(ctx: DispatchContext): string {
  return ctx.sessionId ?? '';
}

// ============================================================================
// StdioDispatcher
// ============================================================================

/**
 * Upstream reached through a child process speaking NDJSON on stdin/stdout.
 *
 * Request ids are rewritten to a private counter so concurrent sessions sharing
 * the process cannot collide; responses get their original id back. Messages
 * the server sends on its own are logged with increasing sequence numbers and
 * served by `openStream` as a `text/event-stream` body. Every session with an
 * open stream receives every logged message through its own cursor; a newer
 * stream from the same session replaces its previous one.
 */
export class StdioDispatcher implements UpstreamDispatcher {
  readonly kind = 'stdio' as const;
  private child: ChildProcess | null = null;
  private buffer = '';
  private nextRequestId = 0;
  private readonly pending = new Map<number, PendingRequest>();
  private restartCount = 0;
  private closed = false;

  private readonly events: LoggedEvent[] = [];
  private eventSeq = 0;
  /** Highest sequence handed to any stream consumer */
  private deliveredSeq = 0;
  /** Highest sequence handed to each session */
  private readonly sessionCursors = new Map<string, number>();
  /** Generation of the live stream per session */
  private readonly consumers = new Map<string, number>();
  private waiters: Array<() => void> = [];
  private streamGeneration = 0;

  private readonly logger: Logger;
  private readonly requestTimeoutMs: number;
  private readonly maxRestarts: number;
  private readonly gracePeriodMs: number;
  private readonly replayCapacity: number;

  constructor(
    private readonly endpoint: StdioEndpoint,
    options: StdioDispatcherOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.maxRestarts = options.maxRestarts ?? DEFAULT_MAX_RESTARTS;
    this.gracePeriodMs = options.gracePeriodMs ?? DEFAULT_GRACE_PERIOD_MS;
    this.replayCapacity = options.replayCapacity ?? DEFAULT_REPLAY_CAPACITY;
  }

  get name(): string {
    return this.endpoint.name;
  }

  get running(): boolean {
    return this.child !== null;
  }

  // --------------------------------------------------------------------------
  // UpstreamDispatcher
  // --------------------------------------------------------------------------

  async send(payload: ProtocolPayload, ctx: DispatchContext): Promise<Response> {
    if (ctx.signal?.aborted) {
      throw abortReason(ctx.signal);
    }
    this.ensureStarted();

    const messages = toMessageList(payload);
    const waits: Array<Promise<JsonRpcResponse>> = [];
    const outgoing = messages.map((message) => {
      if (!isRequest(message)) return message;
      const internalId = ++this.nextRequestId;
      waits.push(this.awaitResponse(internalId, message.id, ctx.signal));
      return { ...message, id: internalId };
    });

    // Settles (or fails) together with the write below
    const answered = Promise.all(waits);

    try {
      await this.writeLine(Array.isArray(payload) ? outgoing : outgoing[0]);
    } catch (err) {
      if (waits.length === 0) throw err;
      this.rejectAll(err instanceof Error ? err : new UpstreamError(errorMessage(err)));
    }

    if (waits.length === 0) {
      return new Response(null, { status: 202 });
    }

    const responses = await answered;
    const body = Array.isArray(payload) ? responses : responses[0];
    return new Response(JSON.stringify(body), {
      status: 200,
      headers: { 'content-type': 'application/json' }
    });
  }

  async openStream(ctx: DispatchContext): Promise<Response> {
    this.ensureStarted();

    const key = consumerKey(ctx);
    const generation = ++this.streamGeneration;
    this.consumers.set(key, generation);
    // Ends the session's previous stream, if any
    this.wake();
    const current = () => this.consumers.get(key) === generation;

    // A session new to the stream picks up what nobody has been handed yet
    let cursor = this.sessionCursors.get(key) ?? this.deliveredSeq;
    if (ctx.lastEventId !== undefined && /^\d+$/.test(ctx.lastEventId)) {
      cursor = Number(ctx.lastEventId);
    }

    const encoder = new TextEncoder();
    const stream = new ReadableStream<Uint8Array>({
      pull: async (controller) => {
        while (true) {
          if (!current() || this.closed) {
            controller.close();
            return;
          }
          const next = this.events.find((event) => event.seq > cursor);
          if (next) {
            cursor = next.seq;
            this.deliveredSeq = Math.max(this.deliveredSeq, next.seq);
            this.sessionCursors.set(key, Math.max(this.sessionCursors.get(key) ?? 0, next.seq));
            controller.enqueue(
              encoder.encode(formatSseEvent({ id: String(next.seq), data: JSON.stringify(next.message) }))
            );
            return;
          }
          if (!this.child) {
            // Child gone: end the body so the reader reconnects
            controller.close();
            return;
          }
          await new Promise<void>((resolve) => this.waiters.push(resolve));
        }
      },
      cancel: () => {
        if (current()) {
          this.consumers.delete(key);
          this.wake();
        }
      }
    });

    return new Response(stream, {
      status: 200,
      headers: { 'content-type': 'text/event-stream', 'cache-control': 'no-cache' }
    });
  }

  /**
   * A stdio server has one implicit session for the life of the process, so
   * only the relay session's stream state is dropped.
   */
  async terminate(ctx: DispatchContext): Promise<void> {
    const key = consumerKey(ctx);
    this.sessionCursors.delete(key);
    if (this.consumers.delete(key)) this.wake();
  }

  async close(): Promise<void> {
    this.closed = true;
    this.wake();
    const child = this.child;
    if (!child) return;

    child.stdin?.end();
    const exited = once(child, 'close').then(() => true);
    const timedOut = new Promise<boolean>((resolve) => {
      setTimeout(() => resolve(false), this.gracePeriodMs).unref();
    });
    if (!(await Promise.race([exited, timedOut]))) {
      child.kill('SIGKILL');
    }
    this.child = null;
  }

  // --------------------------------------------------------------------------
  // Process lifecycle
  // --------------------------------------------------------------------------

  private ensureStarted(): void {
    if (this.closed) {
      throw new UpstreamError(`Upstream ${this.name} is closed`);
    }
    if (this.child) return;
    if (this.restartCount > this.maxRestarts) {
      throw new UpstreamError(`Upstream ${this.name} exited too many times (${this.maxRestarts} restarts)`);
    }
    this.spawn();
  }

  private spawn(): void {
    const [cmd, ...args] = this.endpoint.command;
    if (!cmd) {
      throw new UpstreamError(`Upstream ${this.name} has an empty command`);
    }

    const child = spawn(cmd, args, {
      cwd: this.endpoint.cwd,
      stdio: ['pipe', 'pipe', 'pipe'],
      env: { ...process.env, ...this.endpoint.env }
    });
    this.child = child;
    this.buffer = '';
    this.logger.debug(`Spawned ${this.name}: ${this.endpoint.command.join(' ')}`);

    child.stdout?.on('data', (data: Buffer) => {
      this.handleStdout(data);
    });

    child.stderr?.on('data', (data: Buffer) => {
      const message = data.toString('utf-8').trim();
      if (message) {
        this.logger.debug(`[${this.name} stderr] ${message}`);
      }
    });

    child.on('close', (code, signal) => {
      this.handleClose(child, code, signal);
    });

    child.on('error', (err) => {
      this.logger.error(`Upstream ${this.name} process error: ${err.message}`);
      this.rejectAll(new UpstreamError(`Upstream ${this.name} failed: ${err.message}`));
    });
  }

  private handleClose(child: ChildProcess, code: number | null, signal: string | null): void {
    if (this.child !== child) return;
    this.child = null;
    this.rejectAll(new UpstreamError(`Upstream ${this.name} exited with code ${code}, signal ${signal}`));
    this.wake();
    if (!this.closed) {
      this.restartCount++;
      this.logger.warn(
        `Upstream ${this.name} exited (code ${code}, signal ${signal}); ` +
          `respawning on next use (${this.restartCount}/${this.maxRestarts})`
      );
    }
  }

  // --------------------------------------------------------------------------
  // Framing
  // --------------------------------------------------------------------------

  private handleStdout(data: Buffer): void {
    if (this.buffer.length + data.length > MAX_STDOUT_BYTES) {
      this.buffer = '';
      this.logger.error(`Upstream ${this.name} stdout line exceeded ${MAX_STDOUT_BYTES} bytes, dropping`);
      return;
    }

    this.buffer += data.toString('utf-8');
    const lines = this.buffer.split('\n');
    this.buffer = lines.pop() ?? '';

    for (const line of lines) {
      const trimmed = line.trim();
      if (!trimmed) continue;
      this.handleLine(trimmed);
    }
  }

  private handleLine(line: string): void {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      this.logger.warn(`Upstream ${this.name} wrote invalid JSON: ${line.slice(0, 100)}`);
      return;
    }

    const items: unknown[] = Array.isArray(parsed) ? parsed : [parsed];
    for (const item of items) {
      const message = toProtocolMessage(item);
      if (!message) {
        this.logger.warn(`Upstream ${this.name} wrote a non-protocol message: ${line.slice(0, 100)}`);
        continue;
      }
      if (isResponse(message) && typeof message.id === 'number' && this.pending.has(message.id)) {
        this.settle(message.id, message);
      } else {
        this.logEvent(message);
      }
    }
  }

  private settle(internalId: number, response: JsonRpcResponse): void {
    const pending = this.pending.get(internalId);
    if (!pending) return;
    this.pending.delete(internalId);
    pending.resolve({ ...response, id: pending.originalId });
  }

  private logEvent(message: ProtocolMessage): void {
    this.events.push({ seq: ++this.eventSeq, message });
    if (this.events.length > this.replayCapacity) {
      this.events.shift();
    }
    this.wake();
  }

  private wake(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const resolve of waiters) resolve();
  }

  private async writeLine(payload: unknown): Promise<void> {
    const stdin = this.child?.stdin;
    if (!stdin?.writable) {
      throw new UpstreamError(`Upstream ${this.name} is not running`);
    }
    if (!stdin.write(`${JSON.stringify(payload)}\n`)) {
      await once(stdin, 'drain');
    }
  }

  // --------------------------------------------------------------------------
  // Correlation
  // --------------------------------------------------------------------------

  private awaitResponse(
    internalId: number,
    originalId: JsonRpcId,
    signal: AbortSignal | undefined
  ): Promise<JsonRpcResponse> {
    return new Promise<JsonRpcResponse>((resolve, reject) => {
      if (signal?.aborted) {
        reject(abortReason(signal));
        return;
      }

      const timeout = setTimeout(() => {
        this.pending.delete(internalId);
        reject(new UpstreamError(`Upstream ${this.name} did not answer within ${this.requestTimeoutMs}ms`));
      }, this.requestTimeoutMs);

      const onAbort = () => {
        clearTimeout(timeout);
        this.pending.delete(internalId);
        reject(signal ? abortReason(signal) : new Error('Request aborted'));
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      this.pending.set(internalId, {
        originalId,
        resolve: (response) => {
          clearTimeout(timeout);
          signal?.removeEventListener('abort', onAbort);
          resolve(response);
        },
        reject: (error) => {
          clearTimeout(timeout);
          signal?.removeEventListener('abort', onAbort);
          reject(error);
        }
      });
    });
  }

  private rejectAll(error: Error): void {
    const pending = [...this.pending.values()];
    this.pending.clear();
    for (const entry of pending) {
      entry.reject(error);
    }
    if (pending.length > 0) {
      this.logger.debug(`Rejected ${pending.length} pending request(s) on ${this.name}: ${errorMessage(error)}`);
    }
  }
}

import { errorMessage, UpstreamError } from '../errors';
import { SESSION_ID_HEADER } from '../protocols/classify';
import type { ProtocolPayload } from '../protocols/jsonrpc';
import { createFetchTransport } from '../runtime/fetch-transport';
import type { Transport } from '../runtime/types';
import type { HttpEndpoint } from '../types';
import {
  type DispatchContext,
  LAST_EVENT_ID_HEADER,
  PROTOCOL_VERSION_HEADER,
  type UpstreamDispatcher
} from './types';

export interface HttpDispatcherOptions {
  transport?: Transport;
}

/**
 * Streamable-HTTP upstream: POST for messages, GET for the server stream,
 * DELETE to end the session.
 */
export class HttpDispatcher implements UpstreamDispatcher {
  readonly kind = 'http' as const;
  private readonly transport: Transport;

  constructor(
    private readonly endpoint: HttpEndpoint,
    options: HttpDispatcherOptions = {}
  ) {
    this.transport = options.transport ?? createFetchTransport();
  }

  get name(): string {
    return this.endpoint.name;
  }

  async send(payload: ProtocolPayload, ctx: DispatchContext): Promise<Response> {
    const headers = this.buildHeaders(ctx);
    headers.set('accept', 'application/json, text/event-stream');
    headers.set('content-type', 'application/json');
    return await this.request('POST', { headers, body: JSON.stringify(payload) }, ctx);
  }

  async openStream(ctx: DispatchContext): Promise<Response> {
    const headers = this.buildHeaders(ctx);
    headers.set('accept', 'text/event-stream');
    if (ctx.lastEventId !== undefined) {
      headers.set(LAST_EVENT_ID_HEADER, ctx.lastEventId);
    }
    return await this.request('GET', { headers }, ctx);
  }

  async terminate(ctx: DispatchContext): Promise<void> {
    // Without an upstream session there is nothing to end
    if (!ctx.upstreamSessionId) return;
    const response = await this.request('DELETE', { headers: this.buildHeaders(ctx) }, ctx);
    await response.body?.cancel();
    // 405: the upstream does not let clients end sessions
    if (!response.ok && response.status !== 404 && response.status !== 405) {
      throw new UpstreamError(`Upstream ${this.name} refused session termination`, response.status);
    }
  }

  async close(): Promise<void> {
    // Stateless: nothing pooled beyond what fetch owns
  }

  private buildHeaders(ctx: DispatchContext): Headers {
    const headers = new Headers(this.endpoint.headers);
    if (ctx.upstreamSessionId) headers.set(SESSION_ID_HEADER, ctx.upstreamSessionId);
    if (ctx.protocolVersion) headers.set(PROTOCOL_VERSION_HEADER, ctx.protocolVersion);
    return headers;
  }

  private async request(method: string, init: RequestInit, ctx: DispatchContext): Promise<Response> {
    try {
      return await this.transport.fetch(
        this.endpoint.url,
        { ...init, method },
        ctx.signal ? { signal: ctx.signal } : {}
      );
    } catch (err) {
      if (ctx.signal?.aborted) throw err;
      throw new UpstreamError(`Upstream ${this.name} unreachable: ${errorMessage(err)}`);
    }
  }
}

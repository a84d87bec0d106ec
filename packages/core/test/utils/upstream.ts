import type { ProtocolPayload } from '../../src/protocols/jsonrpc';
import type { DispatchContext, UpstreamDispatcher } from '../../src/upstream/types';

type Handler<A extends unknown[]> = (...args: A) => Response | Promise<Response>;

export type FakeUpstreamHandlers = {
  send?: Handler<[ProtocolPayload, DispatchContext]>;
  openStream?: Handler<[DispatchContext, number]>;
};

/**
 * In-process upstream that records every call and answers from handlers.
 */
export class FakeUpstream implements UpstreamDispatcher {
  readonly kind = 'http' as const;
  readonly sent: Array<{ payload: ProtocolPayload; ctx: DispatchContext }> = [];
  readonly streamRequests: DispatchContext[] = [];
  terminated = 0;
  closed = false;

  constructor(
    private readonly handlers: FakeUpstreamHandlers = {},
    readonly name = 'default'
  ) {}

  async send(payload: ProtocolPayload, ctx: DispatchContext): Promise<Response> {
    this.sent.push({ payload, ctx });
    if (!this.handlers.send) return new Response(null, { status: 202 });
    return await this.handlers.send(payload, ctx);
  }

  async openStream(ctx: DispatchContext): Promise<Response> {
    this.streamRequests.push(ctx);
    if (!this.handlers.openStream) return new Response(null, { status: 405 });
    return await this.handlers.openStream(ctx, this.streamRequests.length);
  }

  async terminate(): Promise<void> {
    this.terminated++;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

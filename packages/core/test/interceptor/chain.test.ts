import { describe, expect, test, vi } from 'vitest';
import { InterceptorChain } from '../../src/interceptor/chain';
import { defineInterceptor, Intercept, type InterceptAction, type InterceptContext } from '../../src/interceptor/types';
import type { ProtocolMessage } from '../../src/protocols/jsonrpc';
import { createRecordingLogger } from '../utils/logger';

const ctx: InterceptContext = {
  sessionId: 's1',
  direction: 'inbound',
  upstreamName: 'primary',
  clientTransport: 'http',
  upstreamTransport: 'http'
};

const ping: ProtocolMessage = { jsonrpc: '2.0', id: 1, method: 'ping' };

describe('InterceptorChain', () => {
  test('an empty chain forwards the message untouched', async () => {
    const outcome = await new InterceptorChain().run(ping, ctx);
    expect(outcome).toEqual({ type: 'forward', message: ping, modified: false });
  });

  test('each interceptor sees the previous modification', async () => {
    const seen: ProtocolMessage[] = [];
    const chain = new InterceptorChain([
      defineInterceptor({
        name: 'rename',
        process: () => Intercept.modify({ jsonrpc: '2.0', id: 1, method: 'tools/list' })
      }),
      defineInterceptor({
        name: 'observe',
        process: (message) => {
          seen.push(message);
          return Intercept.continue();
        }
      })
    ]);

    const outcome = await chain.run(ping, ctx);
    expect(seen).toEqual([{ jsonrpc: '2.0', id: 1, method: 'tools/list' }]);
    expect(outcome).toEqual({
      type: 'forward',
      message: { jsonrpc: '2.0', id: 1, method: 'tools/list' },
      modified: true
    });
  });

  test('block stops the chain and names the interceptor', async () => {
    const later = vi.fn(() => Intercept.continue());
    const chain = new InterceptorChain([
      defineInterceptor({ name: 'deny', process: () => Intercept.block('not today') }),
      defineInterceptor({ name: 'later', process: later })
    ]);

    expect(await chain.run(ping, ctx)).toEqual({ type: 'block', reason: 'not today', interceptor: 'deny' });
    expect(later).not.toHaveBeenCalled();
  });

  test('defer leaves the decision to the rest of the chain', async () => {
    const chain = new InterceptorChain().use(defineInterceptor({ name: 'unsure', process: () => Intercept.defer() }));
    expect(chain.size).toBe(1);
    expect(await chain.run(ping, ctx)).toEqual({ type: 'forward', message: ping, modified: false });
  });

  test('a slow interceptor times out and counts as continue', async () => {
    const logger = createRecordingLogger();
    const chain = new InterceptorChain(
      [
        defineInterceptor({
          name: 'slow',
          process: () => new Promise<InterceptAction>((resolve) => setTimeout(() => resolve(Intercept.block('late')), 200))
        })
      ],
      { timeoutMs: 10, logger }
    );

    expect(await chain.run(ping, ctx)).toEqual({ type: 'forward', message: ping, modified: false });
    expect(logger.lines).toEqual(['[test] Interceptor "slow" timed out after 10ms; continuing']);
  });

  test('a throwing interceptor counts as continue', async () => {
    const logger = createRecordingLogger();
    const chain = new InterceptorChain(
      [
        defineInterceptor({
          name: 'broken',
          process: () => {
            throw new Error('boom');
          }
        })
      ],
      { logger }
    );
    expect((await chain.run(ping, ctx)).type).toBe('forward');
    expect(logger.lines).toEqual(['[test] boom; continuing']);
  });
});

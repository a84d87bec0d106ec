import { describe, expect, test } from 'vitest';
import { createMethodFilterInterceptor } from '../../src/interceptor/method-filter';
import type { InterceptContext } from '../../src/interceptor/types';

const inbound: InterceptContext = {
  sessionId: 's1',
  direction: 'inbound',
  upstreamName: 'primary',
  clientTransport: 'http',
  upstreamTransport: 'sse'
};
const outbound: InterceptContext = { ...inbound, direction: 'outbound' };

describe('createMethodFilterInterceptor', () => {
  const filter = createMethodFilterInterceptor({ block: ['tools/call', 'sampling/*'] });

  test('blocks exact method names', async () => {
    expect(await filter.process({ jsonrpc: '2.0', id: 1, method: 'tools/call' }, inbound)).toEqual({
      type: 'block',
      reason: "method 'tools/call' is blocked by rule 'tools/call'"
    });
  });

  test('blocks by prefix rule', async () => {
    const action = await filter.process({ jsonrpc: '2.0', id: 2, method: 'sampling/createMessage' }, outbound);
    expect(action).toEqual({
      type: 'block',
      reason: "method 'sampling/createMessage' is blocked by rule 'sampling/*'"
    });
  });

  test('lets other methods continue', async () => {
    expect(await filter.process({ jsonrpc: '2.0', method: 'notifications/progress' }, inbound)).toEqual({
      type: 'continue'
    });
  });

  test('defers on responses, which carry no method', async () => {
    expect(await filter.process({ jsonrpc: '2.0', id: 1, result: {} }, outbound)).toEqual({ type: 'defer' });
  });

  test('a direction restriction defers for the other direction', async () => {
    const inboundOnly = createMethodFilterInterceptor({ block: ['ping'], direction: 'inbound' });
    expect(await inboundOnly.process({ jsonrpc: '2.0', id: 1, method: 'ping' }, outbound)).toEqual({ type: 'defer' });
    expect((await inboundOnly.process({ jsonrpc: '2.0', id: 1, method: 'ping' }, inbound)).type).toBe('block');
  });
});

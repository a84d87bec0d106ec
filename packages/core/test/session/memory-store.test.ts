import { describe, expect, test } from 'vitest';
import { SessionNotFoundError, ValidationError } from '../../src/errors';
import { MemorySessionStore } from '../../src/session/memory-store';
import type { CreateSessionInput } from '../../src/types';

const input: CreateSessionInput = {
  clientTransport: 'http',
  upstreamTransport: 'sse',
  upstreamName: 'primary',
  protocolVersion: '2025-03-26'
};

function createStore(options: { maxHistoryEntries?: number } = {}) {
  let clock = 1000;
  let nextId = 0;
  const store = new MemorySessionStore({
    ...options,
    now: () => clock,
    generateId: () => `session-${++nextId}`
  });
  return { store, tick: (ms: number) => (clock += ms) };
}

describe('MemorySessionStore sessions', () => {
  test('creates sessions with generated ids and timestamps', async () => {
    const { store } = createStore();
    const session = await store.createSession(input);
    expect(session).toEqual({ ...input, id: 'session-1', createdAt: 1000, lastUsedAt: 1000 });
    expect(await store.getSession('session-1')).toEqual(session);
  });

  test('refuses a duplicate explicit id', async () => {
    const { store } = createStore();
    await store.createSession({ ...input, id: 'fixed' });
    await expect(store.createSession({ ...input, id: 'fixed' })).rejects.toThrow(ValidationError);
  });

  test('returned records are copies', async () => {
    const { store } = createStore();
    const session = await store.createSession(input);
    session.protocolVersion = 'mutated';
    expect((await store.getSession(session.id))?.protocolVersion).toBe('2025-03-26');
  });

  test('update patches fields and bumps lastUsedAt monotonically', async () => {
    const { store } = createStore();
    const session = await store.createSession(input);
    const updated = await store.updateSession(session.id, { upstreamSessionId: 'up-1' });
    expect(updated.upstreamSessionId).toBe('up-1');
    // The clock has not moved, so the bump is +1
    expect(updated.lastUsedAt).toBe(1001);
  });

  test('update of an unknown session throws', async () => {
    const { store } = createStore();
    await expect(store.updateSession('missing', {})).rejects.toThrow(SessionNotFoundError);
  });

  test('delete reports whether the session existed', async () => {
    const { store } = createStore();
    const session = await store.createSession(input);
    expect(await store.deleteSession(session.id)).toBe(true);
    expect(await store.deleteSession(session.id)).toBe(false);
    expect(await store.getSession(session.id)).toBeUndefined();
  });

  test('lists sessions across buckets', async () => {
    const { store } = createStore();
    await store.createSession(input);
    await store.createSession(input);
    await store.createSession(input);
    const ids = (await store.listSessions()).map((session) => session.id).sort();
    expect(ids).toEqual(['session-1', 'session-2', 'session-3']);
  });
});

describe('MemorySessionStore resumption marker', () => {
  test('set, read and clear', async () => {
    const { store } = createStore();
    const session = await store.createSession(input);
    expect(await store.getLastEventId(session.id)).toBeUndefined();
    await store.setLastEventId(session.id, '42');
    expect(await store.getLastEventId(session.id)).toBe('42');
    await store.setLastEventId(session.id, null);
    expect(await store.getLastEventId(session.id)).toBeUndefined();
  });

  test('concurrent marker writes to one session land in call order', async () => {
    const { store } = createStore();
    const session = await store.createSession(input);
    await Promise.all(['1', '2', '3', '4'].map((id) => store.setLastEventId(session.id, id)));
    expect(await store.getLastEventId(session.id)).toBe('4');
  });
});

describe('MemorySessionStore history', () => {
  test('appends with increasing seq and pages with afterSeq/limit', async () => {
    const { store } = createStore();
    const session = await store.createSession(input);
    for (const id of [1, 2, 3]) {
      await store.appendHistory(session.id, {
        direction: 'inbound',
        message: { jsonrpc: '2.0', id, method: 'ping' }
      });
    }
    const page = await store.listHistory(session.id, { afterSeq: 1, limit: 1 });
    expect(page).toEqual([
      { seq: 2, direction: 'inbound', message: { jsonrpc: '2.0', id: 2, method: 'ping' }, recordedAt: 1000 }
    ]);
  });

  test('keeps only the newest entries', async () => {
    const { store } = createStore({ maxHistoryEntries: 2 });
    const session = await store.createSession(input);
    for (const method of ['a', 'b', 'c']) {
      await store.appendHistory(session.id, { direction: 'outbound', message: { jsonrpc: '2.0', method } });
    }
    const seqs = (await store.listHistory(session.id)).map((entry) => entry.seq);
    expect(seqs).toEqual([2, 3]);
  });

  test('deleteHistory drops entries but keeps the session', async () => {
    const { store } = createStore();
    const session = await store.createSession(input);
    await store.appendHistory(session.id, { direction: 'inbound', message: { jsonrpc: '2.0', method: 'ping' } });

    await store.deleteHistory(session.id);

    expect(await store.listHistory(session.id)).toEqual([]);
    expect((await store.getSession(session.id))?.id).toBe(session.id);
  });

  test('append to an unknown session throws', async () => {
    const { store } = createStore();
    await expect(
      store.appendHistory('missing', { direction: 'inbound', message: { jsonrpc: '2.0', method: 'x' } })
    ).rejects.toThrow(SessionNotFoundError);
  });
});

describe('MemorySessionStore batch', () => {
  test('getSessions omits unknown ids', async () => {
    const { store } = createStore();
    const session = await store.createSession(input);
    const found = await store.getSessions([session.id, 'missing']);
    expect([...found.keys()]).toEqual([session.id]);
  });

  test('updateSessions skips unknown ids', async () => {
    const { store, tick } = createStore();
    const session = await store.createSession(input);
    tick(500);
    const updated = await store.updateSessions([
      { sessionId: session.id, patch: { protocolVersion: '2025-06-18' } },
      { sessionId: 'missing', patch: { protocolVersion: 'x' } }
    ]);
    expect(updated).toHaveLength(1);
    expect(updated[0]?.protocolVersion).toBe('2025-06-18');
    expect(updated[0]?.lastUsedAt).toBe(1500);
  });
});

import { randomUUID } from 'node:crypto';
import { SessionNotFoundError, ValidationError } from '../errors';
import type {
  CreateSessionInput,
  HistoryEntry,
  ListHistoryOptions,
  NewHistoryEntry,
  SessionPatch,
  SessionRecord,
  SessionUpdate
} from '../types';
import type { SessionStore } from './store';

export const DEFAULT_BUCKET_COUNT = 16;
export const DEFAULT_MAX_HISTORY_ENTRIES = 500;

export interface MemorySessionStoreOptions {
  bucketCount?: number;
  /** History entries kept per session; oldest are dropped first */
  maxHistoryEntries?: number;
  now?: () => number;
  generateId?: () => string;
}

/**
 * Promise-chain mutex. Holders never await anything but their own critical
 * section, so no suspension happens while another bucket waits.
 */
class Mutex {
  private tail: Promise<void> = Promise.resolve();

  async run<T>(fn: () => T | Promise<T>): Promise<T> {
    const prev = this.tail;
    let release: (() => void) | undefined;
    this.tail = new Promise<void>((resolve) => {
      release = resolve;
    });
    await prev;
    try {
      return await fn();
    } finally {
      release?.();
    }
  }
}

type Bucket = {
  lock: Mutex;
  sessions: Map<string, SessionRecord>;
  history: Map<string, { nextSeq: number; entries: HistoryEntry[] }>;
};

function hashKey(key: string): number {
  // FNV-1a, 32-bit
  let hash = 0x811c9dc5;
  for (let i = 0; i < key.length; i++) {
    hash ^= key.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

function copy(record: SessionRecord): SessionRecord {
  return { ...record };
}

/**
 * In-process reference store. State lives for the process lifetime only.
 *
 * Sessions are spread over fixed buckets, each guarded by its own mutex, so
 * operations are atomic per session id while unrelated sessions proceed.
 */
export class MemorySessionStore implements SessionStore {
  private readonly buckets: Bucket[];
  private readonly maxHistoryEntries: number;
  private readonly now: () => number;
  private readonly generateId: () => string;

  constructor(options: MemorySessionStoreOptions = {}) {
    const bucketCount = options.bucketCount ?? DEFAULT_BUCKET_COUNT;
    if (!Number.isInteger(bucketCount) || bucketCount < 1) {
      throw new ValidationError(`bucketCount must be a positive integer, got ${bucketCount}`);
    }
    this.buckets = Array.from({ length: bucketCount }, () => ({
      lock: new Mutex(),
      sessions: new Map<string, SessionRecord>(),
      history: new Map<string, { nextSeq: number; entries: HistoryEntry[] }>()
    }));
    this.maxHistoryEntries = options.maxHistoryEntries ?? DEFAULT_MAX_HISTORY_ENTRIES;
    this.now = options.now ?? Date.now;
    this.generateId = options.generateId ?? randomUUID;
  }

  private bucketFor(sessionId: string): Bucket {
    const bucket = this.buckets[hashKey(sessionId) % this.buckets.length];
    if (!bucket) {
      throw new Error(`No bucket for session '${sessionId}'`);
    }
    return bucket;
  }

  private withBucket<T>(sessionId: string, fn: (bucket: Bucket) => T): Promise<T> {
    const bucket = this.bucketFor(sessionId);
    return bucket.lock.run(() => fn(bucket));
  }

  private bumpTime(prev: number): number {
    const n = this.now();
    return n > prev ? n : prev + 1;
  }

  private applyPatch(record: SessionRecord, patch: SessionPatch): void {
    if (patch.protocolVersion !== undefined) record.protocolVersion = patch.protocolVersion;
    if (patch.upstreamSessionId !== undefined) record.upstreamSessionId = patch.upstreamSessionId;
    if (patch.lastEventId === null) {
      delete record.lastEventId;
    } else if (patch.lastEventId !== undefined) {
      record.lastEventId = patch.lastEventId;
    }
    record.lastUsedAt =
      patch.lastUsedAt !== undefined ? patch.lastUsedAt : this.bumpTime(record.lastUsedAt);
  }

  // --------------------------------------------------------------------------
  // Sessions
  // --------------------------------------------------------------------------

  async createSession(input: CreateSessionInput): Promise<SessionRecord> {
    const id = input.id ?? this.generateId();
    return this.withBucket(id, (bucket) => {
      if (bucket.sessions.has(id)) {
        throw new ValidationError(`Session '${id}' already exists`);
      }
      const now = this.now();
      const record: SessionRecord = {
        id,
        clientTransport: input.clientTransport,
        upstreamTransport: input.upstreamTransport,
        upstreamName: input.upstreamName,
        protocolVersion: input.protocolVersion,
        createdAt: now,
        lastUsedAt: now
      };
      if (input.upstreamSessionId !== undefined) {
        record.upstreamSessionId = input.upstreamSessionId;
      }
      bucket.sessions.set(id, record);
      return copy(record);
    });
  }

  async getSession(sessionId: string): Promise<SessionRecord | undefined> {
    return this.withBucket(sessionId, (bucket) => {
      const record = bucket.sessions.get(sessionId);
      return record ? copy(record) : undefined;
    });
  }

  async updateSession(sessionId: string, patch: SessionPatch): Promise<SessionRecord> {
    return this.withBucket(sessionId, (bucket) => {
      const record = bucket.sessions.get(sessionId);
      if (!record) {
        throw new SessionNotFoundError(sessionId);
      }
      this.applyPatch(record, patch);
      return copy(record);
    });
  }

  async deleteSession(sessionId: string): Promise<boolean> {
    return this.withBucket(sessionId, (bucket) => {
      bucket.history.delete(sessionId);
      return bucket.sessions.delete(sessionId);
    });
  }

  async listSessions(): Promise<SessionRecord[]> {
    const perBucket = await Promise.all(
      this.buckets.map((bucket) =>
        bucket.lock.run(() => Array.from(bucket.sessions.values(), copy))
      )
    );
    return perBucket.flat();
  }

  // --------------------------------------------------------------------------
  // History
  // --------------------------------------------------------------------------

  async appendHistory(sessionId: string, entry: NewHistoryEntry): Promise<HistoryEntry> {
    return this.withBucket(sessionId, (bucket) => {
      if (!bucket.sessions.has(sessionId)) {
        throw new SessionNotFoundError(sessionId);
      }
      let log = bucket.history.get(sessionId);
      if (!log) {
        log = { nextSeq: 1, entries: [] };
        bucket.history.set(sessionId, log);
      }
      const stored: HistoryEntry = {
        ...entry,
        seq: log.nextSeq++,
        recordedAt: entry.recordedAt ?? this.now()
      };
      log.entries.push(stored);
      if (log.entries.length > this.maxHistoryEntries) {
        log.entries.splice(0, log.entries.length - this.maxHistoryEntries);
      }
      return { ...stored };
    });
  }

  async listHistory(sessionId: string, options: ListHistoryOptions = {}): Promise<HistoryEntry[]> {
    return this.withBucket(sessionId, (bucket) => {
      const entries = bucket.history.get(sessionId)?.entries ?? [];
      const afterSeq = options.afterSeq ?? 0;
      const filtered = entries.filter((entry) => entry.seq > afterSeq);
      const limited = options.limit !== undefined ? filtered.slice(0, options.limit) : filtered;
      return limited.map((entry) => ({ ...entry }));
    });
  }

  async deleteHistory(sessionId: string): Promise<void> {
    await this.withBucket(sessionId, (bucket) => {
      bucket.history.delete(sessionId);
    });
  }

  // --------------------------------------------------------------------------
  // Resumption marker
  // --------------------------------------------------------------------------

  async getLastEventId(sessionId: string): Promise<string | undefined> {
    return this.withBucket(sessionId, (bucket) => bucket.sessions.get(sessionId)?.lastEventId);
  }

  async setLastEventId(sessionId: string, eventId: string | null): Promise<void> {
    await this.updateSession(sessionId, { lastEventId: eventId });
  }

  // --------------------------------------------------------------------------
  // Batch
  // --------------------------------------------------------------------------

  async getSessions(sessionIds: string[]): Promise<Map<string, SessionRecord>> {
    const found = await Promise.all(sessionIds.map((id) => this.getSession(id)));
    const result = new Map<string, SessionRecord>();
    for (const record of found) {
      if (record) result.set(record.id, record);
    }
    return result;
  }

  async updateSessions(updates: SessionUpdate[]): Promise<SessionRecord[]> {
    const results = await Promise.all(
      updates.map(({ sessionId, patch }) =>
        this.withBucket(sessionId, (bucket) => {
          const record = bucket.sessions.get(sessionId);
          if (!record) return undefined;
          this.applyPatch(record, patch);
          return copy(record);
        })
      )
    );
    return results.filter((record): record is SessionRecord => record !== undefined);
  }

  async close(): Promise<void> {
    await Promise.all(
      this.buckets.map((bucket) =>
        bucket.lock.run(() => {
          bucket.sessions.clear();
          bucket.history.clear();
        })
      )
    );
  }
}

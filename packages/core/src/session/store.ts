import type {
  CreateSessionInput,
  HistoryEntry,
  ListHistoryOptions,
  NewHistoryEntry,
  SessionPatch,
  SessionRecord,
  SessionUpdate
} from '../types';

/**
 * Pluggable session persistence.
 *
 * Every operation is asynchronous and atomic per session id; no cross-session
 * transactions are required. Implementations throw `SessionNotFoundError` for
 * unknown ids on mutating calls and `StoreUnavailableError` when the backing
 * store cannot be reached. The batch calls exist so a networked backend can
 * coalesce round trips.
 */
export interface SessionStore {
  // --- Sessions ---
  createSession(input: CreateSessionInput): Promise<SessionRecord>;
  getSession(sessionId: string): Promise<SessionRecord | undefined>;
  updateSession(sessionId: string, patch: SessionPatch): Promise<SessionRecord>;
  /** Returns false when the session did not exist */
  deleteSession(sessionId: string): Promise<boolean>;
  listSessions(): Promise<SessionRecord[]>;

  // --- Message history ---
  appendHistory(sessionId: string, entry: NewHistoryEntry): Promise<HistoryEntry>;
  listHistory(sessionId: string, options?: ListHistoryOptions): Promise<HistoryEntry[]>;
  deleteHistory(sessionId: string): Promise<void>;

  // --- Resumption marker ---
  getLastEventId(sessionId: string): Promise<string | undefined>;
  /** `null` clears the marker */
  setLastEventId(sessionId: string, eventId: string | null): Promise<void>;

  // --- Batch ---
  /** Missing ids are absent from the result */
  getSessions(sessionIds: string[]): Promise<Map<string, SessionRecord>>;
  /** Applies each update atomically per session; unknown ids are skipped */
  updateSessions(updates: SessionUpdate[]): Promise<SessionRecord[]>;

  close(): Promise<void>;
}

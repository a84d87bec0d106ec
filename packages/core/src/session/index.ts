export { DEFAULT_DEDUP_CAPACITY, EventTracker, EventTrackerRegistry } from './event-tracker';
export {
  DEFAULT_BUCKET_COUNT,
  DEFAULT_MAX_HISTORY_ENTRIES,
  MemorySessionStore,
  type MemorySessionStoreOptions
} from './memory-store';
export { readMarkerOrNone, WriteBehindQueue, writeBestEffort } from './resilience';
export type { SessionStore } from './store';

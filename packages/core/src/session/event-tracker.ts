export const DEFAULT_DEDUP_CAPACITY = 1024;

/**
 * Per-session delivery position plus a bounded recency set of event ids.
 *
 * The recency set keeps insertion order and evicts its oldest entry once
 * `capacity` is reached. Duplicates older than the window pass through again;
 * size the capacity to the upstream's replay window.
 */
export class EventTracker {
  private readonly recent = new Set<string>();
  private last: string | undefined;

  constructor(
    readonly capacity: number = DEFAULT_DEDUP_CAPACITY,
    initialLastId?: string
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`EventTracker capacity must be a positive integer, got ${capacity}`);
    }
    if (initialLastId !== undefined) {
      this.record(initialLastId);
    }
  }

  /**
   * Record a delivered id. Returns false, leaving state untouched, when the id
   * is still inside the recency window.
   */
  record(id: string): boolean {
    if (this.recent.has(id)) {
      return false;
    }
    if (this.recent.size >= this.capacity) {
      const oldest = this.recent.values().next();
      if (!oldest.done) {
        this.recent.delete(oldest.value);
      }
    }
    this.recent.add(id);
    this.last = id;
    return true;
  }

  lastId(): string | undefined {
    return this.last;
  }

  has(id: string): boolean {
    return this.recent.has(id);
  }

  get size(): number {
    return this.recent.size;
  }

  reset(): void {
    this.recent.clear();
    this.last = undefined;
  }

  /**
   * Move the position back to `id`, forgetting every id recorded after it.
   * An id outside the window restarts the tracker from that id alone;
   * undefined empties it.
   */
  rewind(id: string | undefined): void {
    if (id === undefined || !this.recent.has(id)) {
      this.reset();
      if (id !== undefined) this.record(id);
      return;
    }
    let after = false;
    for (const seen of [...this.recent]) {
      if (after) {
        this.recent.delete(seen);
      } else if (seen === id) {
        after = true;
      }
    }
    this.last = id;
  }
}

/**
 * Trackers keyed by session id; created lazily with a shared capacity.
 */
export class EventTrackerRegistry {
  private readonly trackers = new Map<string, EventTracker>();

  constructor(private readonly capacity: number = DEFAULT_DEDUP_CAPACITY) {}

  get(sessionId: string, initialLastId?: string): EventTracker {
    let tracker = this.trackers.get(sessionId);
    if (!tracker) {
      tracker = new EventTracker(this.capacity, initialLastId);
      this.trackers.set(sessionId, tracker);
    }
    return tracker;
  }

  peek(sessionId: string): EventTracker | undefined {
    return this.trackers.get(sessionId);
  }

  delete(sessionId: string): void {
    this.trackers.delete(sessionId);
  }

  clear(): void {
    this.trackers.clear();
  }
}

import { errorMessage } from '../errors';
import type { Logger } from '../logger';
import type { SessionStore } from './store';

/**
 * Read the stored resumption marker. Any store failure reads as "no marker":
 * the stream restarts rather than the request failing.
 */
export async function readMarkerOrNone(
  store: SessionStore,
  sessionId: string,
  logger: Logger
): Promise<string | undefined> {
  try {
    return await store.getLastEventId(sessionId);
  } catch (err) {
    logger.warn(`Resumption marker unavailable for session ${sessionId}: ${errorMessage(err)}`);
    return undefined;
  }
}

/**
 * Run a store write, retrying once on failure, then give up with a warning.
 * Resolves to whether the write landed; never rejects.
 */
export async function writeBestEffort(
  description: string,
  write: () => Promise<unknown>,
  logger: Logger
): Promise<boolean> {
  try {
    await write();
    return true;
  } catch (first) {
    logger.debug(`${description} failed, retrying once: ${errorMessage(first)}`);
  }
  try {
    await write();
    return true;
  } catch (second) {
    logger.warn(`${description} dropped after retry: ${errorMessage(second)}`);
    return false;
  }
}

/**
 * Serializes write-behind persistence for one stream so markers land in
 * delivery order without the pipeline awaiting them.
 */
export class WriteBehindQueue {
  private tail: Promise<unknown> = Promise.resolve();
  private pending = 0;

  constructor(private readonly logger: Logger) {}

  enqueue(description: string, write: () => Promise<unknown>): void {
    this.pending++;
    this.tail = this.tail
      .then(() => writeBestEffort(description, write, this.logger))
      .finally(() => {
        this.pending--;
      });
  }

  get size(): number {
    return this.pending;
  }

  /** Resolves once every queued write has settled */
  async flush(): Promise<void> {
    await this.tail;
  }
}

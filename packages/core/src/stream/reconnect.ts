import { setTimeout as sleepFor } from 'node:timers/promises';
import { errorMessage, ReconnectExhaustedError } from '../errors';
import { type Logger, silentLogger } from '../logger';
import { type ClassifiedResponse, classifyResponse } from '../protocols/classify';

// ============================================================================
// Backoff policy
// ============================================================================

export interface ReconnectPolicy {
  /** Consecutive attempts without progress before giving up */
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  /** Random spread as a fraction of the nominal delay (0.2 = ±20%) */
  jitter: number;
}

export const DEFAULT_RECONNECT_POLICY: ReconnectPolicy = {
  maxAttempts: 5,
  initialDelayMs: 250,
  maxDelayMs: 10_000,
  multiplier: 2,
  jitter: 0.2
};

/**
 * Delay before the given (1-based) attempt.
 * `random` must return a value in [0, 1); 0.5 yields the nominal delay.
 */
export function computeBackoffDelay(
  attempt: number,
  policy: ReconnectPolicy,
  random: () => number = Math.random
): number {
  const exponent = Math.max(0, attempt - 1);
  const nominal = Math.min(policy.maxDelayMs, policy.initialDelayMs * policy.multiplier ** exponent);
  const spread = nominal * policy.jitter * (random() * 2 - 1);
  return Math.round(Math.min(policy.maxDelayMs, Math.max(0, nominal + spread)));
}

// ============================================================================
// Reconnection state machine
// ============================================================================

export type StreamState = 'streaming' | 'reconnecting' | 'closed';

/**
 * Re-issue the upstream stream request carrying the resumption marker.
 */
export type ResumeFn = (
  lastEventId: string | undefined,
  attempt: number,
  signal: AbortSignal
) => Promise<Response>;

export type SleepFn = (ms: number, signal: AbortSignal) => Promise<void>;

export interface ReconnectionManagerOptions {
  resume: ResumeFn;
  policy?: Partial<ReconnectPolicy>;
  logger?: Logger;
  random?: () => number;
  sleep?: SleepFn;
  onStateChange?: (state: StreamState, previous: StreamState) => void;
}

const defaultSleep: SleepFn = async (ms, signal) => {
  await sleepFor(ms, undefined, { signal });
};

/**
 * Owns the Streaming → Reconnecting → Streaming | Closed transitions of one
 * upstream stream.
 *
 * The attempt counter only resets when the consumer reports progress, so a
 * stream that reconnects and immediately drops again still exhausts the
 * budget.
 */
export class ReconnectionManager {
  readonly policy: ReconnectPolicy;
  private current: StreamState = 'streaming';
  private consecutiveAttempts = 0;
  private totalAttempts = 0;
  private readonly logger: Logger;
  private readonly random: () => number;
  private readonly sleep: SleepFn;

  constructor(private readonly options: ReconnectionManagerOptions) {
    this.policy = { ...DEFAULT_RECONNECT_POLICY, ...options.policy };
    this.logger = options.logger ?? silentLogger;
    this.random = options.random ?? Math.random;
    this.sleep = options.sleep ?? defaultSleep;
  }

  get state(): StreamState {
    return this.current;
  }

  get attempts(): number {
    return this.consecutiveAttempts;
  }

  /** Attempts made over the manager's lifetime, progress or not */
  get attemptsTotal(): number {
    return this.totalAttempts;
  }

  /**
   * An event reached the client; the next disconnect starts a fresh budget.
   */
  noteProgress(): void {
    this.consecutiveAttempts = 0;
  }

  close(): void {
    this.transition('closed');
  }

  /**
   * Resume the stream after `lastEventId`. Resolves with a classified event
   * stream response whose body is still unread. Non-stream or non-2xx answers
   * count as failed attempts and their bodies are discarded unread.
   *
   * @throws ReconnectExhaustedError when the attempt budget runs out
   * @throws the abort reason when `signal` fires
   */
  async reconnect(lastEventId: string | undefined, signal: AbortSignal): Promise<ClassifiedResponse> {
    if (this.current === 'closed') {
      throw new ReconnectExhaustedError(this.consecutiveAttempts, lastEventId);
    }
    this.transition('reconnecting');

    while (this.consecutiveAttempts < this.policy.maxAttempts) {
      this.consecutiveAttempts++;
      this.totalAttempts++;
      const attempt = this.consecutiveAttempts;
      const delayMs = computeBackoffDelay(attempt, this.policy, this.random);

      this.logger.debug(
        `Reconnect attempt ${attempt}/${this.policy.maxAttempts} in ${delayMs}ms (last id: ${lastEventId ?? 'none'})`
      );

      signal.throwIfAborted();
      await this.sleep(delayMs, signal);
      signal.throwIfAborted();

      let classified: ClassifiedResponse;
      try {
        classified = classifyResponse(await this.options.resume(lastEventId, attempt, signal));
      } catch (err) {
        signal.throwIfAborted();
        this.logger.warn(`Reconnect attempt ${attempt} failed: ${errorMessage(err)}`);
        continue;
      }

      const status = classified.meta.status;
      if (status >= 200 && status < 300 && classified.strategy === 'stream') {
        this.transition('streaming');
        return classified;
      }

      this.logger.warn(
        `Reconnect attempt ${attempt} rejected: status ${status}, content ${classified.meta.category}`
      );
      await classified.body.discard();
    }

    this.transition('closed');
    throw new ReconnectExhaustedError(this.consecutiveAttempts, lastEventId);
  }

  private transition(next: StreamState): void {
    const previous = this.current;
    if (previous === next || previous === 'closed') return;
    this.current = next;
    this.options.onStateChange?.(next, previous);
  }
}

import { errorMessage } from '../errors';
import { type Logger, silentLogger } from '../logger';
import type { ProtocolMessage } from '../protocols/jsonrpc';
import type { ChainOutcome, InterceptAction, InterceptContext, Interceptor } from './types';

export const DEFAULT_INTERCEPTOR_TIMEOUT_MS = 5000;

class InterceptorTimeoutError extends Error {
  constructor(name: string, timeoutMs: number) {
    super(`Interceptor "${name}" timed out after ${timeoutMs}ms`);
    this.name = 'InterceptorTimeoutError';
  }
}

async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, onTimeout: () => Error): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => reject(onTimeout()), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    if (timeoutId !== undefined) {
      clearTimeout(timeoutId);
    }
  }
}

export interface InterceptorChainOptions {
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Ordered interceptor pipeline.
 *
 * Each interceptor sees the output of the previous one. A timeout or a thrown
 * error degrades to `continue` for that interceptor (logged, never retried).
 */
export class InterceptorChain {
  private readonly interceptors: Interceptor[];
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(interceptors: Interceptor[] = [], options: InterceptorChainOptions = {}) {
    this.interceptors = [...interceptors];
    this.timeoutMs = options.timeoutMs ?? DEFAULT_INTERCEPTOR_TIMEOUT_MS;
    this.logger = options.logger ?? silentLogger;
  }

  get size(): number {
    return this.interceptors.length;
  }

  use(interceptor: Interceptor): this {
    this.interceptors.push(interceptor);
    return this;
  }

  async run(message: ProtocolMessage, ctx: InterceptContext): Promise<ChainOutcome> {
    let current = message;
    let modified = false;

    for (const interceptor of this.interceptors) {
      const action = await this.invoke(interceptor, current, ctx);

      switch (action.type) {
        case 'block':
          this.logger.debug(
            `${interceptor.name} blocked ${ctx.direction} message in session ${ctx.sessionId}: ${action.reason}`
          );
          return { type: 'block', reason: action.reason, interceptor: interceptor.name };
        case 'modify':
          current = action.message;
          modified = true;
          break;
        case 'continue':
        case 'defer':
          break;
      }
    }

    return { type: 'forward', message: current, modified };
  }

  private async invoke(
    interceptor: Interceptor,
    message: ProtocolMessage,
    ctx: InterceptContext
  ): Promise<InterceptAction> {
    try {
      return await withTimeout(
        Promise.resolve(interceptor.process(message, ctx)),
        this.timeoutMs,
        () => new InterceptorTimeoutError(interceptor.name, this.timeoutMs)
      );
    } catch (err) {
      this.logger.warn(`${errorMessage(err)}; continuing`);
      return { type: 'continue' };
    }
  }
}

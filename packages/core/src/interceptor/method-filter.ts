import { methodOf } from '../protocols/jsonrpc';
import { defineInterceptor, Intercept, type Interceptor } from './types';

export interface MethodFilterOptions {
  /** Exact method names, or prefixes ending in `/*` (e.g. `tools/*`) */
  block: string[];
  /** Only filter messages travelling in this direction */
  direction?: 'inbound' | 'outbound';
}

function matches(pattern: string, method: string): boolean {
  if (pattern.endsWith('/*')) {
    return method.startsWith(pattern.slice(0, -1));
  }
  return pattern === method;
}

/**
 * Block requests and notifications by method name. Responses carry no method
 * and always pass.
 */
export function createMethodFilterInterceptor(options: MethodFilterOptions): Interceptor {
  const patterns = [...options.block];

  return defineInterceptor({
    name: 'method-filter',
    process(message, ctx) {
      if (options.direction && options.direction !== ctx.direction) {
        return Intercept.defer();
      }
      const method = methodOf(message);
      if (method === undefined) {
        return Intercept.defer();
      }
      const hit = patterns.find((pattern) => matches(pattern, method));
      return hit ? Intercept.block(`method '${method}' is blocked by rule '${hit}'`) : Intercept.continue();
    }
  });
}

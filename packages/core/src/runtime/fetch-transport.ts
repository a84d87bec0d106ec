import type { Transport } from './types';

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

/**
 * Create a transport backed by a standard fetch implementation.
 */
export function createFetchTransport(fetchImpl: FetchLike = fetch): Transport {
  return {
    async fetch(url, init, ctx) {
      return await fetchImpl(url, ctx.signal ? { ...init, signal: ctx.signal } : init);
    }
  };
}

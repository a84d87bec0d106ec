import { ConfigError } from '../errors';
import type { Logger } from '../logger';
import type { UpstreamEndpoint, UpstreamSelector } from '../types';
import { HttpDispatcher, type HttpDispatcherOptions } from './http-dispatcher';
import { StdioDispatcher, type StdioDispatcherOptions } from './stdio-dispatcher';
import type { UpstreamDispatcher } from './types';

/**
 * Always pick the same endpoint: `defaultName` when given, otherwise the first.
 */
export function createStaticSelector(endpoints: UpstreamEndpoint[], defaultName?: string): UpstreamSelector {
  const chosen =
    defaultName === undefined ? endpoints[0] : endpoints.find((endpoint) => endpoint.name === defaultName);
  if (!chosen) {
    throw new ConfigError(
      defaultName === undefined
        ? 'At least one upstream must be configured'
        : `Default upstream '${defaultName}' is not configured`
    );
  }
  return { select: () => chosen };
}

export type CreateDispatchersOptions = {
  logger?: Logger;
  http?: HttpDispatcherOptions;
  stdio?: Omit<StdioDispatcherOptions, 'logger'>;
};

/**
 * Build one dispatcher per endpoint, keyed by endpoint name.
 */
export function createDispatchers(
  endpoints: UpstreamEndpoint[],
  options: CreateDispatchersOptions = {}
): Map<string, UpstreamDispatcher> {
  const dispatchers = new Map<string, UpstreamDispatcher>();
  for (const endpoint of endpoints) {
    if (dispatchers.has(endpoint.name)) {
      throw new ConfigError(`Duplicate upstream name '${endpoint.name}'`);
    }
    switch (endpoint.transport) {
      case 'http':
        dispatchers.set(endpoint.name, new HttpDispatcher(endpoint, options.http));
        break;
      case 'stdio': {
        const stdioOptions: StdioDispatcherOptions = { ...options.stdio };
        if (options.logger) stdioOptions.logger = options.logger.child(endpoint.name);
        dispatchers.set(endpoint.name, new StdioDispatcher(endpoint, stdioOptions));
        break;
      }
    }
  }
  return dispatchers;
}

import type { RelayConfigInput } from './types';

/**
 * Typed identity helper for building config objects in code.
 */
export function defineConfig(config: RelayConfigInput): RelayConfigInput {
  return config;
}

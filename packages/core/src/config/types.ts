import type { z } from 'zod';
import type { LogLevel } from '../logger';
import type { ReconnectPolicy } from '../stream/reconnect';
import type { UpstreamEndpoint } from '../types';
import type { RelayConfigSchema, UpstreamSchema } from './schema';

// ============================================================================
// Config Input Types (what gets parsed from JSON/JSONC)
// ============================================================================

export type RelayConfigInput = z.infer<typeof RelayConfigSchema>;
export type UpstreamInput = z.infer<typeof UpstreamSchema>;

// ============================================================================
// Resolved Config (defaults applied, substitutions done)
// ============================================================================

export type ResolvedConfig = {
  server: { host: string; port: number; path: string };
  upstreams: UpstreamEndpoint[];
  /** Name of the upstream new sessions are routed to */
  defaultUpstream: string;
  streaming: {
    channelCapacity: number;
    dedupCapacity: number;
    idleTimeoutMs: number;
    terminationEvents: string[];
  };
  reconnect: ReconnectPolicy;
  replies: { maxReplyBytes: number };
  interceptors: { timeoutMs: number; blockMethods: string[] };
  sessions: { idleTtlMs: number; sweepIntervalMs: number; maxHistoryEntries: number };
  shutdown: { drainGraceMs: number };
  logging: { level: LogLevel };
};

// ============================================================================
// Config Metadata
// ============================================================================

export type ConfigFormat = 'jsonc' | 'json';

export type ConfigMeta = {
  configPath?: string;
  format?: ConfigFormat;
  layersApplied: string[];
  warnings: string[];
};

export type LoadedConfig = {
  path?: string;
  config: RelayConfigInput;
  format?: ConfigFormat;
  /** `{env:VAR}` references whose variable was unset */
  missingEnv: string[];
};

export type ResolvedRelayConfig = {
  config: ResolvedConfig;
  meta: ConfigMeta;
};

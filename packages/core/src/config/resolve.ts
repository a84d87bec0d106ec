import { ConfigError } from '../errors';
import { DEFAULT_RELAY_OPTIONS } from '../relay/relay';
import type { CreateRelayOptions } from '../relay/types';
import { DEFAULT_MAX_HISTORY_ENTRIES } from '../session/memory-store';
import type { StdioEndpoint, UpstreamEndpoint } from '../types';
import { type LoadConfigOptions, loadConfig, validateConfig } from './load';
import { mergeConfig } from './merge';
import type { ConfigMeta, RelayConfigInput, ResolvedConfig, ResolvedRelayConfig, UpstreamInput } from './types';

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_PORT = 4100;
export const DEFAULT_PATH = '/mcp';
export const DEFAULT_SWEEP_INTERVAL_MS = 60 * 1000;
export const DEFAULT_DRAIN_GRACE_MS = 5000;

// ============================================================================
// Types
// ============================================================================

export type ConfigOverrideLayer = {
  /** Layer name recorded in metadata (e.g. "cli") */
  name: string;
  overrides: RelayConfigInput;
};

export type ResolveConfigOptions = (LoadConfigOptions | { skipFile: true }) & {
  /** Applied in order after the file, last wins */
  overrideLayers?: ConfigOverrideLayer[];
  env?: NodeJS.ProcessEnv;
};

// ============================================================================
// Helpers
// ============================================================================

function resolveUpstream(input: UpstreamInput): UpstreamEndpoint {
  if (input.transport === 'http') {
    return { name: input.name, transport: 'http', url: input.url, headers: input.headers ?? {} };
  }
  const endpoint: StdioEndpoint = {
    name: input.name,
    transport: 'stdio',
    command: input.command,
    env: input.env ?? {}
  };
  if (input.cwd) endpoint.cwd = input.cwd;
  return endpoint;
}

function resolveUpstreams(config: RelayConfigInput): { upstreams: UpstreamEndpoint[]; defaultUpstream: string } {
  const upstreams = (config.upstreams ?? []).map(resolveUpstream);
  const [first] = upstreams;
  if (!first) {
    throw new ConfigError('No upstream configured: add "upstreams" to mcp-relay.jsonc or pass --upstream');
  }

  const seen = new Set<string>();
  for (const upstream of upstreams) {
    if (seen.has(upstream.name)) {
      throw new ConfigError(`Duplicate upstream name '${upstream.name}'`);
    }
    seen.add(upstream.name);
  }

  const defaultUpstream = config.defaultUpstream ?? first.name;
  if (!seen.has(defaultUpstream)) {
    throw new ConfigError(`defaultUpstream '${defaultUpstream}' does not match any configured upstream`);
  }
  return { upstreams, defaultUpstream };
}

/**
 * Fill every default. Throws ConfigError when no usable upstream remains.
 */
export function applyDefaults(config: RelayConfigInput): ResolvedConfig {
  const { upstreams, defaultUpstream } = resolveUpstreams(config);
  const defaults = DEFAULT_RELAY_OPTIONS;
  const reconnect = { ...defaults.reconnect, ...config.reconnect };
  if (reconnect.maxDelayMs < reconnect.initialDelayMs) {
    throw new ConfigError('reconnect.maxDelayMs must not be smaller than reconnect.initialDelayMs');
  }

  return {
    server: {
      host: config.server?.host ?? DEFAULT_HOST,
      port: config.server?.port ?? DEFAULT_PORT,
      path: config.server?.path ?? DEFAULT_PATH
    },
    upstreams,
    defaultUpstream,
    streaming: {
      channelCapacity: config.streaming?.channelCapacity ?? defaults.channelCapacity,
      dedupCapacity: config.streaming?.dedupCapacity ?? defaults.dedupCapacity,
      idleTimeoutMs: config.streaming?.idleTimeoutMs ?? defaults.idleTimeoutMs,
      terminationEvents: config.streaming?.terminationEvents ?? [...defaults.terminationEvents]
    },
    reconnect,
    replies: { maxReplyBytes: config.replies?.maxReplyBytes ?? defaults.maxReplyBytes },
    interceptors: {
      timeoutMs: config.interceptors?.timeoutMs ?? defaults.interceptorTimeoutMs,
      blockMethods: config.interceptors?.blockMethods ?? []
    },
    sessions: {
      idleTtlMs: config.sessions?.idleTtlMs ?? defaults.idleTtlMs,
      sweepIntervalMs: config.sessions?.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS,
      maxHistoryEntries: config.sessions?.maxHistoryEntries ?? DEFAULT_MAX_HISTORY_ENTRIES
    },
    shutdown: { drainGraceMs: config.shutdown?.drainGraceMs ?? DEFAULT_DRAIN_GRACE_MS },
    logging: { level: config.logging?.level ?? 'info' }
  };
}

/**
 * Relay tunables derived from a resolved config.
 */
export function toRelayOptions(config: ResolvedConfig): NonNullable<CreateRelayOptions['options']> {
  return {
    channelCapacity: config.streaming.channelCapacity,
    dedupCapacity: config.streaming.dedupCapacity,
    idleTimeoutMs: config.streaming.idleTimeoutMs,
    terminationEvents: config.streaming.terminationEvents,
    reconnect: config.reconnect,
    maxReplyBytes: config.replies.maxReplyBytes,
    interceptorTimeoutMs: config.interceptors.timeoutMs,
    idleTtlMs: config.sessions.idleTtlMs
  };
}

// ============================================================================
// Main API
// ============================================================================

/**
 * Resolve the relay configuration used by both `serve` and `validate`.
 *
 * 1. Discover and load the config file (substitutions applied, validated)
 * 2. Apply override layers (CLI flags), each validated on its own
 * 3. Fill defaults and check upstream references
 */
export async function resolveConfig(options: ResolveConfigOptions): Promise<ResolvedRelayConfig> {
  const warnings: string[] = [];
  const layersApplied: string[] = [];
  const meta: ConfigMeta = { layersApplied, warnings };

  let merged: RelayConfigInput = {};

  if (!('skipFile' in options)) {
    const loaded = await loadConfig(options, options.env);
    if (loaded.path) {
      meta.configPath = loaded.path;
      layersApplied.push('file');
    }
    if (loaded.format) meta.format = loaded.format;
    for (const name of loaded.missingEnv) {
      warnings.push(`Environment variable ${name} is not set; substituted an empty string`);
    }
    merged = loaded.config;
  }

  for (const layer of options.overrideLayers ?? []) {
    if (Object.keys(layer.overrides).length === 0) continue;
    merged = mergeConfig(merged, validateConfig(layer.overrides, `${layer.name} overrides`));
    layersApplied.push(layer.name);
  }

  return { config: applyDefaults(merged), meta };
}

export { defineConfig } from './define';
export { parseJsonc, stripJsonComments } from './jsonc';
export { CONFIG_FILES, type LoadConfigOptions, loadConfig, validateConfig } from './load';
export { mergeConfig } from './merge';
export {
  applyDefaults,
  type ConfigOverrideLayer,
  DEFAULT_DRAIN_GRACE_MS,
  DEFAULT_HOST,
  DEFAULT_PATH,
  DEFAULT_PORT,
  DEFAULT_SWEEP_INTERVAL_MS,
  type ResolveConfigOptions,
  resolveConfig,
  toRelayOptions
} from './resolve';
export { HttpUpstreamSchema, LogLevelSchema, RelayConfigSchema, StdioUpstreamSchema, UpstreamSchema } from './schema';
export { applySubstitutions, type SubstitutionOptions } from './substitution';
export type {
  ConfigFormat,
  ConfigMeta,
  LoadedConfig,
  RelayConfigInput,
  ResolvedConfig,
  ResolvedRelayConfig,
  UpstreamInput
} from './types';

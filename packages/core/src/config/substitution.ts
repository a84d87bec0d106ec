import { readFileSync } from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ConfigError, errorMessage } from '../errors';

export type SubstitutionOptions = {
  /** Directory containing the config file; relative `{file:}` paths start here */
  configDir: string;
  env?: NodeJS.ProcessEnv;
  /** Called once per `{env:VAR}` whose variable is unset; it expands to '' */
  onMissingEnv?: (name: string) => void;
};

// {env:VAR_NAME}
const ENV_PATTERN = /\{env:([^}]+)\}/g;

// {file:path}
const FILE_PATTERN = /\{file:([^}]+)\}/g;

function expandHome(p: string): string {
  if (p === '~' || p.startsWith('~/')) {
    return path.join(os.homedir(), p.slice(1));
  }
  return p;
}

function substituteString(value: string, options: SubstitutionOptions): string {
  const env = options.env ?? process.env;

  const withEnv = value.replace(ENV_PATTERN, (_match, name: string) => {
    const resolved = env[name.trim()];
    if (resolved === undefined) {
      options.onMissingEnv?.(name.trim());
      return '';
    }
    return resolved;
  });

  return withEnv.replace(FILE_PATTERN, (_match, ref: string) => {
    const expanded = expandHome(ref.trim());
    const full = path.isAbsolute(expanded) ? expanded : path.resolve(options.configDir, expanded);
    try {
      return readFileSync(full, 'utf-8').trimEnd();
    } catch (err) {
      throw new ConfigError(`Config substitution failed: {file:${ref}} could not be read: ${errorMessage(err)}`);
    }
  });
}

/**
 * Apply `{env:VAR}` and `{file:path}` substitutions to every string value of
 * a decoded config. Keys are left alone.
 */
export function applySubstitutions(value: unknown, options: SubstitutionOptions): unknown {
  if (typeof value === 'string') {
    return substituteString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((item) => applySubstitutions(item, options));
  }
  if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = applySubstitutions(item, options);
    }
    return result;
  }
  return value;
}

import { access, readFile } from 'node:fs/promises';
import * as path from 'node:path';
import { ConfigError, errorMessage } from '../errors';
import { parseJsonc } from './jsonc';
import { RelayConfigSchema } from './schema';
import { applySubstitutions } from './substitution';
import type { ConfigFormat, LoadedConfig, RelayConfigInput } from './types';

export type LoadConfigOptions =
  | { path: string }
  | { startDir: string; filename?: string; stopDir?: string };

// Discovery order (preferred first)
export const CONFIG_FILES: Array<{ filename: string; format: ConfigFormat }> = [
  { filename: 'mcp-relay.jsonc', format: 'jsonc' },
  { filename: 'mcp-relay.json', format: 'json' }
];

async function fileExists(p: string): Promise<boolean> {
  try {
    await access(p);
    return true;
  } catch {
    return false;
  }
}

function formatOf(filename: string): ConfigFormat {
  return filename.endsWith('.jsonc') ? 'jsonc' : 'json';
}

/**
 * Find a config file by walking up from startDir.
 */
async function findUp(
  startDir: string,
  filename: string | undefined,
  stopDir?: string
): Promise<{ path: string; format: ConfigFormat } | undefined> {
  const candidates = filename ? [{ filename, format: formatOf(filename) }] : CONFIG_FILES;
  let dir = path.resolve(startDir);
  const stop = stopDir ? path.resolve(stopDir) : undefined;

  while (true) {
    for (const candidate of candidates) {
      const full = path.join(dir, candidate.filename);
      if (await fileExists(full)) {
        return { path: full, format: candidate.format };
      }
    }

    if (stop && dir === stop) return undefined;
    const parent = path.dirname(dir);
    if (parent === dir) return undefined;
    dir = parent;
  }
}

/**
 * Validate a decoded config object, reporting every issue with its path.
 */
export function validateConfig(raw: unknown, source = 'config'): RelayConfigInput {
  const parsed = RelayConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `  ${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(`Invalid ${source}:\n${issues}`);
  }
  return parsed.data;
}

async function readConfigFile(configPath: string, format: ConfigFormat): Promise<unknown> {
  const content = await readFile(configPath, 'utf-8');
  try {
    return format === 'jsonc' ? parseJsonc(content) : JSON.parse(content);
  } catch (err) {
    throw new ConfigError(`Could not parse ${configPath}: ${errorMessage(err)}`);
  }
}

/**
 * Load config from an explicit path or by searching upwards.
 *
 * Discovery order: mcp-relay.jsonc, then mcp-relay.json. Finding nothing is
 * not an error (the CLI may supply the upstream); an explicit path that does
 * not exist is. Substitutions are applied before validation, so `{env:PORT}`
must still yield a value of the right type; defaults are applied later.
 */
export async function loadConfig(
  options: LoadConfigOptions,
  env: NodeJS.ProcessEnv = process.env
): Promise<LoadedConfig> {
  let found: { path: string; format: ConfigFormat } | undefined;

  if ('path' in options) {
    const configPath = path.resolve(options.path);
    if (!(await fileExists(configPath))) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    found = { path: configPath, format: formatOf(configPath) };
  } else {
    found = await findUp(options.startDir, options.filename, options.stopDir);
  }

  if (!found) {
    return { config: {}, missingEnv: [] };
  }

  const raw = await readConfigFile(found.path, found.format);
  const missingEnv = new Set<string>();
  const substituted = applySubstitutions(raw, {
    configDir: path.dirname(found.path),
    env,
    onMissingEnv: (name) => missingEnv.add(name)
  });
  const config = validateConfig(substituted, path.basename(found.path));
  return { path: found.path, config, format: found.format, missingEnv: [...missingEnv] };
}

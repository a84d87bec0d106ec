import { errorMessage, isRelayError } from '@mcp-relay/core';
import { type ResolvedRelayConfig, resolveConfig } from '@mcp-relay/core/config';
import type { CommandModule } from 'yargs';
import { paint, useColor } from '../utils/terminal';

interface ValidateOptions {
  config?: string;
  json: boolean;
}

export const validateBuilder = {
  config: {
    type: 'string' as const,
    describe: 'Path to mcp-relay.jsonc (default: discovered from the working directory)',
    alias: 'c'
  },
  json: {
    type: 'boolean' as const,
    describe: 'Print the resolved config as JSON',
    default: false
  }
};

export const validateCommand: CommandModule<object, ValidateOptions> = {
  command: 'validate',
  describe: 'Load and validate the relay config, then print the resolved upstreams',
  builder: validateBuilder,
  handler: async (argv) => {
    process.exit(await runValidate(argv));
  }
};

/**
 * Human-readable summary of a resolved config, one line per entry.
 */
export function describeConfig({ config, meta }: ResolvedRelayConfig, color: boolean): string[] {
  const lines: string[] = [];
  lines.push(
    meta.configPath
      ? `${paint('Config', 'bold', color)}   ${meta.configPath}`
      : `${paint('Config', 'bold', color)}   (none found, defaults only)`
  );
  for (const warning of meta.warnings) {
    lines.push(`${paint('warn', 'yellow', color)}     ${warning}`);
  }

  const { host, port, path } = config.server;
  lines.push(`${paint('Listen', 'bold', color)}   http://${host}:${port}${path}`);
  lines.push(paint('Upstreams', 'bold', color));
  for (const upstream of config.upstreams) {
    const target = upstream.transport === 'http' ? upstream.url : upstream.command.join(' ');
    const marker = upstream.name === config.defaultUpstream ? paint(' (default)', 'dim', color) : '';
    lines.push(`  ${upstream.name} [${upstream.transport}] ${target}${marker}`);
  }
  if (config.interceptors.blockMethods.length > 0) {
    lines.push(`${paint('Blocked', 'bold', color)}  ${config.interceptors.blockMethods.join(', ')}`);
  }
  lines.push(paint('Config is valid', 'green', color));
  return lines;
}

/**
 * Resolve the config and report it. Returns the process exit code.
 */
export async function runValidate(argv: ValidateOptions): Promise<number> {
  const color = useColor();

  let resolved: ResolvedRelayConfig;
  try {
    resolved = await resolveConfig(argv.config ? { path: argv.config } : { startDir: process.cwd() });
  } catch (err) {
    if (!isRelayError(err)) throw err;
    if (argv.json) {
      console.log(JSON.stringify({ valid: false, ...err.toObject() }, null, 2));
    } else {
      console.error(`${paint('error', 'red', color)} ${errorMessage(err)}`);
    }
    return 1;
  }

  if (argv.json) {
    console.log(JSON.stringify({ valid: true, ...resolved }, null, 2));
  } else {
    for (const line of describeConfig(resolved, color)) {
      console.log(line);
    }
  }
  return 0;
}

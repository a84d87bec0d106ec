import { createInterface } from 'node:readline';
import { serve } from '@hono/node-server';
import {
  ConfigError,
  createDispatchers,
  createLogger,
  createMethodFilterInterceptor,
  createRelay,
  createStaticSelector,
  errorMessage,
  type Interceptor,
  type Logger,
  type LogLevel,
  MemorySessionStore,
  type Relay,
  stderrSink
} from '@mcp-relay/core';
import {
  type ConfigOverrideLayer,
  type RelayConfigInput,
  type ResolvedConfig,
  resolveConfig,
  toRelayOptions
} from '@mcp-relay/core/config';
import type { CommandModule } from 'yargs';
import { createApp } from '../server/app';
import { createStdioClient } from '../server/stdio';

export interface ServeOptions {
  config?: string;
  port?: number;
  host?: string;
  upstream?: string;
  stdio: boolean;
  logLevel?: LogLevel;
  /** Everything after `--`: the command of a stdio upstream */
  '--'?: Array<string | number>;
}

/** Name given to the upstream defined on the command line */
export const CLI_UPSTREAM_NAME = 'default';

export const serveCommand: CommandModule<object, ServeOptions> = {
  command: 'serve',
  describe: 'Start the relay (HTTP by default, or stdio with --stdio)',
  builder: {
    config: {
      type: 'string',
      describe: 'Path to mcp-relay.jsonc (default: discovered from the working directory)',
      alias: 'c'
    },
    port: {
      type: 'number',
      describe: 'Port to listen on',
      alias: 'p'
    },
    host: {
      type: 'string',
      describe: 'Host to bind to',
      alias: 'H'
    },
    upstream: {
      type: 'string',
      describe: 'URL of a single HTTP upstream (replaces configured upstreams)',
      alias: 'u'
    },
    stdio: {
      type: 'boolean',
      describe: 'Serve one client over stdin/stdout instead of HTTP',
      default: false
    },
    'log-level': {
      type: 'string',
      describe: 'Log level',
      choices: ['debug', 'info', 'warn', 'error', 'silent']
    }
  },
  handler: async (argv) => {
    await runServer(argv);
  }
};

/**
 * Turn command-line flags into a config layer applied over the file.
 * `--upstream` and a trailing command each define the only upstream.
 */
export function buildCliOverrides(argv: ServeOptions): RelayConfigInput {
  const overrides: RelayConfigInput = {};
  const command = (argv['--'] ?? []).map(String);

  if (argv.upstream && command.length > 0) {
    throw new ConfigError('Pass either --upstream or an upstream command after --, not both');
  }
  if (argv.upstream) {
    overrides.upstreams = [{ name: CLI_UPSTREAM_NAME, transport: 'http', url: argv.upstream }];
    overrides.defaultUpstream = CLI_UPSTREAM_NAME;
  } else if (command.length > 0) {
    overrides.upstreams = [{ name: CLI_UPSTREAM_NAME, transport: 'stdio', command }];
    overrides.defaultUpstream = CLI_UPSTREAM_NAME;
  }

  if (argv.port !== undefined || argv.host !== undefined) {
    overrides.server = {};
    if (argv.port !== undefined) overrides.server.port = argv.port;
    if (argv.host !== undefined) overrides.server.host = argv.host;
  }
  if (argv.logLevel) {
    overrides.logging = { level: argv.logLevel };
  }
  return overrides;
}

/**
 * Construct the store, dispatchers, interceptors and relay for a resolved config.
 */
export function buildRelay(config: ResolvedConfig, logger: Logger): Relay {
  const interceptors: Interceptor[] = [];
  if (config.interceptors.blockMethods.length > 0) {
    interceptors.push(createMethodFilterInterceptor({ block: config.interceptors.blockMethods }));
  }

  return createRelay({
    store: new MemorySessionStore({ maxHistoryEntries: config.sessions.maxHistoryEntries }),
    selector: createStaticSelector(config.upstreams, config.defaultUpstream),
    dispatchers: createDispatchers(config.upstreams, { logger: logger.child('upstream') }),
    interceptors,
    options: toRelayOptions(config),
    logger: logger.child('relay')
  });
}

function startSweeper(relay: Relay, intervalMs: number, logger: Logger): ReturnType<typeof setInterval> {
  const timer = setInterval(() => {
    relay.sweepIdleSessions().catch((err: unknown) => {
      logger.warn(`Session sweep failed: ${errorMessage(err)}`);
    });
  }, intervalMs);
  timer.unref();
  return timer;
}

async function runServer(argv: ServeOptions): Promise<void> {
  const layers: ConfigOverrideLayer[] = [{ name: 'cli', overrides: buildCliOverrides(argv) }];
  const { config, meta } = await resolveConfig(
    argv.config
      ? { path: argv.config, overrideLayers: layers }
      : { startDir: process.cwd(), overrideLayers: layers }
  );

  // stdout carries protocol frames in stdio mode
  const logger = createLogger(
    'mcp-relay',
    argv.stdio ? { level: config.logging.level, sink: stderrSink } : { level: config.logging.level }
  );
  for (const warning of meta.warnings) {
    logger.warn(warning);
  }
  if (meta.configPath) {
    logger.debug(`Loaded config from ${meta.configPath}`);
  }

  const relay = buildRelay(config, logger);

  if (argv.stdio) {
    await runStdioMode(config, relay, logger);
    return;
  }

  runHttpMode(config, relay, logger);
}

function runHttpMode(config: ResolvedConfig, relay: Relay, logger: Logger): void {
  const { host, port, path } = config.server;
  const { app } = createApp(relay, { path, logger: logger.child('http') });

  console.log('mcp-relay starting...');
  console.log(`  Address:   http://${host}:${port}${path}`);
  for (const upstream of config.upstreams) {
    const target = upstream.transport === 'http' ? upstream.url : upstream.command.join(' ');
    const marker = upstream.name === config.defaultUpstream ? ' (default)' : '';
    console.log(`  Upstream:  ${upstream.name} [${upstream.transport}] ${target}${marker}`);
  }
  console.log('');
  console.log('Endpoints:');
  console.log(`  POST ${path}              - Send a JSON-RPC message or batch`);
  console.log(`  GET  ${path}              - Open or resume the session event stream (SSE)`);
  console.log(`  DEL  ${path}              - Terminate the session`);
  console.log('  GET  /health            - Health check');
  console.log('  GET  /doc               - OpenAPI documentation');
  console.log('');

  const server = serve({ fetch: app.fetch, port, hostname: host }, (info) => {
    logger.info(`Ready to accept connections on port ${info.port}`);
  });
  const sweeper = startSweeper(relay, config.sessions.sweepIntervalMs, logger);

  // Graceful shutdown
  let stopping = false;
  const shutdown = async () => {
    if (stopping) return;
    stopping = true;
    logger.info('Shutting down...');
    clearInterval(sweeper);
    server.close();
    await relay.shutdown(config.shutdown.drainGraceMs);
    process.exit(0);
  };
  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      logger.error(`Shutdown failed: ${errorMessage(err)}`);
      process.exit(1);
    });
  };

  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

async function runStdioMode(config: ResolvedConfig, relay: Relay, logger: Logger): Promise<void> {
  const client = createStdioClient({
    relay,
    write: (line) => {
      process.stdout.write(`${line}\n`);
    },
    logger: logger.child('stdio')
  });
  const sweeper = startSweeper(relay, config.sessions.sweepIntervalMs, logger);

  const lines = createInterface({ input: process.stdin, crlfDelay: Number.POSITIVE_INFINITY });
  const stop = () => lines.close();
  process.on('SIGTERM', stop);
  process.on('SIGINT', stop);

  for await (const line of lines) {
    client.handleLine(line);
  }

  logger.debug('Client input closed; draining');
  clearInterval(sweeper);
  await client.drain();
  await relay.shutdown(config.shutdown.drainGraceMs);
  process.exit(0);
}

// ============================================================================
// Logger
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Logger with the same level and sink, scoped under `this` */
  child(scope: string): Logger;
}

export type LogSink = {
  debug: (line: string) => void;
  info: (line: string) => void;
  warn: (line: string) => void;
  error: (line: string) => void;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

const consoleSink: LogSink = {
  debug: (line) => console.debug(line),
  info: (line) => console.info(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line)
};

/**
 * Everything to stderr. Used in stdio mode, where stdout carries protocol frames.
 */
export const stderrSink: LogSink = {
  debug: (line) => console.error(line),
  info: (line) => console.error(line),
  warn: (line) => console.error(line),
  error: (line) => console.error(line)
};

export type CreateLoggerOptions = {
  level?: LogLevel;
  sink?: LogSink;
};

/**
 * Create a `[scope]`-prefixed logger.
 * `DEBUG` in the environment enables debug output regardless of level.
 */
export function createLogger(scope: string, options: CreateLoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const sink = options.sink ?? consoleSink;
  const prefix = `[${scope}]`;
  const threshold = process.env['DEBUG'] ? LEVEL_ORDER.debug : LEVEL_ORDER[level];

  const enabled = (candidate: LogLevel) =>
    level !== 'silent' && LEVEL_ORDER[candidate] >= threshold;

  return {
    debug: (message) => {
      if (enabled('debug')) sink.debug(`${prefix} ${message}`);
    },
    info: (message) => {
      if (enabled('info')) sink.info(`${prefix} ${message}`);
    },
    warn: (message) => {
      if (enabled('warn')) sink.warn(`${prefix} ${message}`);
    },
    error: (message) => {
      if (enabled('error')) sink.error(`${prefix} ${message}`);
    },
    child: (childScope) => createLogger(`${scope}:${childScope}`, { level, sink })
  };
}

export const silentLogger: Logger = createLogger('silent', { level: 'silent' });

import { createLogger, type Logger } from '../../src/logger';

export type RecordingLogger = Logger & { lines: string[] };

/**
 * Debug-level logger that keeps every line for assertions.
 */
export function createRecordingLogger(scope = 'test'): RecordingLogger {
  const lines: string[] = [];
  const push = (line: string) => {
    lines.push(line);
  };
  const logger = createLogger(scope, {
    level: 'debug',
    sink: { debug: push, info: push, warn: push, error: push }
  });
  return Object.assign(logger, { lines });
}

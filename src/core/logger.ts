import { formatWithOptions } from 'node:util';
import { Logger, type ILogObj } from 'tslog';

/**
 * Structured log object with the context fields the engine attaches.
 */
export interface EngineLogObj extends ILogObj {
  phase?: string;
  count?: number;
  [key: string]: unknown;
}

export type EngineLogger = Logger<EngineLogObj>;

/**
 * Log verbosity mode.
 */
export type LogMode = 'silent' | 'error' | 'info' | 'debug';

export const LOG_MODES = ['silent', 'error', 'info', 'debug'] as const satisfies readonly LogMode[];

const MIN_LEVELS: Record<LogMode, number> = {
  silent: 6,
  error: 5,
  info: 3,
  debug: 2,
};

// Drawings go to stdout, so pretty log lines are sent to stderr.
function toStderr(logMetaMarkup: string, logArgs: unknown[], logErrors: string[]): void {
  const body = formatWithOptions({ colors: false }, ...logArgs);
  const errors = logErrors.length > 0 ? `\n${logErrors.join('\n')}` : '';
  process.stderr.write(`${logMetaMarkup}${body}${errors}\n`);
}

/**
 * Create a logger with human-readable output on stderr.
 */
export function createLogger(name: string, mode: LogMode = 'info'): EngineLogger {
  return new Logger<EngineLogObj>({
    name,
    type: mode === 'silent' ? 'hidden' : 'pretty',
    minLevel: MIN_LEVELS[mode],
    hideLogPositionForProduction: true,
    overwrite: { transportFormatted: toStderr },
  });
}

/** Library default: nothing is printed unless the caller injects a logger. */
export function silentLogger(name = 'gridchart'): EngineLogger {
  return createLogger(name, 'silent');
}

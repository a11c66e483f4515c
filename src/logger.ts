/**
 * Minimal logging seam. Components accept an optional Logger and stay silent
 * without one; the CLI wires in a console-backed logger.
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * Parse a log level name, falling back to `fallback` for anything unknown.
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : fallback;
}

/**
 * Logger writing to stderr, prefixed with a tag.
 * Level defaults to LANCHAT_LOG_LEVEL, then 'info'.
 */
export function createConsoleLogger(
  level: LogLevel = parseLogLevel(process.env.LANCHAT_LOG_LEVEL),
  tag = 'lanchat',
): Logger {
  const threshold = LEVEL_ORDER[level];
  const write = (at: Exclude<LogLevel, 'silent'>, message: string): void => {
    if (LEVEL_ORDER[at] >= threshold) {
      console.error(`[${tag}] ${at}: ${message}`);
    }
  };

  return {
    debug: (message) => write('debug', message),
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
  };
}


/**
 * Logger - Leveled logging for schema construction and resolution
 *
 * @module logger
 * @category Logging
 */

/**
 * Log level type.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Logger interface used across the library.
 */
export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Configuration options for a logger.
 */
export interface LoggerConfig {
  /** Custom log function (default: console method matching the level) */
  log?: (level: LogLevel, message: string, data?: Record<string, unknown>) => void;
  /** Minimum log level (default: 'warn') */
  level?: LogLevel;
  /** Prefix placed before every message (default: 'restgraph') */
  prefix?: string;
  /** Whether to prepend an ISO timestamp (default: true) */
  timestamp?: boolean;
  /** Custom formatter for log messages */
  formatter?: (level: LogLevel, message: string) => string;
}

/**
 * Log level priorities.
 */
const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function consoleLog(level: LogLevel, message: string, data?: Record<string, unknown>): void {
  const write = level === 'debug' ? console.debug : level === 'info' ? console.info : level === 'warn' ? console.warn : console.error;
  if (data === undefined) {
    write.call(console, message);
  } else {
    write.call(console, message, data);
  }
}

/**
 * Create a logger.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug' });
 * logger.warn('Skipping field', { field: 'instructors' });
 * ```
 *
 * @example
 * ```typescript
 * // Forward to another sink
 * const logger = createLogger({
 *   log: (level, msg, data) => sink.write({ level, msg, ...data }),
 *   timestamp: false,
 * });
 * ```
 */
export function createLogger(config?: LoggerConfig): Logger {
  const {
    log = consoleLog,
    level = 'warn',
    prefix = 'restgraph',
    timestamp = true,
    formatter,
  } = config ?? {};

  function shouldLog(msgLevel: LogLevel): boolean {
    return LOG_LEVELS[msgLevel] >= LOG_LEVELS[level];
  }

  function format(msgLevel: LogLevel, message: string): string {
    if (formatter) {
      return formatter(msgLevel, message);
    }
    const stamp = timestamp ? `[${new Date().toISOString()}] ` : '';
    return `${stamp}[${prefix}] ${msgLevel.toUpperCase()} ${message}`;
  }

  function emit(msgLevel: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!shouldLog(msgLevel)) {
      return;
    }
    log(msgLevel, format(msgLevel, message), data);
  }

  return {
    debug: (message, data) => emit('debug', message, data),
    info: (message, data) => emit('info', message, data),
    warn: (message, data) => emit('warn', message, data),
    error: (message, data) => emit('error', message, data),
  };
}

/**
 * Create a silent logger (logs nothing).
 * Useful for testing.
 */
export function createSilentLogger(): Logger {
  return createLogger({
    log: () => {},
    level: 'error',
  });
}

/**
 * Create a verbose logger (logs everything).
 * Useful for debugging.
 */
export function createVerboseLogger(): Logger {
  return createLogger({ level: 'debug' });
}

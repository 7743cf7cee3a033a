/**
 * Scoped console logger with level filtering.
 *
 *   const logger = createLogger('codec');
 *   logger.warn('API version mismatch');   // [codec] API version mismatch
 *
 * The minimum level comes from LOG_LEVEL (DEBUG, INFO, WARNING, ERROR;
 * default WARNING) and is read on every call.
 */

export type LogLevel = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR';

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  ERROR: 3,
};

const DEFAULT_LOG_LEVEL: LogLevel = 'WARNING';

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_VALUES;
}

export function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toUpperCase();
  if (envLevel && isLogLevel(envLevel)) return envLevel;
  return DEFAULT_LOG_LEVEL;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[getLogLevel()];
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  const emit = (level: LogLevel, method: 'debug' | 'log' | 'warn' | 'error') =>
    (message: string, ...args: unknown[]): void => {
      if (shouldLog(level)) console[method](prefix, message, ...args);
    };

  return {
    debug: emit('DEBUG', 'debug'),
    info: emit('INFO', 'log'),
    warn: emit('WARNING', 'warn'),
    error: emit('ERROR', 'error'),
  };
}

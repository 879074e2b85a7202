/**
 * Console logging with a scope prefix and a level threshold
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function parseLogLevel(value: string): LogLevel | undefined {
  const lower = value.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === lower);
}

/**
 * Logger writing `[scope] message` lines to the console, dropping messages
 * below `level`
 */
export function createConsoleLogger(scope: string, level: LogLevel = 'info'): Logger {
  const threshold = LOG_LEVELS.indexOf(level);
  const enabled = (messageLevel: LogLevel) => LOG_LEVELS.indexOf(messageLevel) >= threshold;
  const prefix = `[${scope}]`;

  return {
    debug: (message) => {
      if (enabled('debug')) {
        console.debug(`${prefix} ${message}`);
      }
    },
    info: (message) => {
      if (enabled('info')) {
        console.log(`${prefix} ${message}`);
      }
    },
    warn: (message) => {
      if (enabled('warn')) {
        console.warn(`${prefix} ${message}`);
      }
    },
    error: (message) => {
      if (enabled('error')) {
        console.error(`${prefix} ${message}`);
      }
    },
  };
}

export function createSilentLogger(): Logger {
  const ignore = (_message: string) => undefined;
  return { debug: ignore, info: ignore, warn: ignore, error: ignore };
}

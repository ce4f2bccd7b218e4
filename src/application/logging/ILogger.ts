/**
 * @fileoverview Logging
 *
 * Components that log take an `ILogger` in their options and fall back to
 * {@link consoleLogger}. Tests pass {@link silentLogger} or a jest mock.
 */

/**
 * Logger interface
 */
export interface ILogger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface ConsoleLoggerOptions {
  /** Minimum level written; defaults to `LOG_LEVEL` or `info` */
  level?: LogLevel;

  /** Prepended to every message, e.g. the component name */
  prefix?: string;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LEVEL_ORDER, value);
}

function defaultLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

/**
 * Console logger with level filtering
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): ILogger {
  const threshold = LEVEL_ORDER[options.level ?? defaultLevel()];
  const prefix = options.prefix ? `[${options.prefix}] ` : '';
  const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= threshold;

  return {
    debug: (message, ...args) => {
      if (enabled('debug')) console.debug(`[DEBUG] ${prefix}${message}`, ...args);
    },
    info: (message, ...args) => {
      if (enabled('info')) console.info(`[INFO] ${prefix}${message}`, ...args);
    },
    warn: (message, ...args) => {
      if (enabled('warn')) console.warn(`[WARN] ${prefix}${message}`, ...args);
    },
    error: (message, ...args) => {
      if (enabled('error')) console.error(`[ERROR] ${prefix}${message}`, ...args);
    },
  };
}

/**
 * Default console logger
 */
export const consoleLogger: ILogger = createConsoleLogger();

/**
 * Logger that drops everything
 */
export const silentLogger: ILogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/**
 * Console logging for engine modules.
 *
 * Each module gets a scoped logger that prefixes its lines with `[Scope]`.
 * Output can be switched off globally (tests, embedding UIs that own the
 * terminal) or filtered by level.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

// Configuration flags
let loggingEnabled = true;
let minimumLevel: LogLevel = 'info';

/**
 * Enable or disable all engine logging
 */
export const setLoggingEnabled = (enabled: boolean): void => {
  loggingEnabled = enabled;
};

/**
 * Set the lowest level that is written
 */
export const setLogLevel = (level: LogLevel): void => {
  minimumLevel = level;
};

export const getLogLevel = (): LogLevel => minimumLevel;

export interface EngineLogger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const shouldLog = (level: LogLevel): boolean =>
  loggingEnabled && LEVEL_ORDER[level] >= LEVEL_ORDER[minimumLevel];

/**
 * Create a logger whose lines start with `[scope]`
 */
export const createLogger = (scope: string): EngineLogger => {
  const prefix = `[${scope}]`;
  return {
    debug: (message, ...details) => {
      if (shouldLog('debug')) console.debug(`${prefix} ${message}`, ...details);
    },
    info: (message, ...details) => {
      if (shouldLog('info')) console.info(`${prefix} ${message}`, ...details);
    },
    warn: (message, ...details) => {
      if (shouldLog('warn')) console.warn(`${prefix} ${message}`, ...details);
    },
    error: (message, ...details) => {
      if (shouldLog('error')) console.error(`${prefix} ${message}`, ...details);
    },
  };
};

export * from './chess/index.js';
export {
  createLogger,
  setLoggingEnabled,
  setLogLevel,
  getLogLevel,
} from './core/EngineLogger.js';
export type { EngineLogger, LogLevel } from './core/EngineLogger.js';

export { createLogger, isEnvironment, isLogLevel, LOG_LEVEL_PRIORITY } from './logger.js';
export type {
  ConsoleSink,
  Environment,
  EnvironmentConfig,
  LogEntry,
  Logger,
  LoggerConfig,
  LogLevel,
  LogTransport,
} from './types.js';

export { createLogger, isEnvironment, isLogLevel } from './logger.js';
export type {
  Environment,
  EnvironmentConfig,
  LogEntry,
  Logger,
  LoggerConfig,
  LogLevel,
  LogWriter,
} from './types.js';

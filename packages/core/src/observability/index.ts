export {
  KvLogger,
  createLogger,
  isDebugMode,
  setDebugMode,
  type KvLoggerConfig,
  type LogEntry,
  type LogLevel,
} from './logger.js';

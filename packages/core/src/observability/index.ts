export {
  LOG_LEVELS,
  TidemarkLogger,
  createLogger,
  type LogEntry,
  type LogLevel,
  type TidemarkLoggerConfig,
} from './logger.js';

export {
  SeriesLogger,
  createLogger,
  type LogEntry,
  type LogHandler,
  type LogLevel,
  type SeriesLoggerConfig,
} from './logger.js';

export {
  ConsoleLogger,
  LOG_LEVELS,
  createLogger,
  formatMessage,
  isLogLevel,
  silentLogger,
} from './Logger.js';
export type { Logger, LogLevel } from './Logger.js';

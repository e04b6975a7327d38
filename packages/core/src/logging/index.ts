export {
  createLogger,
  createSilentLogger,
  isLevelEnabled,
  isLogLevel,
  LOG_LEVELS,
  type LogLevel,
  type LoggerOptions,
  type SyncLogger,
} from "./logger.js";

export {
  configureLogging,
  createLogger,
  getComponentLogger,
  getTestLogger,
  logger,
  setLogLevel,
} from './logger.js';
export { DEFAULT_LOGGER_CONFIG, getLoggerConfigFromEnv, isLogLevel, validateLoggerConfig } from './config.js';
export { LOG_LEVELS } from './types.js';
export type { KubetestLogger, LoggerConfig, LogLevel } from './types.js';

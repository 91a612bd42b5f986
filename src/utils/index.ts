/**
 * Utility exports
 */

export { logger, createLogger, initErrorTracking, isLogLevel, Logger, type LogLevel, type LogFormat, type LoggerSettings } from './logger.js';
export {
  CONFIG_FILE_NAME,
  findConfigFile,
  loadConfig,
  getConfig,
  getDefaultConfig,
  createConfig,
  saveConfig,
  validateConfig,
  applyLoggingConfig,
  resetConfig,
} from './config.js';
export * from './errors.js';
export * from './validation.js';
export { Semaphore } from './semaphore.js';

export { LogLevel, parseLogLevel, shouldDisplayLogLevel } from './LogLevel.js';
export { Logger } from './Logger.js';
export {
  getLogger,
  initializeLogging,
  setGlobalLevel,
  getGlobalLevel,
  shutdownLogging,
  resetLogging,
} from './LoggerFactory.js';
export {
  registerComponent,
  setComponentLevel,
  clearComponentLevel,
  getRegisteredComponents,
  resetDebugRegistry,
} from './DebugModeRegistry.js';
export { getLoggingConfig, resetLoggingConfig } from './config.js';
export type { LoggingConfiguration } from './config.js';
export { ConsoleTransport, FileTransport, formatLocalTimestamp, formatTextLine } from './transports.js';
export type { LogTransport } from './transports.js';

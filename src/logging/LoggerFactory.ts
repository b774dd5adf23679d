/**
 * Logger Factory
 *
 * Owns the root winston logger and caches one Logger per component.
 *
 *   const logger = getLogger('relay-engine');
 *   logger.info('Relay started');
 *
 * getLogger() lazily initializes with defaults (console, INFO) when
 * initializeLogging() was never called.
 */

import winston from 'winston';
import { LogLevel } from './LogLevel.js';
import { getLoggingConfig } from './config.js';
import { initFromEnv } from './DebugModeRegistry.js';
import { Logger, setGlobalLevelProvider } from './Logger.js';
import { ConsoleTransport, FileTransport } from './transports.js';
import type { LogTransport } from './transports.js';

/** winston numbers priorities the other way round: error=0 ... trace=4 */
const WINSTON_LEVELS: Record<string, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

function toWinstonLevel(level: LogLevel): string {
  switch (level) {
    case LogLevel.ERROR:
      return 'error';
    case LogLevel.WARN:
      return 'warn';
    case LogLevel.INFO:
      return 'info';
    case LogLevel.DEBUG:
      return 'debug';
    case LogLevel.TRACE:
      return 'trace';
  }
}

let rootLogger: winston.Logger | null = null;
let currentGlobalLevel: LogLevel = LogLevel.INFO;
const loggerCache = new Map<string, Logger>();

/**
 * Initialize the logging subsystem. Safe to call again: the root logger is
 * reconfigured with the current environment.
 */
export function initializeLogging(additionalTransports?: LogTransport[]): winston.Logger {
  const config = getLoggingConfig();

  currentGlobalLevel = config.logLevel;

  const transports: winston.transport[] = [
    new ConsoleTransport(config.logFormat, config.timestampFormat).createWinstonTransport(),
  ];

  if (config.logFile) {
    transports.push(new FileTransport(config.logFile, config.logFormat).createWinstonTransport());
  }

  for (const t of additionalTransports ?? []) {
    transports.push(t.createWinstonTransport());
  }

  const options: winston.LoggerOptions = {
    levels: WINSTON_LEVELS,
    // Filtering happens in Logger; winston passes everything through
    level: 'trace',
    transports,
    exitOnError: false,
  };

  // Reconfigure in place so loggers already handed out keep working
  const root = rootLogger ?? winston.createLogger(options);
  if (rootLogger) {
    rootLogger.configure(options);
  }
  rootLogger = root;

  setGlobalLevelProvider(() => currentGlobalLevel);
  initFromEnv(config.debugComponents);

  return root;
}

/**
 * Get (or create) the Logger for a named component.
 */
export function getLogger(component: string): Logger {
  const cached = loggerCache.get(component);
  if (cached) return cached;

  const root = rootLogger ?? initializeLogging();
  const logger = new Logger(component, root);
  loggerCache.set(component, logger);
  return logger;
}

/**
 * Change the global level at runtime. Components with an override keep it.
 */
export function setGlobalLevel(level: LogLevel): void {
  currentGlobalLevel = level;
}

export function getGlobalLevel(): LogLevel {
  return currentGlobalLevel;
}

/**
 * Flush and close all transports.
 */
export async function shutdownLogging(): Promise<void> {
  const root = rootLogger;
  if (!root) return;
  await new Promise<void>((resolve) => {
    root.on('finish', () => resolve());
    root.end();
  });
  rootLogger = null;
}

/**
 * Reset all logging state (for testing).
 */
export function resetLogging(): void {
  if (rootLogger) {
    rootLogger.close();
  }
  rootLogger = null;
  currentGlobalLevel = LogLevel.INFO;
  loggerCache.clear();
  setGlobalLevelProvider(() => LogLevel.INFO);
}

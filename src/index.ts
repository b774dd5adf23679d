/**
 * dicom-relay daemon
 *
 * Runs the relay loop with configuration from the environment (and .env)
 * until SIGINT or SIGTERM.
 */

import 'dotenv/config';
import { getRelayConfig } from './config/RelayConfig.js';
import { toError } from './errors.js';
import { getLogger, initializeLogging, registerComponent, shutdownLogging } from './logging/index.js';
import { RelayService } from './server/RelayService.js';

initializeLogging();
registerComponent('server', 'Daemon lifecycle');
const logger = getLogger('server');

let relay: RelayService | null = null;

/**
 * Stop with a safety timeout: if stop() hangs, exit after 5 seconds.
 */
async function gracefulShutdown(): Promise<void> {
  if (!relay) return;
  const timeout = setTimeout(() => {
    process.exit(1);
  }, 5000);
  try {
    await relay.stop();
  } finally {
    clearTimeout(timeout);
  }
}

async function shutdown(signal: string, exitCode: number): Promise<void> {
  logger.warn(`Received ${signal}, shutting down...`);
  try {
    await gracefulShutdown();
  } catch (error) {
    logger.error('Shutdown failed', toError(error));
    exitCode = 1;
  }
  await shutdownLogging();
  process.exit(exitCode);
}

process.on('SIGINT', () => void shutdown('SIGINT', 0));
process.on('SIGTERM', () => void shutdown('SIGTERM', 0));

process.on('unhandledRejection', (reason: unknown) => {
  logger.error('Unhandled promise rejection', toError(reason));
  void shutdown('unhandledRejection', 1);
});

process.on('uncaughtException', (error: Error) => {
  logger.error('Uncaught exception', error);
  void shutdown('uncaughtException', 1);
});

async function main(): Promise<void> {
  try {
    relay = new RelayService(getRelayConfig());
    await relay.start();
  } catch (error) {
    logger.error('Failed to start the relay', toError(error));
    await relay?.stop();
    await shutdownLogging();
    process.exit(1);
  }
}

void main();

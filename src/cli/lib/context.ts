/**
 * Config and logging setup shared by the commands
 */

import type { Command } from 'commander';
import { getRelayConfig, RelayConfig, withOverrides, ConfigOverrides } from '../../config/RelayConfig.js';
import { initializeLogging, LogLevel, setGlobalLevel } from '../../logging/index.js';
import type { GlobalOptions } from '../types/index.js';
import { OutputFormatter } from './OutputFormatter.js';

export interface CommandContext {
  options: GlobalOptions;
  config: RelayConfig;
  formatter: OutputFormatter;
}

/**
 * Global options from the root program of a subcommand
 */
export function globalOptions(cmd: Command): GlobalOptions {
  let root = cmd;
  while (root.parent) {
    root = root.parent;
  }
  return root.opts<GlobalOptions>();
}

/**
 * Read the environment configuration, apply CLI overrides and set up
 * logging. --json keeps the console for results by logging warnings only.
 */
export function commandContext(cmd: Command, overrides: ConfigOverrides = {}): CommandContext {
  const options = globalOptions(cmd);
  initializeLogging();
  if (options.verbose) {
    setGlobalLevel(LogLevel.DEBUG);
  } else if (options.json) {
    setGlobalLevel(LogLevel.WARN);
  }

  const config = withOverrides(getRelayConfig(), {
    outputDir: options.outputDir,
    localAeTitle: options.aet,
    ...overrides,
  });
  return { options, config, formatter: new OutputFormatter(options.json) };
}

/**
 * Resolve once SIGINT or SIGTERM arrives
 */
export function waitForShutdownSignal(): Promise<NodeJS.Signals> {
  return new Promise((resolve) => {
    const onSignal = (signal: NodeJS.Signals): void => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
      resolve(signal);
    };
    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  });
}

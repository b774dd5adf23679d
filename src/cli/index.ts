#!/usr/bin/env node
/**
 * dicom-relay CLI
 *
 * Usage: dicom-relay [options] <command> [arguments]
 *
 * Run `dicom-relay --help` for detailed usage information.
 */

import 'dotenv/config';
import { Command } from 'commander';
import chalk from 'chalk';
import { errorMessage } from '../errors.js';
import { shutdownLogging } from '../logging/index.js';
import { registerRelayCommands } from './commands/relay.js';
import { registerReceiveCommand } from './commands/receive.js';
import { registerSendCommands } from './commands/send.js';

const VERSION = '0.1.0';

const BANNER = `
${chalk.cyan('  dicom-relay')}
${chalk.gray('  study relay v' + VERSION)}
`;

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('dicom-relay')
    .description('Discover studies on one DICOM endpoint and relay them to another')
    .version(VERSION, '-V, --version', 'Output the version number')
    .option('-o, --output-dir <dir>', 'Folder for received objects and the ledger (RELAY_OUTPUT_DIR)')
    .option('--aet <title>', 'Local AE title (RELAY_LOCAL_AET)')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Debug logging');

  registerRelayCommands(program);
  registerReceiveCommand(program);
  registerSendCommands(program);

  program.addHelpText('before', BANNER);
  program.addHelpText(
    'after',
    `
${chalk.bold('Examples:')}
  ${chalk.gray('# Relay continuously, configured through .env')}
  $ dicom-relay relay

  ${chalk.gray('# One discovery cycle')}
  $ dicom-relay relay --once

  ${chalk.gray('# Store everything under ./studies on a PACS')}
  $ dicom-relay send ./studies --to pacs.local:104 --called-aet PACS

  ${chalk.gray('# Verify a remote AE')}
  $ dicom-relay echo pacs.local:104 --called-aet PACS
`
  );

  return program;
}

async function main(): Promise<void> {
  const program = createProgram();
  try {
    await program.parseAsync(process.argv);
  } finally {
    await shutdownLogging();
  }
}

main().catch((error: unknown) => {
  console.error(chalk.red('Fatal error:'), errorMessage(error));
  process.exit(1);
});

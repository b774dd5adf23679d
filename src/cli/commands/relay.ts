/**
 * relay / forward commands
 */

import { Command } from 'commander';
import ora, { Ora } from 'ora';
import chalk from 'chalk';
import { errorMessage } from '../../errors.js';
import { StudyState } from '../../relay/types.js';
import { RelayService } from '../../server/RelayService.js';
import { commandContext, waitForShutdownSignal } from '../lib/context.js';
import { parseIntegerOption } from '../lib/targets.js';
import type { RelayCommandOptions } from '../types/index.js';

export function registerRelayCommands(program: Command): void {
  // ==========================================================================
  // relay [--once]
  // ==========================================================================
  program
    .command('relay')
    .description('Poll the source and relay every new study to the destination')
    .option('--once', 'Run a single discovery cycle and exit')
    .option('-i, --interval <ms>', 'Poll interval in milliseconds (RELAY_POLL_INTERVAL_MS)')
    .option('--ledger <path>', 'Ledger file (RELAY_LEDGER_PATH)')
    .action(async (options: RelayCommandOptions, cmd: Command) => {
      const { config, formatter } = commandContext(cmd, {
        pollIntervalMs: parseIntegerOption(options.interval, '--interval'),
        ledgerPath: options.ledger,
      });

      let service: RelayService | null = null;
      let spinner: Ora | null = null;
      try {
        service = new RelayService(config);

        if (options.once) {
          spinner = formatter.isJson ? null : ora(`Polling ${service.source.description}...`).start();
          const cycle = await service.runOnce();
          spinner?.stop();
          const pending = service.engine.getWorkingSet();
          if (formatter.isJson) {
            formatter.json({ ...cycle, pending });
          } else {
            const line = `${cycle.listed} listed, ${cycle.emitted} relayed or attempted, ${pending.length} pending retry`;
            if (cycle.queryFailed) {
              formatter.warn(`Study query failed; ${line}`);
            } else {
              formatter.success(line);
            }
            for (const record of pending) {
              console.log(`  ${chalk.red(record.studyInstanceUID)} ${chalk.gray(record.lastError ?? '')}`);
            }
          }
          await service.stop();
          if (cycle.queryFailed || pending.length > 0) {
            process.exitCode = 1;
          }
          return;
        }

        await service.start();
        formatter.info(`Relaying from ${service.source.description}; Ctrl+C to stop`);
        const signal = await waitForShutdownSignal();
        formatter.info(`Received ${signal}, finishing the current study...`);
        await service.stop();
      } catch (error) {
        spinner?.stop();
        formatter.error('Relay failed', errorMessage(error));
        await service?.stop();
        process.exitCode = 1;
      }
    });

  // ==========================================================================
  // forward <studyUid>
  // ==========================================================================
  program
    .command('forward <studyUid>')
    .description('Relay one study now, without discovery; commits it on success')
    .action(async (studyUid: string, _options: unknown, cmd: Command) => {
      const { config, formatter } = commandContext(cmd);

      let service: RelayService | null = null;
      let spinner: Ora | null = null;
      try {
        service = new RelayService(config);
        spinner = formatter.isJson ? null : ora(`Relaying ${studyUid}...`).start();
        const started = Date.now();
        const record = await service.forward(studyUid);
        spinner?.stop();
        formatter.studyRecord(record, Date.now() - started);
        if (record.state !== StudyState.DELIVERED) {
          process.exitCode = 1;
        }
      } catch (error) {
        spinner?.stop();
        formatter.error('Forward failed', errorMessage(error));
        process.exitCode = 1;
      } finally {
        await service?.stop();
      }
    });
}

/**
 * send / echo commands
 */

import { Command } from 'commander';
import ora, { Ora } from 'ora';
import chalk from 'chalk';
import { errorMessage } from '../../errors.js';
import { DimseAssociationService } from '../../association/DimseAssociationService.js';
import { DicomStatus, formatStatus, isStoreAccepted } from '../../dicom/Dimse.js';
import { loadFolder } from '../lib/DicomFiles.js';
import { commandContext } from '../lib/context.js';
import { formatDuration } from '../lib/OutputFormatter.js';
import { parseHostPort } from '../lib/targets.js';
import type { EchoCommandOptions, SendCommandOptions } from '../types/index.js';

export function registerSendCommands(program: Command): void {
  // ==========================================================================
  // send <folder> --to host:port
  // ==========================================================================
  program
    .command('send <folder>')
    .description('C-STORE every readable DICOM file under a folder')
    .requiredOption('-t, --to <hostPort>', 'Destination host:port')
    .option('-c, --called-aet <aet>', 'Destination AE title', 'ANY-SCP')
    .action(async (folder: string, options: SendCommandOptions, cmd: Command) => {
      const { config, formatter } = commandContext(cmd);

      let spinner: Ora | null = null;
      try {
        const node = parseHostPort(options.to, options.calledAet);
        const loaded = await loadFolder(folder);
        for (const { file, reason } of loaded.skipped) {
          formatter.warn(`Skipping ${file}: ${reason}`);
        }
        if (loaded.objects.length === 0) {
          formatter.error(`No DICOM files under ${folder}`);
          process.exitCode = 1;
          return;
        }

        const service = new DimseAssociationService({ localAeTitle: config.localAeTitle });
        spinner = formatter.isJson
          ? null
          : ora(`Sending ${loaded.objects.length} objects to ${node.aeTitle}@${node.host}:${node.port}...`).start();
        const started = Date.now();
        const results = await service.store(node, loaded.objects);
        spinner?.stop();

        const failed = results.filter((result) => !isStoreAccepted(result.status));
        if (formatter.isJson) {
          formatter.json({ sent: results.length - failed.length, failed: failed.length, results });
        } else {
          const summary = `${results.length - failed.length} of ${results.length} objects stored in ${formatDuration(Date.now() - started)}`;
          if (failed.length === 0) {
            formatter.success(summary);
          } else {
            formatter.error(summary);
            for (const result of failed) {
              console.log(
                `  ${chalk.red(formatStatus(result.status))} ${result.sopInstanceUID} ${chalk.gray(result.error ?? '')}`
              );
            }
          }
        }
        if (failed.length > 0) {
          process.exitCode = 1;
        }
      } catch (error) {
        spinner?.stop();
        formatter.error('Send failed', errorMessage(error));
        process.exitCode = 1;
      }
    });

  // ==========================================================================
  // echo <host:port>
  // ==========================================================================
  program
    .command('echo <hostPort>')
    .description('C-ECHO a remote application entity')
    .option('-c, --called-aet <aet>', 'Remote AE title', 'ANY-SCP')
    .action(async (hostPort: string, options: EchoCommandOptions, cmd: Command) => {
      const { config, formatter } = commandContext(cmd);

      let spinner: Ora | null = null;
      try {
        const node = parseHostPort(hostPort, options.calledAet);
        const service = new DimseAssociationService({ localAeTitle: config.localAeTitle });
        spinner = formatter.isJson ? null : ora(`C-ECHO ${node.aeTitle}@${node.host}:${node.port}...`).start();
        const started = Date.now();
        const status = await service.echo(node);
        spinner?.stop();

        const duration = Date.now() - started;
        if (status === DicomStatus.SUCCESS) {
          formatter.success(`C-ECHO succeeded in ${formatDuration(duration)}`);
        } else {
          formatter.error(`C-ECHO answered ${formatStatus(status)}`);
          process.exitCode = 1;
        }
      } catch (error) {
        spinner?.stop();
        formatter.error('C-ECHO failed', errorMessage(error));
        process.exitCode = 1;
      }
    });
}

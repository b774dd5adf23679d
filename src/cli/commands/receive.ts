/**
 * receive command: a standalone storage listener
 */

import { Command } from 'commander';
import { errorMessage } from '../../errors.js';
import { DimseAssociationService } from '../../association/DimseAssociationService.js';
import { DicomStatus } from '../../dicom/Dimse.js';
import { InboundObjectReceiver } from '../../receiver/InboundObjectReceiver.js';
import { commandContext, waitForShutdownSignal } from '../lib/context.js';
import { parseIntegerOption } from '../lib/targets.js';
import type { ReceiveCommandOptions } from '../types/index.js';

export function registerReceiveCommand(program: Command): void {
  program
    .command('receive')
    .description('Accept C-STORE and C-ECHO and write objects under the output folder')
    .option('-p, --port <port>', 'Listen port (RELAY_LISTEN_PORT)')
    .action(async (options: ReceiveCommandOptions, cmd: Command) => {
      const { config, formatter } = commandContext(cmd, {
        listenPort: parseIntegerOption(options.port, '--port'),
      });

      const service = new DimseAssociationService({ localAeTitle: config.localAeTitle });
      const receiver = new InboundObjectReceiver(config.outputDir);
      let stored = 0;
      service.registerInboundHandler((object) => {
        const status = receiver.handle(object);
        if (status === DicomStatus.SUCCESS) stored++;
        return status;
      });

      try {
        const port = await service.startListener(config.listenPort);
        formatter.success(`Listening as ${config.localAeTitle} on port ${port}`);
        formatter.details([['Output', receiver.root]]);
        const signal = await waitForShutdownSignal();
        formatter.info(`Received ${signal}, ${stored} objects stored`);
      } catch (error) {
        formatter.error('Listener failed', errorMessage(error));
        process.exitCode = 1;
      } finally {
        await service.stopListener();
      }
    });
}

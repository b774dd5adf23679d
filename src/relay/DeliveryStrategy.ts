/**
 * How the engine hands a study to the destination
 */

import { promises as fs } from 'fs';
import { errorMessage } from '../errors.js';
import { getLogger, registerComponent } from '../logging/index.js';
import type { AssociationService, RemoteNode } from '../association/AssociationService.js';
import { DicomObject, DicomObjectCodec } from '../dicom/DicomObjectCodec.js';
import { formatStatus, isStoreAccepted } from '../dicom/Dimse.js';
import type { DicomWebClient } from '../dicomweb/DicomWebClient.js';
import type { InboundObjectReceiver } from '../receiver/InboundObjectReceiver.js';
import type { DeliveryOutcome, DeliveryPayload, StudySummary } from './types.js';

registerComponent('delivery', 'Study delivery (STOW-RS / C-STORE / folder)');
const logger = getLogger('delivery');

export type WireForm = DeliveryPayload['kind'];

export interface DeliveryStrategy {
  readonly name: string;
  /** Form the payload must be in; the engine transcodes to it */
  readonly wireForm: WireForm;
  deliver(study: StudySummary, payload: DeliveryPayload): Promise<DeliveryOutcome>;
}

/**
 * STOW-RS POST /studies. Only 200 confirms the whole study; 202 means some
 * instances were refused and counts as a failure.
 */
export class StowDelivery implements DeliveryStrategy {
  readonly name = 'STOW-RS';
  readonly wireForm = 'multipart';

  constructor(private readonly client: DicomWebClient) {}

  async deliver(study: StudySummary, payload: DeliveryPayload): Promise<DeliveryOutcome> {
    if (payload.kind !== 'multipart') {
      throw new TypeError('STOW-RS delivery takes a multipart payload');
    }
    const { statusCode } = await this.client.storeInstances(payload.body, payload.contentType);
    if (statusCode === 200) {
      return { delivered: payload.objectCount, failed: 0 };
    }
    logger.warn(`STOW-RS of ${study.studyInstanceUID} answered HTTP ${statusCode}`);
    return {
      delivered: 0,
      failed: payload.objectCount,
      details: statusCode === 202 ? 'HTTP 202: some instances were not stored' : `HTTP ${statusCode}`,
    };
  }
}

/**
 * One C-STORE per object over one association
 */
export class StoreDelivery implements DeliveryStrategy {
  readonly name = 'C-STORE';
  readonly wireForm = 'objects';
  private readonly codec = new DicomObjectCodec();

  constructor(
    private readonly service: AssociationService,
    private readonly destination: RemoteNode
  ) {}

  async deliver(study: StudySummary, payload: DeliveryPayload): Promise<DeliveryOutcome> {
    if (payload.kind !== 'objects') {
      throw new TypeError('C-STORE delivery takes individual objects');
    }

    const objects: DicomObject[] = [];
    let unreadable = 0;
    for (const bytes of payload.objects) {
      try {
        objects.push(this.codec.toObject(bytes));
      } catch (error) {
        unreadable++;
        logger.warn(`Cannot store an object of ${study.studyInstanceUID}`, { error: errorMessage(error) });
      }
    }
    if (objects.length === 0) {
      return { delivered: 0, failed: unreadable };
    }

    const results = await this.service.store(this.destination, objects);
    const rejected = results.filter((result) => !isStoreAccepted(result.status));
    for (const result of rejected) {
      logger.warn(
        `C-STORE of ${result.sopInstanceUID} to ${this.destination.aeTitle}: ${result.error ?? formatStatus(result.status)}`
      );
    }

    return {
      delivered: results.length - rejected.length,
      failed: rejected.length + unreadable,
      details: rejected.length > 0 ? `${rejected.length} C-STORE requests not accepted` : undefined,
    };
  }
}

/**
 * Write every object under the receiver's path rules. Objects a C-MOVE
 * already landed through the listener are only checked for presence.
 */
export class FolderDelivery implements DeliveryStrategy {
  readonly name = 'folder';
  readonly wireForm = 'objects';
  private readonly codec = new DicomObjectCodec();

  constructor(private readonly receiver: InboundObjectReceiver) {}

  async deliver(study: StudySummary, payload: DeliveryPayload): Promise<DeliveryOutcome> {
    if (payload.kind !== 'objects') {
      throw new TypeError('Folder delivery takes individual objects');
    }
    if (payload.storedPaths && payload.storedPaths.length === payload.objects.length) {
      return this.confirm(payload.storedPaths);
    }

    let delivered = 0;
    let failed = 0;
    for (const bytes of payload.objects) {
      try {
        const identifiers = this.codec.readIdentifiers(bytes);
        this.receiver.persist({
          ...identifiers,
          callingAE: 'local',
          transferSyntaxUID: identifiers.transferSyntaxUID ?? '',
          dataSet: bytes,
        });
        delivered++;
      } catch (error) {
        failed++;
        logger.warn(`Cannot write an object of ${study.studyInstanceUID}`, { error: errorMessage(error) });
      }
    }
    return { delivered, failed };
  }

  private async confirm(paths: string[]): Promise<DeliveryOutcome> {
    let delivered = 0;
    for (const file of paths) {
      try {
        await fs.access(file);
        delivered++;
      } catch (error) {
        logger.warn(`Received object missing at ${file}`, { error: errorMessage(error) });
      }
    }
    return { delivered, failed: paths.length - delivered };
  }
}

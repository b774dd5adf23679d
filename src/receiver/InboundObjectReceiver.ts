/**
 * Inbound Object Receiver
 *
 * Writes each object pushed to the listener under
 * root/<patient>/<study>/<series>/<sop>.dcm and answers with the C-STORE
 * status. File calls are synchronous: the status has to exist before the
 * listener builds its response.
 */

import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { errorMessage } from '../errors.js';
import { getLogger, registerComponent } from '../logging/index.js';
import type { InboundObject } from '../association/AssociationService.js';
import { DicomObjectCodec, isPart10 } from '../dicom/DicomObjectCodec.js';
import { DicomStatus } from '../dicom/Dimse.js';
import type { TransferTracker } from '../relay/TransferTracker.js';

registerComponent('receiver', 'Inbound object writer');
const logger = getLogger('receiver');

export const UNKNOWN_SEGMENT = 'Unknown';
export const FILE_EXTENSION = '.dcm';

export interface PathIdentifiers {
  patientID?: string;
  studyInstanceUID?: string;
  seriesInstanceUID?: string;
  sopInstanceUID?: string;
}

/**
 * Make an attribute value safe as one path segment
 */
export function sanitizeSegment(value: string): string {
  const cleaned = value.replace(/\0/g, '').replace(/[/\\]/g, '_');
  return /^\.+$/.test(cleaned) ? '_' : cleaned;
}

/**
 * Filename stem for objects without a SOP Instance UID: time-derived, with
 * a random suffix so two in the same millisecond stay apart
 */
export function syntheticInstanceName(now: number = Date.now()): string {
  return `instance_${now}_${uuidv4().replace(/-/g, '').substring(0, 8)}`;
}

function segment(value: string | undefined): string {
  const trimmed = value?.trim();
  return trimmed ? sanitizeSegment(trimmed) : UNKNOWN_SEGMENT;
}

export class InboundObjectReceiver {
  private readonly codec = new DicomObjectCodec();

  constructor(
    private readonly outputRoot: string,
    private readonly tracker?: TransferTracker
  ) {}

  get root(): string {
    return this.outputRoot;
  }

  storagePath(identifiers: PathIdentifiers): string {
    const sop = identifiers.sopInstanceUID?.trim();
    return path.join(
      this.outputRoot,
      segment(identifiers.patientID),
      segment(identifiers.studyInstanceUID),
      segment(identifiers.seriesInstanceUID),
      (sop ? sanitizeSegment(sop) : syntheticInstanceName()) + FILE_EXTENSION
    );
  }

  /**
   * Persist one object and return its path. Part-10 input is written as
   * is; a bare data set gets a file meta header first. Throws on I/O errors.
   */
  persist(object: InboundObject): string {
    const target = this.storagePath(object);
    const bytes = isPart10(object.dataSet)
      ? object.dataSet
      : this.codec.serialize({
          sopClassUID: object.sopClassUID ?? '',
          sopInstanceUID: object.sopInstanceUID ?? path.basename(target, FILE_EXTENSION),
          transferSyntaxUID: object.transferSyntaxUID,
          dataSet: object.dataSet,
        });

    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, bytes);
    return target;
  }

  /**
   * Listener callback: write the object, tell the tracker, return the status
   */
  handle(object: InboundObject): number {
    try {
      const target = this.persist(object);
      logger.debug(`Stored ${object.sopInstanceUID ?? 'unnamed object'} from ${object.callingAE} at ${target}`);
      this.tracker?.record(object.studyInstanceUID, {
        success: true,
        sopInstanceUID: object.sopInstanceUID,
        path: target,
      });
      return DicomStatus.SUCCESS;
    } catch (error) {
      logger.warn(`Failed to store ${object.sopInstanceUID ?? 'unnamed object'} from ${object.callingAE}`, {
        error: errorMessage(error),
      });
      this.tracker?.record(object.studyInstanceUID, {
        success: false,
        sopInstanceUID: object.sopInstanceUID,
        error: errorMessage(error),
      });
      return DicomStatus.CANNOT_UNDERSTAND;
    }
  }
}

/**
 * How the engine fetches a study's content from the source
 */

import { promises as fs } from 'fs';
import { RelayError } from '../errors.js';
import { getLogger, registerComponent } from '../logging/index.js';
import type { AssociationService, MoveResponse, RemoteNode } from '../association/AssociationService.js';
import { DicomStatus, formatStatus, isPending } from '../dicom/Dimse.js';
import type { DicomWebClient } from '../dicomweb/DicomWebClient.js';
import type { TransferTracker } from './TransferTracker.js';
import type { RetrievedStudy, StudySummary } from './types.js';

registerComponent('retrieval', 'Study retrieval (WADO-RS / C-MOVE)');
const logger = getLogger('retrieval');

export interface RetrievalStrategy {
  readonly name: string;
  retrieve(study: StudySummary): Promise<RetrievedStudy>;
}

/**
 * One WADO-RS request for the whole study
 */
export class WadoRetrieval implements RetrievalStrategy {
  readonly name = 'WADO-RS';

  constructor(private readonly client: DicomWebClient) {}

  async retrieve(study: StudySummary): Promise<RetrievedStudy> {
    const { body, contentType } = await this.client.retrieveStudy(study.studyInstanceUID);
    return { kind: 'multipart', body, contentType };
  }
}

export interface MoveRetrievalOptions {
  /** Our AE title, named as the C-MOVE destination */
  localAeTitle: string;
  /** Quiet period after the final response with no new arrival */
  quiescenceMs: number;
  /** Upper bound on waiting for arrivals after the final response */
  timeoutMs: number;
}

/**
 * C-MOVE the study to our own listener and correlate the move status with
 * the objects the receiver actually wrote.
 *
 * Success needs a final status of 0x0000 with no failed sub-operations, at
 * least as many written objects as the final response reports completed,
 * at least one object, and no write failure on our side.
 */
export class MoveRetrieval implements RetrievalStrategy {
  readonly name = 'C-MOVE';

  constructor(
    private readonly service: AssociationService,
    private readonly source: RemoteNode,
    private readonly tracker: TransferTracker,
    private readonly options: MoveRetrievalOptions
  ) {}

  async retrieve(study: StudySummary): Promise<RetrievedStudy> {
    const uid = study.studyInstanceUID;
    this.tracker.begin(uid);
    try {
      const final = await this.move(uid);
      if (final.status !== DicomStatus.SUCCESS) {
        throw new RelayError(`C-MOVE of ${uid} ended with status ${formatStatus(final.status)}`);
      }
      if ((final.failed ?? 0) > 0) {
        throw new RelayError(`C-MOVE of ${uid} reported ${final.failed ?? 0} failed sub-operations`);
      }

      const { reason, snapshot } = await this.tracker.waitFor(uid, {
        expected: final.completed,
        quietMs: this.options.quiescenceMs,
        timeoutMs: this.options.timeoutMs,
      });
      logger.debug(
        `C-MOVE of ${uid}: ${snapshot.written} written, ${snapshot.failed} failed, completed=${final.completed ?? '?'} (${reason})`
      );

      if (snapshot.failed > 0) {
        throw new RelayError(`${snapshot.failed} objects of ${uid} could not be written`);
      }
      if (final.completed !== undefined && snapshot.written < final.completed) {
        throw new RelayError(`Only ${snapshot.written} of ${final.completed} objects of ${uid} arrived`);
      }
      if (snapshot.written === 0) {
        throw new RelayError(`C-MOVE of ${uid} delivered no objects`);
      }

      const objects = await Promise.all(snapshot.paths.map((file) => fs.readFile(file)));
      return { kind: 'objects', objects, storedPaths: snapshot.paths };
    } finally {
      this.tracker.end(uid);
    }
  }

  private async move(uid: string): Promise<MoveResponse> {
    let final: MoveResponse | undefined;
    for await (const response of this.service.move(
      this.source,
      { level: 'STUDY', studyInstanceUID: uid },
      this.options.localAeTitle
    )) {
      if (isPending(response.status)) {
        logger.trace(
          `C-MOVE ${uid} pending: ${response.remaining ?? '?'} remaining, ${response.completed ?? 0} completed`
        );
      } else {
        final = response;
      }
    }
    if (!final) {
      throw new RelayError(`C-MOVE of ${uid} ended without a final response`);
    }
    return final;
  }
}

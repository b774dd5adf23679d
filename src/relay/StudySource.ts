/**
 * Where the poller looks for studies
 */

import { AssociationError } from '../errors.js';
import type { AssociationService, RemoteNode } from '../association/AssociationService.js';
import { DicomStatus, formatStatus, isPending } from '../dicom/Dimse.js';
import type { DicomWebClient } from '../dicomweb/DicomWebClient.js';
import type { OrthancClient } from '../dicomweb/OrthancClient.js';
import type { StudySummary } from './types.js';

export interface StudySource {
  readonly description: string;
  listStudies(): Promise<StudySummary[]>;
}

/**
 * QIDO-RS GET /studies
 */
export class DicomWebStudySource implements StudySource {
  constructor(private readonly client: DicomWebClient) {}

  get description(): string {
    return `DICOMweb ${this.client.baseUrl}`;
  }

  listStudies(): Promise<StudySummary[]> {
    return this.client.listStudies();
  }
}

/**
 * Orthanc GET /studies plus GET /studies/{id}
 */
export class OrthancStudySource implements StudySource {
  constructor(
    private readonly client: OrthancClient,
    private readonly baseUrl: string
  ) {}

  get description(): string {
    return `Orthanc ${this.baseUrl}`;
  }

  listStudies(): Promise<StudySummary[]> {
    return this.client.listStudies();
  }
}

/**
 * C-FIND at STUDY level with an empty Study Instance UID
 */
export class DimseStudySource implements StudySource {
  constructor(
    private readonly service: AssociationService,
    private readonly node: RemoteNode
  ) {}

  get description(): string {
    return `C-FIND ${this.node.aeTitle}@${this.node.host}:${this.node.port}`;
  }

  async listStudies(): Promise<StudySummary[]> {
    const studies: StudySummary[] = [];
    const seen = new Set<string>();
    let finalStatus: number | undefined;

    for await (const response of this.service.find(this.node, { level: 'STUDY', studyInstanceUID: '' })) {
      if (!isPending(response.status)) {
        finalStatus = response.status;
        continue;
      }
      const uid = response.identifier?.studyInstanceUID;
      if (uid && !seen.has(uid)) {
        seen.add(uid);
        studies.push({ studyIdentifier: uid, studyInstanceUID: uid });
      }
    }

    if (finalStatus !== DicomStatus.SUCCESS) {
      throw new AssociationError(
        `C-FIND on ${this.node.aeTitle} ended with ${finalStatus === undefined ? 'no final response' : formatStatus(finalStatus)}`
      );
    }
    return studies;
  }
}

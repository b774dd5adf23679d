/**
 * Relay data model
 */

export interface StudySummary {
  /** Source-local id: the Study Instance UID, or Orthanc's resource id */
  studyIdentifier: string;
  studyInstanceUID: string;
}

export enum StudyState {
  DISCOVERED = 'Discovered',
  RETRIEVING = 'Retrieving',
  TRANSCODING = 'Transcoding',
  DELIVERING = 'Delivering',
  DELIVERED = 'Delivered',
  FAILED = 'Failed',
}

export interface StudyRecord {
  studyIdentifier: string;
  studyInstanceUID: string;
  state: StudyState;
  attemptCount: number;
  lastError?: string;
  lastAttemptTime?: Date;
  /** Objects confirmed by the destination on the last attempt */
  deliveredCount: number;
}

/**
 * Study content as retrieved, in the wire form of the retrieval protocol
 */
export type RetrievedStudy =
  | { kind: 'multipart'; body: Buffer; contentType: string }
  | {
      kind: 'objects';
      objects: Buffer[];
      /** Files the listener already wrote these objects to (C-MOVE) */
      storedPaths?: string[];
    };

/**
 * Study content in the wire form the destination takes
 */
export type DeliveryPayload =
  | { kind: 'multipart'; body: Buffer; contentType: string; objectCount: number }
  | { kind: 'objects'; objects: Buffer[]; storedPaths?: string[] };

export interface DeliveryOutcome {
  /** Objects the destination confirmed */
  delivered: number;
  /** Objects attempted but not confirmed */
  failed: number;
  details?: string;
}

/**
 * Contract between the relay and the DIMSE network layer.
 *
 * The relay engine, the study sources and the CLI only see this interface;
 * DimseAssociationService is the implementation that speaks the protocol.
 */

import type { DicomObject } from '../dicom/DicomObjectCodec.js';

export interface RemoteNode {
  host: string;
  port: number;
  aeTitle: string;
}

/**
 * Query at STUDY level. An absent or empty Study Instance UID matches every
 * study.
 */
export interface StudyQuery {
  level: 'STUDY';
  studyInstanceUID?: string;
}

export interface FindResponse {
  status: number;
  identifier?: {
    studyInstanceUID?: string;
    patientID?: string;
  };
}

export interface MoveResponse {
  status: number;
  remaining?: number;
  completed?: number;
  failed?: number;
  warning?: number;
}

export interface StoreResult {
  sopInstanceUID: string;
  status: number;
  /** Set when the object never reached the remote node */
  error?: string;
}

/**
 * One object pushed to the local listener
 */
export interface InboundObject {
  callingAE: string;
  patientID?: string;
  studyInstanceUID?: string;
  seriesInstanceUID?: string;
  sopInstanceUID?: string;
  sopClassUID?: string;
  transferSyntaxUID: string;
  dataSet: Buffer;
}

/**
 * Called once per inbound C-STORE; the returned status goes back to the
 * sender. Runs synchronously on the listener's socket callback.
 */
export type InboundHandler = (object: InboundObject) => number;

export interface AssociationService {
  echo(node: RemoteNode): Promise<number>;

  /**
   * Store objects over one association, one C-STORE each. Resolves with one
   * result per object, in order; only a failure to associate rejects.
   */
  store(node: RemoteNode, objects: DicomObject[]): Promise<StoreResult[]>;

  find(node: RemoteNode, query: StudyQuery): AsyncIterable<FindResponse>;

  move(node: RemoteNode, query: StudyQuery, destinationAeTitle: string): AsyncIterable<MoveResponse>;

  registerInboundHandler(handler: InboundHandler): void;

  /** Resolves with the bound port */
  startListener(port: number): Promise<number>;

  stopListener(): Promise<void>;
}

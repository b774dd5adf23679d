/**
 * AssociationService over the bundled DIMSE client and listener.
 *
 * Every operation opens its own association and releases it when done;
 * the listener is long-lived and shared by every inbound sender.
 */

import { AssociationError, errorMessage } from '../errors.js';
import { getLogger, registerComponent } from '../logging/index.js';
import { DicomConnection, AssociationParams, RequestedContext } from '../dicom/DicomConnection.js';
import { DicomListener, StoreRequest } from '../dicom/DicomListener.js';
import { DicomObject, DicomObjectCodec, ElementSpec } from '../dicom/DicomObjectCodec.js';
import { DicomStatus } from '../dicom/Dimse.js';
import { DicomTag, SopClass, TransferSyntax } from '../dicom/DicomTags.js';
import { DEFAULT_MAX_PDU_LENGTH } from '../dicom/Pdu.js';
import type {
  AssociationService,
  FindResponse,
  InboundHandler,
  MoveResponse,
  RemoteNode,
  StoreResult,
  StudyQuery,
} from './AssociationService.js';

registerComponent('association', 'DIMSE association service');
const logger = getLogger('association');

/** Presentation contexts allowed in one A-ASSOCIATE-RQ */
const MAX_CONTEXTS = 128;

const QUERY_TRANSFER_SYNTAXES = [
  TransferSyntax.EXPLICIT_VR_LITTLE_ENDIAN,
  TransferSyntax.IMPLICIT_VR_LITTLE_ENDIAN,
];

export interface DimseAssociationOptions {
  /** Our AE title: calling AE on requests, C-MOVE destination for the source */
  localAeTitle: string;
  /** Reject inbound associations addressed to another AE title */
  enforceCalledAeTitle: boolean;
  maxPduLength: number;
  connectTimeout: number;
  associationTimeout: number;
  responseTimeout: number;
  idleTimeout: number;
}

export class DimseAssociationService implements AssociationService {
  private readonly options: DimseAssociationOptions;
  private readonly codec = new DicomObjectCodec();
  private listener: DicomListener | null = null;
  private inboundHandler: InboundHandler | null = null;

  constructor(options: Partial<DimseAssociationOptions> & { localAeTitle: string }) {
    this.options = {
      enforceCalledAeTitle: false,
      maxPduLength: DEFAULT_MAX_PDU_LENGTH,
      connectTimeout: 30000,
      associationTimeout: 30000,
      responseTimeout: 60000,
      idleTimeout: 60000,
      ...options,
    };
  }

  async echo(node: RemoteNode): Promise<number> {
    const connection = this.connect(node, [
      { abstractSyntax: SopClass.VERIFICATION, transferSyntaxes: [TransferSyntax.IMPLICIT_VR_LITTLE_ENDIAN] },
    ]);
    await connection.associate();
    try {
      return await connection.cEcho();
    } finally {
      await releaseQuietly(connection);
    }
  }

  async store(node: RemoteNode, objects: DicomObject[]): Promise<StoreResult[]> {
    const results: StoreResult[] = [];
    for (const batch of batchByContext(objects)) {
      const connection = this.connect(node, batch.contexts);
      await connection.associate();
      try {
        for (const object of batch.objects) {
          results.push(await storeOne(connection, object));
        }
      } finally {
        await releaseQuietly(connection);
      }
    }
    return results;
  }

  async *find(node: RemoteNode, query: StudyQuery): AsyncGenerator<FindResponse> {
    const connection = this.connect(node, [
      { abstractSyntax: SopClass.STUDY_ROOT_FIND, transferSyntaxes: QUERY_TRANSFER_SYNTAXES },
    ]);
    await connection.associate();
    try {
      const identifier: ElementSpec[] = [
        { tag: DicomTag.QUERY_RETRIEVE_LEVEL, vr: 'CS', value: query.level },
        { tag: DicomTag.PATIENT_ID, vr: 'LO', value: '' },
        { tag: DicomTag.STUDY_INSTANCE_UID, vr: 'UI', value: query.studyInstanceUID ?? '' },
      ];
      for await (const response of connection.cFind(identifier)) {
        const found = response.dataSet
          ? this.codec.readIdentifiers(response.dataSet, response.transferSyntax)
          : undefined;
        yield {
          status: response.command.status ?? DicomStatus.SUCCESS,
          identifier: found && { studyInstanceUID: found.studyInstanceUID, patientID: found.patientID },
        };
      }
    } finally {
      await releaseQuietly(connection);
    }
  }

  async *move(node: RemoteNode, query: StudyQuery, destinationAeTitle: string): AsyncGenerator<MoveResponse> {
    const connection = this.connect(node, [
      { abstractSyntax: SopClass.STUDY_ROOT_MOVE, transferSyntaxes: QUERY_TRANSFER_SYNTAXES },
    ]);
    await connection.associate();
    try {
      const identifier: ElementSpec[] = [
        { tag: DicomTag.QUERY_RETRIEVE_LEVEL, vr: 'CS', value: query.level },
        { tag: DicomTag.STUDY_INSTANCE_UID, vr: 'UI', value: query.studyInstanceUID ?? '' },
      ];
      for await (const response of connection.cMove(identifier, destinationAeTitle)) {
        const { command } = response;
        yield {
          status: command.status ?? DicomStatus.SUCCESS,
          remaining: command.remaining,
          completed: command.completed,
          failed: command.failed,
          warning: command.warning,
        };
      }
    } finally {
      await releaseQuietly(connection);
    }
  }

  registerInboundHandler(handler: InboundHandler): void {
    this.inboundHandler = handler;
  }

  async startListener(port: number): Promise<number> {
    if (this.listener) {
      throw new AssociationError('Listener already started');
    }
    const listener = new DicomListener({
      aeTitle: this.options.enforceCalledAeTitle ? this.options.localAeTitle : undefined,
      maxPduLength: this.options.maxPduLength,
      idleTimeout: this.options.idleTimeout,
    });
    listener.setStoreHandler((request) => this.handleStore(request));
    const boundPort = await listener.listen(port);
    this.listener = listener;
    return boundPort;
  }

  async stopListener(): Promise<void> {
    const listener = this.listener;
    this.listener = null;
    if (listener) {
      await listener.close();
    }
  }

  private handleStore(request: StoreRequest): number {
    if (!this.inboundHandler) {
      return DicomStatus.REFUSED_OUT_OF_RESOURCES;
    }
    const identifiers = this.codec.readIdentifiers(request.dataSet, request.transferSyntaxUID);
    return this.inboundHandler({
      callingAE: request.callingAE,
      patientID: identifiers.patientID,
      studyInstanceUID: identifiers.studyInstanceUID,
      seriesInstanceUID: identifiers.seriesInstanceUID,
      sopInstanceUID: identifiers.sopInstanceUID ?? (request.sopInstanceUID || undefined),
      sopClassUID: identifiers.sopClassUID ?? request.sopClassUID,
      transferSyntaxUID: request.transferSyntaxUID,
      dataSet: request.dataSet,
    });
  }

  private connect(node: RemoteNode, contexts: RequestedContext[]): DicomConnection {
    const params: Partial<AssociationParams> = {
      callingAE: this.options.localAeTitle,
      calledAE: node.aeTitle,
      host: node.host,
      port: node.port,
      maxPduLengthReceive: this.options.maxPduLength,
      contexts,
      connectTimeout: this.options.connectTimeout,
      associationTimeout: this.options.associationTimeout,
      responseTimeout: this.options.responseTimeout,
    };
    return new DicomConnection(params);
  }
}

interface StoreBatch {
  contexts: RequestedContext[];
  objects: DicomObject[];
}

/**
 * One presentation context per distinct (SOP class, transfer syntax) pair,
 * proposing exactly that syntax: objects are never transcoded. More pairs
 * than one association can carry spill into further associations.
 */
export function batchByContext(objects: DicomObject[]): StoreBatch[] {
  const batches: StoreBatch[] = [];
  let current: StoreBatch = { contexts: [], objects: [] };
  let keys = new Set<string>();

  for (const object of objects) {
    const key = `${object.sopClassUID}|${object.transferSyntaxUID}`;
    if (!keys.has(key)) {
      if (keys.size === MAX_CONTEXTS) {
        batches.push(current);
        current = { contexts: [], objects: [] };
        keys = new Set<string>();
      }
      keys.add(key);
      current.contexts.push({ abstractSyntax: object.sopClassUID, transferSyntaxes: [object.transferSyntaxUID] });
    }
    current.objects.push(object);
  }
  if (current.objects.length > 0) {
    batches.push(current);
  }
  return batches;
}

async function storeOne(connection: DicomConnection, object: DicomObject): Promise<StoreResult> {
  try {
    const status = await connection.cStore(object);
    return { sopInstanceUID: object.sopInstanceUID, status };
  } catch (error) {
    logger.warn(`C-STORE of ${object.sopInstanceUID} failed`, { error: errorMessage(error) });
    return {
      sopInstanceUID: object.sopInstanceUID,
      status: DicomStatus.PROCESSING_FAILURE,
      error: errorMessage(error),
    };
  }
}

async function releaseQuietly(connection: DicomConnection): Promise<void> {
  try {
    await connection.release();
  } catch (error) {
    logger.debug('Association release failed', { error: errorMessage(error) });
  }
}

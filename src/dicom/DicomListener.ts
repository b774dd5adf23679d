/**
 * DICOM Listener (SCP side)
 *
 * Accepts associations, answers C-ECHO and hands every C-STORE to a
 * synchronous store handler whose return value becomes the C-STORE-RSP
 * status. Several associations may be open at once.
 */

import * as net from 'net';
import { errorMessage } from '../errors.js';
import { getLogger, registerComponent } from '../logging/index.js';
import { SopClass, TransferSyntax, isStorageSopClass } from './DicomTags.js';
import {
  AssociateRequest,
  ContextResult,
  DEFAULT_MAX_PDU_LENGTH,
  NegotiatedContext,
  Pdu,
  PduReader,
  PduType,
  decodeAssociateRq,
  decodePData,
  encodeAbort,
  encodeAssociateAc,
  encodeAssociateRj,
  encodePData,
  encodeReleaseRp,
} from './Pdu.js';
import {
  DicomStatus,
  DimseCommand,
  DimseCommandType,
  DimseMessage,
  DimseMessageAssembler,
  encodeCommand,
  formatStatus,
} from './Dimse.js';
import { AssociationState } from './DicomConnection.js';

registerComponent('dicom-listener', 'Inbound associations (C-ECHO / C-STORE SCP)');
const logger = getLogger('dicom-listener');

/**
 * One C-STORE request as received
 */
export interface StoreRequest {
  callingAE: string;
  calledAE: string;
  sopClassUID: string;
  sopInstanceUID: string;
  transferSyntaxUID: string;
  dataSet: Buffer;
}

/**
 * Returns the DIMSE status for the C-STORE-RSP. Must not block.
 */
export type StoreHandler = (request: StoreRequest) => number;

export interface DicomListenerOptions {
  /** When set, associations calling any other AE title are rejected */
  aeTitle?: string;
  maxPduLength: number;
  /** Abort associations idle this long (ms, 0 = never) */
  idleTimeout: number;
  transferSyntaxes: string[];
}

interface ActiveAssociation {
  socket: net.Socket;
  state: AssociationState;
  callingAE: string;
  calledAE: string;
  contexts: Map<number, NegotiatedContext>;
  reader: PduReader;
  assembler: DimseMessageAssembler;
  maxPduLength: number;
}

/** A-ASSOCIATE-RJ result/source/reason values used here */
const REJECT_PERMANENT = 1;
const SOURCE_SERVICE_USER = 1;
const REASON_NO_REASON = 1;
const REASON_CALLED_AE_NOT_RECOGNIZED = 7;

export class DicomListener {
  private readonly options: DicomListenerOptions;
  private server: net.Server | null = null;
  private readonly associations = new Map<net.Socket, ActiveAssociation>();
  private storeHandler: StoreHandler | null = null;

  constructor(options: Partial<DicomListenerOptions> = {}) {
    this.options = {
      maxPduLength: DEFAULT_MAX_PDU_LENGTH,
      idleTimeout: 60000,
      transferSyntaxes: Object.values(TransferSyntax),
      ...options,
    };
  }

  setStoreHandler(handler: StoreHandler): void {
    this.storeHandler = handler;
  }

  isListening(): boolean {
    return this.server !== null;
  }

  getAssociationCount(): number {
    return this.associations.size;
  }

  /**
   * Start listening. Resolves with the bound port (useful with port 0).
   */
  async listen(port: number, host = '0.0.0.0'): Promise<number> {
    if (this.server) {
      throw new Error('DICOM listener is already running');
    }

    const server = net.createServer((socket) => this.handleConnection(socket));
    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error) => reject(error);
      server.once('error', onError);
      server.listen(port, host, () => {
        server.removeListener('error', onError);
        resolve();
      });
    });
    server.on('error', (error) => logger.error('DICOM listener error', error));
    this.server = server;

    const address = server.address();
    const boundPort = typeof address === 'object' && address ? address.port : port;
    logger.info(`DICOM listener on ${host}:${boundPort}${this.options.aeTitle ? ` as ${this.options.aeTitle}` : ''}`);
    return boundPort;
  }

  /**
   * Abort open associations and stop listening
   */
  async close(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;

    for (const [socket] of this.associations) {
      if (!socket.destroyed) {
        socket.write(encodeAbort());
      }
      socket.destroy();
    }
    this.associations.clear();

    await new Promise<void>((resolve) => server.close(() => resolve()));
    logger.info('DICOM listener stopped');
  }

  private handleConnection(socket: net.Socket): void {
    const association: ActiveAssociation = {
      socket,
      state: AssociationState.IDLE,
      callingAE: '',
      calledAE: '',
      contexts: new Map(),
      reader: new PduReader(),
      assembler: new DimseMessageAssembler(),
      maxPduLength: DEFAULT_MAX_PDU_LENGTH,
    };
    this.associations.set(socket, association);

    socket.on('data', (data: Buffer) => this.handleData(association, data));
    socket.on('close', () => this.associations.delete(socket));
    socket.on('error', (error) => {
      logger.warn(`Socket error from ${socket.remoteAddress ?? 'unknown'}`, { error: error.message });
      this.associations.delete(socket);
    });

    if (this.options.idleTimeout > 0) {
      socket.setTimeout(this.options.idleTimeout, () => {
        logger.warn(`Aborting idle association from ${association.callingAE || 'unknown'}`);
        this.abort(association);
      });
    }
  }

  private handleData(association: ActiveAssociation, data: Buffer): void {
    for (const pdu of association.reader.push(data)) {
      try {
        this.handlePdu(association, pdu);
      } catch (error) {
        logger.warn(`Protocol error from ${association.callingAE || 'unknown'}, aborting`, {
          error: errorMessage(error),
        });
        this.abort(association);
        return;
      }
    }
  }

  private handlePdu(association: ActiveAssociation, pdu: Pdu): void {
    switch (pdu.type) {
      case PduType.A_ASSOCIATE_RQ:
        this.handleAssociateRq(association, decodeAssociateRq(pdu.data));
        break;
      case PduType.P_DATA_TF:
        if (association.state !== AssociationState.ASSOCIATED) {
          throw new Error('P-DATA-TF before association');
        }
        for (const pdv of decodePData(pdu.data)) {
          const message = association.assembler.accept(pdv);
          if (message) {
            this.handleMessage(association, message);
          }
        }
        break;
      case PduType.A_RELEASE_RQ:
        association.socket.write(encodeReleaseRp());
        association.state = AssociationState.CLOSED;
        association.socket.end();
        logger.debug(`Association from ${association.callingAE} released`);
        break;
      case PduType.A_ABORT:
        logger.debug(`Association from ${association.callingAE} aborted by peer`);
        association.state = AssociationState.CLOSED;
        association.socket.destroy();
        break;
      default:
        throw new Error(`Unexpected PDU type 0x${pdu.type.toString(16)}`);
    }
  }

  private handleAssociateRq(association: ActiveAssociation, request: AssociateRequest): void {
    association.calledAE = request.calledAE;
    association.callingAE = request.callingAE;

    if (this.options.aeTitle && request.calledAE !== this.options.aeTitle) {
      logger.warn(`Rejecting association for unknown AE title ${request.calledAE} from ${request.callingAE}`);
      this.reject(association, REASON_CALLED_AE_NOT_RECOGNIZED);
      return;
    }

    const contexts = request.contexts.map((context) => this.negotiate(context.id, context.abstractSyntax, context.transferSyntaxes));
    const accepted = contexts.filter((context) => context.result === ContextResult.ACCEPTANCE);
    if (accepted.length === 0) {
      logger.warn(`Rejecting association from ${request.callingAE}: no acceptable presentation context`);
      this.reject(association, REASON_NO_REASON);
      return;
    }

    for (const context of accepted) {
      association.contexts.set(context.id, context);
    }
    association.maxPduLength = request.maxPduLength;
    association.socket.write(
      encodeAssociateAc({
        calledAE: request.calledAE,
        callingAE: request.callingAE,
        contexts,
        maxPduLength: this.options.maxPduLength,
      })
    );
    association.state = AssociationState.ASSOCIATED;
    logger.debug(`Accepted association from ${request.callingAE} (${accepted.length} contexts)`);
  }

  private negotiate(id: number, abstractSyntax: string, proposed: string[]): NegotiatedContext {
    if (abstractSyntax !== SopClass.VERIFICATION && !isStorageSopClass(abstractSyntax)) {
      return { id, abstractSyntax, result: ContextResult.ABSTRACT_SYNTAX_NOT_SUPPORTED };
    }
    const transferSyntax = proposed.find((ts) => this.options.transferSyntaxes.includes(ts));
    if (!transferSyntax) {
      return { id, abstractSyntax, result: ContextResult.TRANSFER_SYNTAXES_NOT_SUPPORTED };
    }
    return { id, abstractSyntax, result: ContextResult.ACCEPTANCE, transferSyntax };
  }

  private reject(association: ActiveAssociation, reason: number): void {
    association.state = AssociationState.CLOSED;
    association.socket.end(
      encodeAssociateRj({ result: REJECT_PERMANENT, source: SOURCE_SERVICE_USER, reason })
    );
  }

  private abort(association: ActiveAssociation): void {
    association.state = AssociationState.CLOSED;
    if (!association.socket.destroyed) {
      association.socket.write(encodeAbort());
    }
    association.socket.destroy();
    this.associations.delete(association.socket);
  }

  private handleMessage(association: ActiveAssociation, message: DimseMessage): void {
    const context = association.contexts.get(message.contextId);
    if (!context) {
      throw new Error(`Message on unknown presentation context ${message.contextId}`);
    }

    switch (message.command.commandField) {
      case DimseCommandType.C_ECHO_RQ:
        this.respond(association, message.contextId, {
          commandField: DimseCommandType.C_ECHO_RSP,
          affectedSopClassUid: SopClass.VERIFICATION,
          messageIdBeingRespondedTo: message.command.messageId,
          status: DicomStatus.SUCCESS,
          dataSetPresent: false,
        });
        break;
      case DimseCommandType.C_STORE_RQ:
        this.handleStore(association, context, message);
        break;
      default:
        logger.warn(`Unsupported DIMSE command 0x${message.command.commandField.toString(16)} from ${association.callingAE}`);
        this.respond(association, message.contextId, {
          commandField: (message.command.commandField | 0x8000) & 0xffff,
          affectedSopClassUid: message.command.affectedSopClassUid,
          messageIdBeingRespondedTo: message.command.messageId,
          status: DicomStatus.UNRECOGNIZED_OPERATION,
          dataSetPresent: false,
        });
    }
  }

  private handleStore(association: ActiveAssociation, context: NegotiatedContext, message: DimseMessage): void {
    const sopClassUID = message.command.affectedSopClassUid ?? context.abstractSyntax;
    const sopInstanceUID = message.command.affectedSopInstanceUid ?? '';
    let status: number = DicomStatus.PROCESSING_FAILURE;

    if (!this.storeHandler) {
      logger.warn(`No store handler registered, refusing ${sopInstanceUID}`);
      status = DicomStatus.REFUSED_OUT_OF_RESOURCES;
    } else {
      try {
        status = this.storeHandler({
          callingAE: association.callingAE,
          calledAE: association.calledAE,
          sopClassUID,
          sopInstanceUID,
          transferSyntaxUID: context.transferSyntax ?? TransferSyntax.IMPLICIT_VR_LITTLE_ENDIAN,
          dataSet: message.dataSet ?? Buffer.alloc(0),
        });
      } catch (error) {
        logger.warn(`Store handler threw for ${sopInstanceUID}`, { error: errorMessage(error) });
        status = DicomStatus.PROCESSING_FAILURE;
      }
    }

    logger.debug(`C-STORE ${sopInstanceUID} from ${association.callingAE}: ${formatStatus(status)}`);
    this.respond(association, message.contextId, {
      commandField: DimseCommandType.C_STORE_RSP,
      affectedSopClassUid: sopClassUID,
      affectedSopInstanceUid: sopInstanceUID,
      messageIdBeingRespondedTo: message.command.messageId,
      status,
      dataSetPresent: false,
    });
  }

  private respond(association: ActiveAssociation, contextId: number, command: DimseCommand): void {
    for (const pdu of encodePData(contextId, true, encodeCommand(command), association.maxPduLength)) {
      association.socket.write(pdu);
    }
  }
}

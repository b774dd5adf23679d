/**
 * DICOM Connection (SCU side)
 *
 * Opens one association to a remote application entity and runs DIMSE
 * requests over it one at a time: C-ECHO, C-STORE, C-FIND and C-MOVE.
 * C-FIND and C-MOVE responses are surfaced as async iterables so callers
 * see every pending response as it arrives.
 */

import * as net from 'net';
import { EventEmitter } from 'events';
import { AssociationError, errorMessage } from '../errors.js';
import { getLogger, registerComponent } from '../logging/index.js';
import { SopClass, TransferSyntax, encodingOf } from './DicomTags.js';
import { DicomObject, ElementSpec, encodeDataSet } from './DicomObjectCodec.js';
import {
  ContextResult,
  DEFAULT_MAX_PDU_LENGTH,
  NegotiatedContext,
  Pdu,
  PduReader,
  PduType,
  ProposedContext,
  decodeAbort,
  decodeAssociateAc,
  decodeAssociateRj,
  decodePData,
  encodeAbort,
  encodeAssociateRq,
  encodePData,
  encodeReleaseRp,
  encodeReleaseRq,
} from './Pdu.js';
import {
  DimseCommand,
  DimseCommandType,
  DimseMessage,
  DimseMessageAssembler,
  Priority,
  encodeCommand,
  isPending,
} from './Dimse.js';

registerComponent('dicom-connection', 'DIMSE requests to remote nodes');
const logger = getLogger('dicom-connection');

export enum AssociationState {
  IDLE = 'IDLE',
  AWAITING_ASSOCIATE_AC = 'AWAITING_ASSOCIATE_AC',
  ASSOCIATED = 'ASSOCIATED',
  AWAITING_RELEASE_RP = 'AWAITING_RELEASE_RP',
  CLOSED = 'CLOSED',
}

export interface RequestedContext {
  abstractSyntax: string;
  transferSyntaxes: string[];
}

export interface AssociationParams {
  /** Calling Application Entity title (local) */
  callingAE: string;
  /** Called Application Entity title (remote) */
  calledAE: string;
  host: string;
  port: number;
  /** Largest PDU we accept; the peer's limit applies to what we send */
  maxPduLengthReceive: number;
  contexts: RequestedContext[];
  connectTimeout: number;
  associationTimeout: number;
  /** Time allowed between two responses to the same request */
  responseTimeout: number;
}

interface ResponseWaiter {
  resolve: (message: DimseMessage) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

export class DicomConnection extends EventEmitter {
  private socket: net.Socket | null = null;
  private readonly params: AssociationParams;
  private state: AssociationState = AssociationState.IDLE;
  private readonly reader = new PduReader();
  private readonly assembler = new DimseMessageAssembler();
  private proposed: ProposedContext[] = [];
  private negotiated: NegotiatedContext[] = [];
  private maxPduLengthSend = DEFAULT_MAX_PDU_LENGTH;
  private messageIdCounter = 1;
  private readonly responses: DimseMessage[] = [];
  private waiter: ResponseWaiter | null = null;
  private closeReason: string | null = null;

  constructor(params: Partial<AssociationParams> = {}) {
    super();
    this.params = {
      callingAE: 'DICOM_RELAY',
      calledAE: 'ANY-SCP',
      host: 'localhost',
      port: 104,
      maxPduLengthReceive: DEFAULT_MAX_PDU_LENGTH,
      contexts: [
        {
          abstractSyntax: SopClass.VERIFICATION,
          transferSyntaxes: [TransferSyntax.IMPLICIT_VR_LITTLE_ENDIAN],
        },
      ],
      connectTimeout: 30000,
      associationTimeout: 30000,
      responseTimeout: 60000,
      ...params,
    };
  }

  getState(): AssociationState {
    return this.state;
  }

  isAssociated(): boolean {
    return this.state === AssociationState.ASSOCIATED;
  }

  /**
   * Contexts as answered by the remote node
   */
  getNegotiatedContexts(): NegotiatedContext[] {
    return [...this.negotiated];
  }

  /**
   * Open the connection and negotiate the association
   */
  async associate(): Promise<void> {
    if (this.state !== AssociationState.IDLE) {
      throw new AssociationError(`Cannot associate in state ${this.state}`);
    }

    this.proposed = this.params.contexts.map((context, index) => ({
      id: index * 2 + 1, // context ids are odd
      abstractSyntax: context.abstractSyntax,
      transferSyntaxes: context.transferSyntaxes,
    }));
    if (this.proposed.length === 0 || this.proposed.length > 128) {
      throw new AssociationError(`Cannot propose ${this.proposed.length} presentation contexts`);
    }

    await this.connect();
    this.state = AssociationState.AWAITING_ASSOCIATE_AC;
    const accepted = this.waitForAssociateAc();
    await this.sendPdu(
      encodeAssociateRq({
        calledAE: this.params.calledAE,
        callingAE: this.params.callingAE,
        contexts: this.proposed,
        maxPduLength: this.params.maxPduLengthReceive,
      })
    );
    await accepted;
    logger.debug(
      `Associated ${this.params.callingAE} -> ${this.params.calledAE}@${this.params.host}:${this.params.port}`
    );
  }

  private async connect(): Promise<void> {
    return new Promise((resolve, reject) => {
      const socket = new net.Socket();
      this.socket = socket;

      const connectTimeout = setTimeout(() => {
        socket.destroy();
        reject(new AssociationError(`Connection to ${this.params.host}:${this.params.port} timed out`));
      }, this.params.connectTimeout);

      const onConnectError = (error: Error) => {
        clearTimeout(connectTimeout);
        this.state = AssociationState.CLOSED;
        reject(
          new AssociationError(`Cannot connect to ${this.params.host}:${this.params.port}: ${error.message}`, {
            cause: error,
          })
        );
      };

      socket.once('error', onConnectError);
      socket.connect(this.params.port, this.params.host, () => {
        clearTimeout(connectTimeout);
        socket.removeListener('error', onConnectError);
        this.setupSocketHandlers(socket);
        resolve();
      });
    });
  }

  private setupSocketHandlers(socket: net.Socket): void {
    socket.on('data', (data: Buffer) => this.handleData(data));
    socket.on('close', () => this.handleClose());
    socket.on('error', (error) => {
      logger.warn(`Socket error on association with ${this.params.calledAE}`, { error: error.message });
      this.fail(`socket error: ${error.message}`);
    });
  }

  private handleData(data: Buffer): void {
    for (const pdu of this.reader.push(data)) {
      try {
        this.handlePdu(pdu);
      } catch (error) {
        logger.warn(`Protocol error from ${this.params.calledAE}`, { error: errorMessage(error) });
        this.abort();
        return;
      }
    }
  }

  private handlePdu(pdu: Pdu): void {
    switch (pdu.type) {
      case PduType.A_ASSOCIATE_AC:
        this.handleAssociateAc(pdu.data);
        break;
      case PduType.A_ASSOCIATE_RJ: {
        const reject = decodeAssociateRj(pdu.data);
        this.state = AssociationState.CLOSED;
        this.emit(
          'associationRejected',
          `result ${reject.result}, source ${reject.source}, reason ${reject.reason}`
        );
        break;
      }
      case PduType.P_DATA_TF:
        for (const pdv of decodePData(pdu.data)) {
          const message = this.assembler.accept(pdv);
          if (message) {
            this.deliver(message);
          }
        }
        break;
      case PduType.A_RELEASE_RQ:
        this.writeQuietly(encodeReleaseRp());
        this.state = AssociationState.CLOSED;
        this.emit('released');
        break;
      case PduType.A_RELEASE_RP:
        this.state = AssociationState.CLOSED;
        this.emit('released');
        break;
      case PduType.A_ABORT: {
        const abort = decodeAbort(pdu.data);
        this.fail(`aborted by peer (source ${abort.source}, reason ${abort.reason})`);
        break;
      }
      default:
        throw new AssociationError(`Unknown PDU type 0x${pdu.type.toString(16)}`);
    }
  }

  private handleAssociateAc(data: Buffer): void {
    const accept = decodeAssociateAc(data, this.proposed);
    this.negotiated = accept.contexts;
    this.maxPduLengthSend = accept.maxPduLength;
    this.state = AssociationState.ASSOCIATED;
    this.emit('associated');
  }

  private handleClose(): void {
    this.fail('connection closed');
    this.emit('closed');
  }

  /**
   * Mark the association dead and reject whoever waits for a response
   */
  private fail(reason: string): void {
    const wasOpen = this.state !== AssociationState.CLOSED;
    this.state = AssociationState.CLOSED;
    this.closeReason = this.closeReason ?? reason;
    if (wasOpen) {
      this.emit('aborted', reason);
    }
    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = null;
      clearTimeout(waiter.timer);
      waiter.reject(new AssociationError(`Association with ${this.params.calledAE} ended: ${reason}`));
    }
  }

  private async waitForAssociateAc(): Promise<void> {
    return new Promise((resolve, reject) => {
      const cleanup = () => {
        clearTimeout(timeout);
        this.removeListener('associated', onAssociated);
        this.removeListener('associationRejected', onRejected);
        this.removeListener('aborted', onAborted);
      };
      const timeout = setTimeout(() => {
        cleanup();
        this.close();
        reject(new AssociationError(`Association with ${this.params.calledAE} timed out`));
      }, this.params.associationTimeout);
      const onAssociated = () => {
        cleanup();
        resolve();
      };
      const onRejected = (reason: string) => {
        cleanup();
        this.close();
        reject(new AssociationError(`Association rejected by ${this.params.calledAE}: ${reason}`));
      };
      const onAborted = (reason: string) => {
        cleanup();
        reject(new AssociationError(`Association with ${this.params.calledAE} failed: ${reason}`));
      };

      this.on('associated', onAssociated);
      this.on('associationRejected', onRejected);
      this.on('aborted', onAborted);
    });
  }

  private deliver(message: DimseMessage): void {
    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = null;
      clearTimeout(waiter.timer);
      waiter.resolve(message);
    } else {
      this.responses.push(message);
    }
  }

  private async nextResponse(messageId: number, label: string): Promise<DimseMessage> {
    for (;;) {
      const message = await this.takeResponse(label);
      if (message.command.messageIdBeingRespondedTo === messageId) {
        return message;
      }
      logger.warn(`Ignoring ${label} response for message ${message.command.messageIdBeingRespondedTo}`);
    }
  }

  private takeResponse(label: string): Promise<DimseMessage> {
    const queued = this.responses.shift();
    if (queued) {
      return Promise.resolve(queued);
    }
    if (this.state === AssociationState.CLOSED) {
      return Promise.reject(
        new AssociationError(`Association with ${this.params.calledAE} ended: ${this.closeReason ?? 'closed'}`)
      );
    }
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        reject(new AssociationError(`${label} response timeout`));
      }, this.params.responseTimeout);
      this.waiter = { resolve, reject, timer };
    });
  }

  private async sendPdu(pdu: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.socket || this.socket.destroyed) {
        reject(new AssociationError('Socket not connected'));
        return;
      }
      this.socket.write(pdu, (error) => {
        if (error) {
          reject(new AssociationError(`Write failed: ${error.message}`, { cause: error }));
        } else {
          resolve();
        }
      });
    });
  }

  private writeQuietly(pdu: Buffer): void {
    if (this.socket && !this.socket.destroyed) {
      this.socket.write(pdu);
    }
  }

  private async sendMessage(contextId: number, command: DimseCommand, dataSet?: Buffer): Promise<void> {
    for (const pdu of encodePData(contextId, true, encodeCommand(command), this.maxPduLengthSend)) {
      await this.sendPdu(pdu);
    }
    if (dataSet) {
      for (const pdu of encodePData(contextId, false, dataSet, this.maxPduLengthSend)) {
        await this.sendPdu(pdu);
      }
    }
  }

  /**
   * Accepted context for an abstract syntax, optionally requiring a
   * specific transfer syntax
   */
  findContext(abstractSyntax: string, transferSyntax?: string): NegotiatedContext | undefined {
    return this.negotiated.find(
      (context) =>
        context.abstractSyntax === abstractSyntax &&
        context.result === ContextResult.ACCEPTANCE &&
        (transferSyntax === undefined || context.transferSyntax === transferSyntax)
    );
  }

  private requireContext(abstractSyntax: string, transferSyntax?: string): NegotiatedContext {
    this.requireAssociated();
    const context = this.findContext(abstractSyntax, transferSyntax);
    if (!context) {
      const syntax = transferSyntax ? ` with transfer syntax ${transferSyntax}` : '';
      throw new AssociationError(`No accepted presentation context for ${abstractSyntax}${syntax}`);
    }
    return context;
  }

  private requireAssociated(): void {
    if (!this.isAssociated()) {
      throw new AssociationError(`Not associated (state ${this.state})`);
    }
  }

  private nextMessageId(): number {
    const id = this.messageIdCounter;
    this.messageIdCounter = (this.messageIdCounter % 0xffff) + 1;
    return id;
  }

  /**
   * C-ECHO (verification). Resolves with the response status.
   */
  async cEcho(): Promise<number> {
    const context = this.requireContext(SopClass.VERIFICATION);
    const messageId = this.nextMessageId();
    await this.sendMessage(context.id, {
      commandField: DimseCommandType.C_ECHO_RQ,
      affectedSopClassUid: SopClass.VERIFICATION,
      messageId,
      dataSetPresent: false,
    });
    const response = await this.nextResponse(messageId, 'C-ECHO');
    return response.command.status ?? 0;
  }

  /**
   * C-STORE one object. The object travels unchanged, so it needs a context
   * accepted with its own transfer syntax.
   */
  async cStore(object: DicomObject): Promise<number> {
    const context = this.requireContext(object.sopClassUID, object.transferSyntaxUID);
    const messageId = this.nextMessageId();
    await this.sendMessage(
      context.id,
      {
        commandField: DimseCommandType.C_STORE_RQ,
        affectedSopClassUid: object.sopClassUID,
        affectedSopInstanceUid: object.sopInstanceUID,
        messageId,
        priority: Priority.MEDIUM,
        dataSetPresent: true,
      },
      object.dataSet
    );
    const response = await this.nextResponse(messageId, 'C-STORE');
    return response.command.status ?? 0;
  }

  /**
   * C-FIND. Yields every response; the last one carries the final status.
   */
  async *cFind(
    identifier: ElementSpec[],
    sopClassUid: string = SopClass.STUDY_ROOT_FIND
  ): AsyncGenerator<DimseMessage & { transferSyntax: string }> {
    const context = this.requireContext(sopClassUid);
    const transferSyntax = context.transferSyntax ?? TransferSyntax.IMPLICIT_VR_LITTLE_ENDIAN;
    const messageId = this.nextMessageId();
    await this.sendMessage(
      context.id,
      {
        commandField: DimseCommandType.C_FIND_RQ,
        affectedSopClassUid: sopClassUid,
        messageId,
        priority: Priority.MEDIUM,
        dataSetPresent: true,
      },
      encodeDataSet(identifier, encodingOf(transferSyntax))
    );

    for (;;) {
      const response = await this.nextResponse(messageId, 'C-FIND');
      yield { ...response, transferSyntax };
      if (!isPending(response.command.status ?? 0)) {
        return;
      }
    }
  }

  /**
   * C-MOVE to destination. Yields every response; the last one carries the
   * final status and sub-operation counts.
   */
  async *cMove(
    identifier: ElementSpec[],
    destination: string,
    sopClassUid: string = SopClass.STUDY_ROOT_MOVE
  ): AsyncGenerator<DimseMessage> {
    const context = this.requireContext(sopClassUid);
    const transferSyntax = context.transferSyntax ?? TransferSyntax.IMPLICIT_VR_LITTLE_ENDIAN;
    const messageId = this.nextMessageId();
    await this.sendMessage(
      context.id,
      {
        commandField: DimseCommandType.C_MOVE_RQ,
        affectedSopClassUid: sopClassUid,
        messageId,
        priority: Priority.MEDIUM,
        moveDestination: destination,
        dataSetPresent: true,
      },
      encodeDataSet(identifier, encodingOf(transferSyntax))
    );

    for (;;) {
      const response = await this.nextResponse(messageId, 'C-MOVE');
      yield response;
      if (!isPending(response.command.status ?? 0)) {
        return;
      }
    }
  }

  /**
   * Release the association and close the socket
   */
  async release(): Promise<void> {
    if (this.state !== AssociationState.ASSOCIATED) {
      this.close();
      return;
    }

    this.state = AssociationState.AWAITING_RELEASE_RP;
    let timeout: NodeJS.Timeout | undefined;
    let onReleased: () => void = () => undefined;
    const released = new Promise<void>((resolve) => {
      timeout = setTimeout(() => {
        logger.debug(`Release of association with ${this.params.calledAE} timed out`);
        resolve();
      }, 10000);
      onReleased = () => resolve();
      this.on('released', onReleased);
      this.on('closed', onReleased);
    });

    try {
      await this.sendPdu(encodeReleaseRq());
      await released;
    } finally {
      clearTimeout(timeout);
      this.removeListener('released', onReleased);
      this.removeListener('closed', onReleased);
      this.close();
    }
  }

  /**
   * Abort the association and close the socket
   */
  abort(source = 0, reason = 0): void {
    this.writeQuietly(encodeAbort(source, reason));
    this.fail('aborted locally');
    this.close();
  }

  close(): void {
    if (this.socket) {
      this.socket.destroy();
      this.socket = null;
    }
    this.state = AssociationState.CLOSED;
    this.assembler.reset();
  }
}

/**
 * DIMSE command sets (PS3.7 section 9.3) and message assembly.
 *
 * Command sets are always implicit VR little endian and start with the
 * (0000,0000) group length.
 */

import { AssociationError } from '../errors.js';
import { IMPLICIT_LITTLE, TagRef } from './DicomTags.js';
import { encodeElement, encodeUInt16, encodeUInt32 } from './DicomObjectCodec.js';
import { Pdv } from './Pdu.js';

export enum DimseCommandType {
  C_STORE_RQ = 0x0001,
  C_STORE_RSP = 0x8001,
  C_FIND_RQ = 0x0020,
  C_FIND_RSP = 0x8020,
  C_MOVE_RQ = 0x0021,
  C_MOVE_RSP = 0x8021,
  C_ECHO_RQ = 0x0030,
  C_ECHO_RSP = 0x8030,
  C_CANCEL_RQ = 0x0fff,
}

export enum DicomStatus {
  SUCCESS = 0x0000,
  PENDING = 0xff00,
  PENDING_WARNING = 0xff01,
  CANCEL = 0xfe00,
  WARNING = 0xb000,
  WARNING_ELEMENTS_DISCARDED = 0xb006,
  WARNING_DATA_SET_MISMATCH = 0xb007,
  REFUSED_OUT_OF_RESOURCES = 0xa700,
  REFUSED_SOP_CLASS_NOT_SUPPORTED = 0x0122,
  UNRECOGNIZED_OPERATION = 0x0211,
  PROCESSING_FAILURE = 0x0110,
  CANNOT_UNDERSTAND = 0xc000,
}

export enum Priority {
  MEDIUM = 0x0000,
  HIGH = 0x0001,
  LOW = 0x0002,
}

const NO_DATA_SET = 0x0101;
const DATA_SET_PRESENT = 0x0102;

const CommandTag = {
  GROUP_LENGTH: { group: 0x0000, element: 0x0000 },
  AFFECTED_SOP_CLASS_UID: { group: 0x0000, element: 0x0002 },
  COMMAND_FIELD: { group: 0x0000, element: 0x0100 },
  MESSAGE_ID: { group: 0x0000, element: 0x0110 },
  MESSAGE_ID_BEING_RESPONDED_TO: { group: 0x0000, element: 0x0120 },
  MOVE_DESTINATION: { group: 0x0000, element: 0x0600 },
  PRIORITY: { group: 0x0000, element: 0x0700 },
  DATA_SET_TYPE: { group: 0x0000, element: 0x0800 },
  STATUS: { group: 0x0000, element: 0x0900 },
  ERROR_COMMENT: { group: 0x0000, element: 0x0902 },
  AFFECTED_SOP_INSTANCE_UID: { group: 0x0000, element: 0x1000 },
  REMAINING: { group: 0x0000, element: 0x1020 },
  COMPLETED: { group: 0x0000, element: 0x1021 },
  FAILED: { group: 0x0000, element: 0x1022 },
  WARNING: { group: 0x0000, element: 0x1023 },
} as const;

export interface DimseCommand {
  commandField: number;
  dataSetPresent: boolean;
  affectedSopClassUid?: string;
  affectedSopInstanceUid?: string;
  messageId?: number;
  messageIdBeingRespondedTo?: number;
  moveDestination?: string;
  priority?: number;
  status?: number;
  errorComment?: string;
  remaining?: number;
  completed?: number;
  failed?: number;
  warning?: number;
}

export interface DimseMessage {
  contextId: number;
  command: DimseCommand;
  dataSet?: Buffer;
}

export function isPending(status: number): boolean {
  return status === DicomStatus.PENDING || status === DicomStatus.PENDING_WARNING;
}

/**
 * Success, or one of the warnings a storage SCP returns when it coerced or
 * discarded elements but kept the object.
 */
export function isStoreAccepted(status: number): boolean {
  return (
    status === DicomStatus.SUCCESS ||
    status === DicomStatus.WARNING ||
    status === DicomStatus.WARNING_ELEMENTS_DISCARDED ||
    status === DicomStatus.WARNING_DATA_SET_MISMATCH
  );
}

export function formatStatus(status: number): string {
  return `0x${status.toString(16).toUpperCase().padStart(4, '0')}`;
}

function us(tag: TagRef, value: number): Buffer {
  return encodeElement(tag, 'US', encodeUInt16(value, false), IMPLICIT_LITTLE);
}

function text(tag: TagRef, vr: string, value: string): Buffer {
  return encodeElement(tag, vr, Buffer.from(value, 'ascii'), IMPLICIT_LITTLE);
}

export function encodeCommand(command: DimseCommand): Buffer {
  const elements: Buffer[] = [];
  if (command.affectedSopClassUid !== undefined) {
    elements.push(text(CommandTag.AFFECTED_SOP_CLASS_UID, 'UI', command.affectedSopClassUid));
  }
  elements.push(us(CommandTag.COMMAND_FIELD, command.commandField));
  if (command.messageId !== undefined) {
    elements.push(us(CommandTag.MESSAGE_ID, command.messageId));
  }
  if (command.messageIdBeingRespondedTo !== undefined) {
    elements.push(us(CommandTag.MESSAGE_ID_BEING_RESPONDED_TO, command.messageIdBeingRespondedTo));
  }
  if (command.moveDestination !== undefined) {
    elements.push(text(CommandTag.MOVE_DESTINATION, 'AE', command.moveDestination));
  }
  if (command.priority !== undefined) {
    elements.push(us(CommandTag.PRIORITY, command.priority));
  }
  elements.push(us(CommandTag.DATA_SET_TYPE, command.dataSetPresent ? DATA_SET_PRESENT : NO_DATA_SET));
  if (command.status !== undefined) {
    elements.push(us(CommandTag.STATUS, command.status));
  }
  if (command.errorComment !== undefined) {
    elements.push(text(CommandTag.ERROR_COMMENT, 'LO', command.errorComment.substring(0, 64)));
  }
  if (command.affectedSopInstanceUid !== undefined) {
    elements.push(text(CommandTag.AFFECTED_SOP_INSTANCE_UID, 'UI', command.affectedSopInstanceUid));
  }
  const counters: Array<[TagRef, number | undefined]> = [
    [CommandTag.REMAINING, command.remaining],
    [CommandTag.COMPLETED, command.completed],
    [CommandTag.FAILED, command.failed],
    [CommandTag.WARNING, command.warning],
  ];
  for (const [tag, value] of counters) {
    if (value !== undefined) {
      elements.push(us(tag, value));
    }
  }

  const body = Buffer.concat(elements);
  const groupLength = encodeElement(CommandTag.GROUP_LENGTH, 'UL', encodeUInt32(body.length, false), IMPLICIT_LITTLE);
  return Buffer.concat([groupLength, body]);
}

export function decodeCommand(data: Buffer): DimseCommand {
  const command: DimseCommand = { commandField: 0, dataSetPresent: false };
  let dataSetType = NO_DATA_SET;
  let offset = 0;

  while (offset + 8 <= data.length) {
    const group = data.readUInt16LE(offset);
    const element = data.readUInt16LE(offset + 2);
    const length = data.readUInt32LE(offset + 4);
    const value = data.subarray(offset + 8, offset + 8 + length);
    offset += 8 + length;

    if (group !== 0x0000) {
      continue;
    }
    const number = value.length >= 2 ? value.readUInt16LE(0) : 0;
    const str = value.toString('ascii').replace(/\0/g, '').trim();

    switch (element) {
      case CommandTag.AFFECTED_SOP_CLASS_UID.element:
        command.affectedSopClassUid = str;
        break;
      case CommandTag.COMMAND_FIELD.element:
        command.commandField = number;
        break;
      case CommandTag.MESSAGE_ID.element:
        command.messageId = number;
        break;
      case CommandTag.MESSAGE_ID_BEING_RESPONDED_TO.element:
        command.messageIdBeingRespondedTo = number;
        break;
      case CommandTag.MOVE_DESTINATION.element:
        command.moveDestination = str;
        break;
      case CommandTag.PRIORITY.element:
        command.priority = number;
        break;
      case CommandTag.DATA_SET_TYPE.element:
        dataSetType = number;
        break;
      case CommandTag.STATUS.element:
        command.status = number;
        break;
      case CommandTag.ERROR_COMMENT.element:
        command.errorComment = str;
        break;
      case CommandTag.AFFECTED_SOP_INSTANCE_UID.element:
        command.affectedSopInstanceUid = str;
        break;
      case CommandTag.REMAINING.element:
        command.remaining = number;
        break;
      case CommandTag.COMPLETED.element:
        command.completed = number;
        break;
      case CommandTag.FAILED.element:
        command.failed = number;
        break;
      case CommandTag.WARNING.element:
        command.warning = number;
        break;
      default:
        break;
    }
  }

  command.dataSetPresent = dataSetType !== NO_DATA_SET;
  return command;
}

interface PendingMessage {
  commandChunks: Buffer[];
  command?: DimseCommand;
  dataChunks: Buffer[];
}

/**
 * Reassembles PDV fragments into complete DIMSE messages, one pending
 * message per presentation context.
 */
export class DimseMessageAssembler {
  private readonly pending = new Map<number, PendingMessage>();

  /**
   * Returns the message completed by this fragment, if any
   */
  accept(pdv: Pdv): DimseMessage | undefined {
    let state = this.pending.get(pdv.contextId);
    if (!state) {
      state = { commandChunks: [], dataChunks: [] };
      this.pending.set(pdv.contextId, state);
    }

    if (pdv.isCommand) {
      state.commandChunks.push(pdv.data);
      if (!pdv.isLast) {
        return undefined;
      }
      const command = decodeCommand(Buffer.concat(state.commandChunks));
      if (!command.dataSetPresent) {
        this.pending.delete(pdv.contextId);
        return { contextId: pdv.contextId, command };
      }
      state.command = command;
      return undefined;
    }

    if (!state.command) {
      this.pending.delete(pdv.contextId);
      throw new AssociationError(`Data set fragment before its command on context ${pdv.contextId}`);
    }
    state.dataChunks.push(pdv.data);
    if (!pdv.isLast) {
      return undefined;
    }
    this.pending.delete(pdv.contextId);
    return { contextId: pdv.contextId, command: state.command, dataSet: Buffer.concat(state.dataChunks) };
  }

  reset(): void {
    this.pending.clear();
  }
}

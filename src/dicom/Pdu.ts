/**
 * Upper-layer PDU encoding and decoding (PS3.8 section 9.3).
 *
 * Shared by the requesting side (DicomConnection) and the accepting side
 * (DicomListener).
 */

import { IMPLEMENTATION_CLASS_UID, IMPLEMENTATION_VERSION_NAME } from './DicomTags.js';

export enum PduType {
  A_ASSOCIATE_RQ = 0x01,
  A_ASSOCIATE_AC = 0x02,
  A_ASSOCIATE_RJ = 0x03,
  P_DATA_TF = 0x04,
  A_RELEASE_RQ = 0x05,
  A_RELEASE_RP = 0x06,
  A_ABORT = 0x07,
}

enum ItemType {
  APPLICATION_CONTEXT = 0x10,
  PRESENTATION_CONTEXT_RQ = 0x20,
  PRESENTATION_CONTEXT_AC = 0x21,
  ABSTRACT_SYNTAX = 0x30,
  TRANSFER_SYNTAX = 0x40,
  USER_INFORMATION = 0x50,
  MAXIMUM_LENGTH = 0x51,
  IMPLEMENTATION_CLASS_UID = 0x52,
  IMPLEMENTATION_VERSION_NAME = 0x55,
}

/** Presentation context result codes in an A-ASSOCIATE-AC */
export enum ContextResult {
  ACCEPTANCE = 0,
  USER_REJECTION = 1,
  NO_REASON = 2,
  ABSTRACT_SYNTAX_NOT_SUPPORTED = 3,
  TRANSFER_SYNTAXES_NOT_SUPPORTED = 4,
}

const APPLICATION_CONTEXT_UID = '1.2.840.10008.3.1.1.1';
const FIXED_ASSOCIATE_FIELDS = 68;
export const DEFAULT_MAX_PDU_LENGTH = 16384;

export interface ProposedContext {
  id: number;
  abstractSyntax: string;
  transferSyntaxes: string[];
}

export interface NegotiatedContext {
  id: number;
  abstractSyntax: string;
  result: ContextResult;
  transferSyntax?: string;
}

export interface AssociateRequest {
  calledAE: string;
  callingAE: string;
  contexts: ProposedContext[];
  maxPduLength: number;
}

export interface AssociateAccept {
  calledAE: string;
  callingAE: string;
  contexts: NegotiatedContext[];
  maxPduLength: number;
}

export interface AssociateReject {
  result: number;
  source: number;
  reason: number;
}

export interface Pdv {
  contextId: number;
  isCommand: boolean;
  isLast: boolean;
  data: Buffer;
}

export interface Pdu {
  type: number;
  /** Whole PDU including its 6-byte header */
  data: Buffer;
}

/**
 * Accumulates socket data and hands back complete PDUs
 */
export class PduReader {
  private buffer: Buffer = Buffer.alloc(0);

  push(chunk: Buffer): Pdu[] {
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
    const pdus: Pdu[] = [];

    while (this.buffer.length >= 6) {
      const totalLength = this.buffer.readUInt32BE(2) + 6;
      if (this.buffer.length < totalLength) {
        break;
      }
      pdus.push({ type: this.buffer.readUInt8(0), data: this.buffer.subarray(0, totalLength) });
      this.buffer = this.buffer.subarray(totalLength);
    }
    return pdus;
  }
}

function item(type: number, value: Buffer): Buffer {
  const header = Buffer.alloc(4);
  header[0] = type;
  header.writeUInt16BE(value.length, 2);
  return Buffer.concat([header, value]);
}

function stringItem(type: number, value: string): Buffer {
  return item(type, Buffer.from(value, 'ascii'));
}

function pdu(type: PduType, body: Buffer): Buffer {
  const header = Buffer.alloc(6);
  header[0] = type;
  header.writeUInt32BE(body.length, 2);
  return Buffer.concat([header, body]);
}

function aeTitle(value: string): string {
  return value.padEnd(16, ' ').substring(0, 16);
}

function userInformation(maxPduLength: number): Buffer {
  const maxLength = Buffer.alloc(4);
  maxLength.writeUInt32BE(maxPduLength, 0);
  return item(
    ItemType.USER_INFORMATION,
    Buffer.concat([
      item(ItemType.MAXIMUM_LENGTH, maxLength),
      stringItem(ItemType.IMPLEMENTATION_CLASS_UID, IMPLEMENTATION_CLASS_UID),
      stringItem(ItemType.IMPLEMENTATION_VERSION_NAME, IMPLEMENTATION_VERSION_NAME),
    ])
  );
}

function associatePdu(
  type: PduType.A_ASSOCIATE_RQ | PduType.A_ASSOCIATE_AC,
  calledAE: string,
  callingAE: string,
  items: Buffer[]
): Buffer {
  const fixed = Buffer.alloc(FIXED_ASSOCIATE_FIELDS);
  fixed.writeUInt16BE(0x0001, 0); // protocol version
  fixed.write(aeTitle(calledAE), 4, 16, 'ascii');
  fixed.write(aeTitle(callingAE), 20, 16, 'ascii');
  return pdu(type, Buffer.concat([fixed, stringItem(ItemType.APPLICATION_CONTEXT, APPLICATION_CONTEXT_UID), ...items]));
}

export function encodeAssociateRq(request: AssociateRequest): Buffer {
  const contexts = request.contexts.map((context) =>
    item(
      ItemType.PRESENTATION_CONTEXT_RQ,
      Buffer.concat([
        Buffer.from([context.id, 0, 0, 0]),
        stringItem(ItemType.ABSTRACT_SYNTAX, context.abstractSyntax),
        ...context.transferSyntaxes.map((ts) => stringItem(ItemType.TRANSFER_SYNTAX, ts)),
      ])
    )
  );
  return associatePdu(PduType.A_ASSOCIATE_RQ, request.calledAE, request.callingAE, [
    ...contexts,
    userInformation(request.maxPduLength),
  ]);
}

export function encodeAssociateAc(accept: AssociateAccept): Buffer {
  const contexts = accept.contexts.map((context) =>
    item(
      ItemType.PRESENTATION_CONTEXT_AC,
      Buffer.concat([
        Buffer.from([context.id, 0, context.result, 0]),
        stringItem(ItemType.TRANSFER_SYNTAX, context.transferSyntax ?? ''),
      ])
    )
  );
  return associatePdu(PduType.A_ASSOCIATE_AC, accept.calledAE, accept.callingAE, [
    ...contexts,
    userInformation(accept.maxPduLength),
  ]);
}

export function encodeAssociateRj(reject: AssociateReject): Buffer {
  return pdu(PduType.A_ASSOCIATE_RJ, Buffer.from([0, reject.result, reject.source, reject.reason]));
}

export function encodeReleaseRq(): Buffer {
  return pdu(PduType.A_RELEASE_RQ, Buffer.alloc(4));
}

export function encodeReleaseRp(): Buffer {
  return pdu(PduType.A_RELEASE_RP, Buffer.alloc(4));
}

export function encodeAbort(source = 0, reason = 0): Buffer {
  return pdu(PduType.A_ABORT, Buffer.from([0, 0, source, reason]));
}

/**
 * Fragment one command or data set into P-DATA-TF PDUs of at most
 * maxPduLength bytes (0 = no limit). The last fragment carries the last flag.
 */
export function encodePData(contextId: number, isCommand: boolean, data: Buffer, maxPduLength: number): Buffer[] {
  const maxFragment = maxPduLength > 6 ? maxPduLength - 6 : Math.max(data.length, 1);
  const pdus: Buffer[] = [];
  let offset = 0;

  do {
    const chunk = data.subarray(offset, Math.min(offset + maxFragment, data.length));
    offset += chunk.length;
    const isLast = offset >= data.length;

    const header = Buffer.alloc(6);
    header.writeUInt32BE(chunk.length + 2, 0);
    header[4] = contextId;
    header[5] = (isCommand ? 0x01 : 0x00) | (isLast ? 0x02 : 0x00);
    pdus.push(pdu(PduType.P_DATA_TF, Buffer.concat([header, chunk])));
  } while (offset < data.length);

  return pdus;
}

export function decodePData(data: Buffer): Pdv[] {
  const pdvs: Pdv[] = [];
  let offset = 6;

  while (offset + 6 <= data.length) {
    const length = data.readUInt32BE(offset);
    const control = data.readUInt8(offset + 5);
    pdvs.push({
      contextId: data.readUInt8(offset + 4),
      isCommand: (control & 0x01) === 0x01,
      isLast: (control & 0x02) === 0x02,
      data: data.subarray(offset + 6, offset + 4 + length),
    });
    offset += 4 + length;
  }
  return pdvs;
}

interface RawItem {
  type: number;
  value: Buffer;
}

function readItems(data: Buffer, offset: number): RawItem[] {
  const items: RawItem[] = [];
  while (offset + 4 <= data.length) {
    const type = data.readUInt8(offset);
    const length = data.readUInt16BE(offset + 2);
    items.push({ type, value: data.subarray(offset + 4, offset + 4 + length) });
    offset += 4 + length;
  }
  return items;
}

function readMaxPduLength(items: RawItem[]): number {
  const userInfo = items.find((entry) => entry.type === ItemType.USER_INFORMATION);
  if (!userInfo) {
    return DEFAULT_MAX_PDU_LENGTH;
  }
  const maxLength = readItems(userInfo.value, 0).find((entry) => entry.type === ItemType.MAXIMUM_LENGTH);
  return maxLength && maxLength.value.length >= 4 ? maxLength.value.readUInt32BE(0) : DEFAULT_MAX_PDU_LENGTH;
}

function readAeTitles(data: Buffer): { calledAE: string; callingAE: string } {
  return {
    calledAE: data.toString('ascii', 10, 26).trim(),
    callingAE: data.toString('ascii', 26, 42).trim(),
  };
}

export function decodeAssociateRq(data: Buffer): AssociateRequest {
  const items = readItems(data, 6 + FIXED_ASSOCIATE_FIELDS);
  const contexts: ProposedContext[] = [];

  for (const entry of items) {
    if (entry.type !== ItemType.PRESENTATION_CONTEXT_RQ || entry.value.length < 4) {
      continue;
    }
    let abstractSyntax = '';
    const transferSyntaxes: string[] = [];
    for (const sub of readItems(entry.value, 4)) {
      const uid = sub.value.toString('ascii').replace(/\0/g, '').trim();
      if (sub.type === ItemType.ABSTRACT_SYNTAX) {
        abstractSyntax = uid;
      } else if (sub.type === ItemType.TRANSFER_SYNTAX) {
        transferSyntaxes.push(uid);
      }
    }
    contexts.push({ id: entry.value.readUInt8(0), abstractSyntax, transferSyntaxes });
  }

  return { ...readAeTitles(data), contexts, maxPduLength: readMaxPduLength(items) };
}

/**
 * Decode an A-ASSOCIATE-AC. Abstract syntaxes are not echoed back by the
 * acceptor; they are filled in from the proposal.
 */
export function decodeAssociateAc(data: Buffer, proposed: ProposedContext[]): AssociateAccept {
  const items = readItems(data, 6 + FIXED_ASSOCIATE_FIELDS);
  const contexts: NegotiatedContext[] = [];

  for (const entry of items) {
    if (entry.type !== ItemType.PRESENTATION_CONTEXT_AC || entry.value.length < 4) {
      continue;
    }
    const id = entry.value.readUInt8(0);
    const result: ContextResult = entry.value.readUInt8(2);
    const ts = readItems(entry.value, 4).find((sub) => sub.type === ItemType.TRANSFER_SYNTAX);
    contexts.push({
      id,
      abstractSyntax: proposed.find((context) => context.id === id)?.abstractSyntax ?? '',
      result,
      transferSyntax:
        result === ContextResult.ACCEPTANCE && ts ? ts.value.toString('ascii').replace(/\0/g, '').trim() : undefined,
    });
  }

  return { ...readAeTitles(data), contexts, maxPduLength: readMaxPduLength(items) };
}

export function decodeAssociateRj(data: Buffer): AssociateReject {
  return {
    result: data.length > 7 ? data.readUInt8(7) : 0,
    source: data.length > 8 ? data.readUInt8(8) : 0,
    reason: data.length > 9 ? data.readUInt8(9) : 0,
  };
}

export function decodeAbort(data: Buffer): { source: number; reason: number } {
  return {
    source: data.length > 8 ? data.readUInt8(8) : 0,
    reason: data.length > 9 ? data.readUInt8(9) : 0,
  };
}

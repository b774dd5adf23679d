/**
 * Minimal DICOM object codec.
 *
 * Reads the handful of identifying attributes the relay routes on, splits a
 * Part-10 file into its file meta information and data set, and writes a data
 * set back out as a Part-10 file. Pixel data and every other attribute pass
 * through untouched.
 */

import { RelayError } from '../errors.js';
import {
  DicomTag,
  EXPLICIT_LITTLE,
  IMPLEMENTATION_CLASS_UID,
  IMPLEMENTATION_VERSION_NAME,
  IMPLICIT_LITTLE,
  TagRef,
  TransferSyntax,
  EncodingSyntax,
  encodingOf,
  tagKey,
} from './DicomTags.js';

const UNDEFINED_LENGTH = 0xffffffff;
const ITEM_DELIMITER = 0xe00d;
const SEQUENCE_DELIMITER = 0xe0dd;
const PREAMBLE_LENGTH = 128;
const MAGIC = 'DICM';

/**
 * Value Representations that carry a 32-bit length in explicit VR encoding
 */
const EXPLICIT_VR_32 = new Set([
  'OB', 'OD', 'OF', 'OL', 'OV', 'OW', 'SQ', 'SV', 'UC', 'UN', 'UR', 'UT', 'UV',
]);

const KNOWN_VRS = new Set([
  ...EXPLICIT_VR_32,
  'AE', 'AS', 'AT', 'CS', 'DA', 'DS', 'DT', 'FD', 'FL', 'IS', 'LO', 'LT', 'PN',
  'SH', 'SL', 'SS', 'ST', 'TM', 'UI', 'UL', 'US',
]);

/** VRs padded with NUL rather than space to even length */
const NUL_PADDED_VRS = new Set(['UI', 'OB', 'UN']);

/**
 * Identifying attributes of one object. Every field is optional: the caller
 * decides how to default what is missing.
 */
export interface DicomIdentifiers {
  patientID?: string;
  patientName?: string;
  studyInstanceUID?: string;
  seriesInstanceUID?: string;
  sopInstanceUID?: string;
  sopClassUID?: string;
  modality?: string;
  transferSyntaxUID?: string;
}

/**
 * A data set plus what is needed to store or write it
 */
export interface DicomObject {
  sopClassUID: string;
  sopInstanceUID: string;
  transferSyntaxUID: string;
  dataSet: Buffer;
}

export interface Part10File {
  transferSyntaxUID: string;
  mediaStorageSopClassUID?: string;
  mediaStorageSopInstanceUID?: string;
  dataSet: Buffer;
}

/**
 * Element to encode. String values are encoded as ASCII and padded per VR.
 */
export interface ElementSpec {
  tag: TagRef;
  vr: string;
  value: string | Buffer;
}

interface ElementHeader {
  group: number;
  element: number;
  vr?: string;
  length: number;
  valueOffset: number;
}

/** Return false to stop the walk before the visited element */
type ElementVisitor = (header: ElementHeader, value: Buffer | undefined) => boolean;

const IDENTIFIER_TAGS: ReadonlyArray<[TagRef, keyof DicomIdentifiers]> = [
  [DicomTag.SOP_CLASS_UID, 'sopClassUID'],
  [DicomTag.SOP_INSTANCE_UID, 'sopInstanceUID'],
  [DicomTag.MODALITY, 'modality'],
  [DicomTag.PATIENT_NAME, 'patientName'],
  [DicomTag.PATIENT_ID, 'patientID'],
  [DicomTag.STUDY_INSTANCE_UID, 'studyInstanceUID'],
  [DicomTag.SERIES_INSTANCE_UID, 'seriesInstanceUID'],
];

export function isPart10(bytes: Buffer): boolean {
  return (
    bytes.length >= PREAMBLE_LENGTH + 4 &&
    bytes.toString('ascii', PREAMBLE_LENGTH, PREAMBLE_LENGTH + 4) === MAGIC
  );
}

/**
 * Bare data sets carry no transfer syntax. A known VR right after the first
 * tag means explicit VR little endian, otherwise implicit.
 */
export function guessTransferSyntax(dataSet: Buffer): string {
  if (dataSet.length >= 6 && KNOWN_VRS.has(dataSet.toString('ascii', 4, 6))) {
    return TransferSyntax.EXPLICIT_VR_LITTLE_ENDIAN;
  }
  return TransferSyntax.IMPLICIT_VR_LITTLE_ENDIAN;
}

export class DicomObjectCodec {
  /**
   * Read identifying attributes from a Part-10 file or a bare data set.
   * Malformed input yields whatever was readable before the damage.
   */
  readIdentifiers(bytes: Buffer, transferSyntaxUID?: string): DicomIdentifiers {
    if (isPart10(bytes)) {
      const file = this.extractDataSet(bytes);
      const identifiers = this.readDataSet(file.dataSet, file.transferSyntaxUID);
      return {
        ...identifiers,
        sopClassUID: identifiers.sopClassUID ?? file.mediaStorageSopClassUID,
        sopInstanceUID: identifiers.sopInstanceUID ?? file.mediaStorageSopInstanceUID,
        transferSyntaxUID: file.transferSyntaxUID,
      };
    }

    const syntax = transferSyntaxUID ?? guessTransferSyntax(bytes);
    return { ...this.readDataSet(bytes, syntax), transferSyntaxUID: syntax };
  }

  /**
   * Split a Part-10 file into file meta information and data set
   */
  extractDataSet(file: Buffer): Part10File {
    if (!isPart10(file)) {
      throw new RelayError('Not a DICOM Part-10 file (no DICM prefix)');
    }

    const meta = new Map<number, string>();
    // File meta information is always explicit VR little endian
    const end = walkElements(file, PREAMBLE_LENGTH + 4, EXPLICIT_LITTLE, (header, value) => {
      if (header.group !== 0x0002) {
        return false;
      }
      if (value) {
        meta.set(((header.group << 16) | header.element) >>> 0, decodeString(value));
      }
      return true;
    });

    const transferSyntaxUID = meta.get(tagKey(DicomTag.TRANSFER_SYNTAX_UID));
    if (!transferSyntaxUID) {
      throw new RelayError('File meta information has no Transfer Syntax UID');
    }

    return {
      transferSyntaxUID,
      mediaStorageSopClassUID: meta.get(tagKey(DicomTag.MEDIA_STORAGE_SOP_CLASS_UID)) || undefined,
      mediaStorageSopInstanceUID:
        meta.get(tagKey(DicomTag.MEDIA_STORAGE_SOP_INSTANCE_UID)) || undefined,
      dataSet: file.subarray(end),
    };
  }

  /**
   * Serialize a data set as a Part-10 file
   */
  serialize(object: DicomObject): Buffer {
    const metaElements = encodeDataSet(
      [
        { tag: DicomTag.FILE_META_VERSION, vr: 'OB', value: Buffer.from([0x00, 0x01]) },
        { tag: DicomTag.MEDIA_STORAGE_SOP_CLASS_UID, vr: 'UI', value: object.sopClassUID },
        { tag: DicomTag.MEDIA_STORAGE_SOP_INSTANCE_UID, vr: 'UI', value: object.sopInstanceUID },
        { tag: DicomTag.TRANSFER_SYNTAX_UID, vr: 'UI', value: object.transferSyntaxUID },
        { tag: DicomTag.IMPLEMENTATION_CLASS_UID, vr: 'UI', value: IMPLEMENTATION_CLASS_UID },
        { tag: DicomTag.IMPLEMENTATION_VERSION_NAME, vr: 'SH', value: IMPLEMENTATION_VERSION_NAME },
      ],
      EXPLICIT_LITTLE
    );
    const groupLength = encodeElement(
      DicomTag.FILE_META_GROUP_LENGTH,
      'UL',
      encodeUInt32(metaElements.length, false),
      EXPLICIT_LITTLE
    );

    return Buffer.concat([
      Buffer.alloc(PREAMBLE_LENGTH),
      Buffer.from(MAGIC, 'ascii'),
      groupLength,
      metaElements,
      object.dataSet,
    ]);
  }

  /**
   * Turn a file or bare data set into something a C-STORE can carry.
   * Throws when the SOP Class or SOP Instance UID cannot be found.
   */
  toObject(bytes: Buffer): DicomObject {
    const identifiers = this.readIdentifiers(bytes);
    const dataSet = isPart10(bytes) ? this.extractDataSet(bytes).dataSet : bytes;

    const { sopClassUID, sopInstanceUID, transferSyntaxUID } = identifiers;
    if (!sopClassUID || !sopInstanceUID || !transferSyntaxUID) {
      throw new RelayError('Object has no SOP Class UID or SOP Instance UID');
    }
    return { sopClassUID, sopInstanceUID, transferSyntaxUID, dataSet };
  }

  private readDataSet(dataSet: Buffer, transferSyntaxUID: string): DicomIdentifiers {
    const wanted = new Map<number, keyof DicomIdentifiers>(
      IDENTIFIER_TAGS.map(([tag, field]) => [tagKey(tag), field])
    );
    const lastKey = Math.max(...wanted.keys());
    const identifiers: DicomIdentifiers = {};

    walkElements(dataSet, 0, encodingOf(transferSyntaxUID), (header, value) => {
      const key = ((header.group << 16) | header.element) >>> 0;
      if (key > lastKey) {
        return false;
      }
      const field = wanted.get(key);
      if (field && value) {
        const text = decodeString(value);
        if (text) {
          identifiers[field] = text;
        }
      }
      return true;
    });

    return identifiers;
  }
}

function readUInt16(data: Buffer, offset: number, bigEndian: boolean): number {
  return bigEndian ? data.readUInt16BE(offset) : data.readUInt16LE(offset);
}

function readUInt32(data: Buffer, offset: number, bigEndian: boolean): number {
  return bigEndian ? data.readUInt32BE(offset) : data.readUInt32LE(offset);
}

function readHeader(data: Buffer, offset: number, syntax: EncodingSyntax): ElementHeader | undefined {
  if (offset + 8 > data.length) {
    return undefined;
  }
  const group = readUInt16(data, offset, syntax.bigEndian);
  const element = readUInt16(data, offset + 2, syntax.bigEndian);

  // Items and delimiters never carry a VR
  if (group === 0xfffe || !syntax.explicitVr) {
    return {
      group,
      element,
      length: readUInt32(data, offset + 4, syntax.bigEndian),
      valueOffset: offset + 8,
    };
  }

  const vr = data.toString('ascii', offset + 4, offset + 6);
  if (EXPLICIT_VR_32.has(vr)) {
    if (offset + 12 > data.length) {
      return undefined;
    }
    return {
      group,
      element,
      vr,
      length: readUInt32(data, offset + 8, syntax.bigEndian),
      valueOffset: offset + 12,
    };
  }
  return {
    group,
    element,
    vr,
    length: readUInt16(data, offset + 6, syntax.bigEndian),
    valueOffset: offset + 8,
  };
}

/**
 * Walk top-level elements from offset. Returns the offset where the walk
 * stopped: the end of the buffer, the element the visitor refused, or just
 * past the item delimiter when walking inside an item.
 */
function walkElements(
  data: Buffer,
  offset: number,
  syntax: EncodingSyntax,
  visit?: ElementVisitor,
  insideItem = false
): number {
  while (offset < data.length) {
    const header = readHeader(data, offset, syntax);
    if (!header) {
      return data.length;
    }

    if (header.group === 0xfffe && header.element === ITEM_DELIMITER) {
      if (insideItem) {
        return header.valueOffset;
      }
      offset = header.valueOffset;
      continue;
    }

    if (header.length === UNDEFINED_LENGTH) {
      // Sequence or encapsulated pixel data: items up to the sequence delimiter
      if (visit && !visit(header, undefined)) {
        return offset;
      }
      offset = skipItems(data, header.valueOffset, syntax);
      continue;
    }

    const end = header.valueOffset + header.length;
    if (end > data.length) {
      return data.length;
    }
    if (visit && !visit(header, data.subarray(header.valueOffset, end))) {
      return offset;
    }
    offset = end;
  }
  return offset;
}

function skipItems(data: Buffer, offset: number, syntax: EncodingSyntax): number {
  while (offset + 8 <= data.length) {
    const group = readUInt16(data, offset, syntax.bigEndian);
    const element = readUInt16(data, offset + 2, syntax.bigEndian);
    const length = readUInt32(data, offset + 4, syntax.bigEndian);
    offset += 8;

    if (group !== 0xfffe) {
      return data.length;
    }
    if (element === SEQUENCE_DELIMITER) {
      return offset;
    }
    offset = length === UNDEFINED_LENGTH ? walkElements(data, offset, syntax, undefined, true) : offset + length;
  }
  return data.length;
}

function decodeString(value: Buffer): string {
  return value.toString('latin1').replace(/\0/g, '').trim();
}

export function encodeUInt16(value: number, bigEndian: boolean): Buffer {
  const buffer = Buffer.alloc(2);
  if (bigEndian) {
    buffer.writeUInt16BE(value, 0);
  } else {
    buffer.writeUInt16LE(value, 0);
  }
  return buffer;
}

export function encodeUInt32(value: number, bigEndian: boolean): Buffer {
  const buffer = Buffer.alloc(4);
  if (bigEndian) {
    buffer.writeUInt32BE(value, 0);
  } else {
    buffer.writeUInt32LE(value, 0);
  }
  return buffer;
}

/**
 * Encode one element. Odd-length values are padded to even length.
 */
export function encodeElement(
  tag: TagRef,
  vr: string,
  value: Buffer,
  syntax: EncodingSyntax
): Buffer {
  let padded = value;
  if (value.length % 2 !== 0) {
    padded = Buffer.concat([value, Buffer.from([NUL_PADDED_VRS.has(vr) ? 0x00 : 0x20])]);
  }

  const be = syntax.bigEndian;
  const tagBytes = Buffer.concat([encodeUInt16(tag.group, be), encodeUInt16(tag.element, be)]);

  if (!syntax.explicitVr) {
    return Buffer.concat([tagBytes, encodeUInt32(padded.length, be), padded]);
  }
  if (EXPLICIT_VR_32.has(vr)) {
    return Buffer.concat([
      tagBytes,
      Buffer.from(vr, 'ascii'),
      Buffer.alloc(2),
      encodeUInt32(padded.length, be),
      padded,
    ]);
  }
  return Buffer.concat([tagBytes, Buffer.from(vr, 'ascii'), encodeUInt16(padded.length, be), padded]);
}

/**
 * Encode elements in ascending tag order
 */
export function encodeDataSet(elements: ElementSpec[], syntax: EncodingSyntax = IMPLICIT_LITTLE): Buffer {
  const sorted = [...elements].sort((a, b) => tagKey(a.tag) - tagKey(b.tag));
  return Buffer.concat(
    sorted.map((element) =>
      encodeElement(
        element.tag,
        element.vr,
        typeof element.value === 'string' ? Buffer.from(element.value, 'ascii') : element.value,
        syntax
      )
    )
  );
}

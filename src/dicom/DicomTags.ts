/**
 * Tags, UIDs and transfer syntaxes the relay needs by name.
 */

export interface TagRef {
  readonly group: number;
  readonly element: number;
}

/**
 * Attributes read or written by the relay
 */
export const DicomTag = {
  // File Meta Information
  FILE_META_GROUP_LENGTH: { group: 0x0002, element: 0x0000 },
  FILE_META_VERSION: { group: 0x0002, element: 0x0001 },
  MEDIA_STORAGE_SOP_CLASS_UID: { group: 0x0002, element: 0x0002 },
  MEDIA_STORAGE_SOP_INSTANCE_UID: { group: 0x0002, element: 0x0003 },
  TRANSFER_SYNTAX_UID: { group: 0x0002, element: 0x0010 },
  IMPLEMENTATION_CLASS_UID: { group: 0x0002, element: 0x0012 },
  IMPLEMENTATION_VERSION_NAME: { group: 0x0002, element: 0x0013 },

  // Instance / query
  SOP_CLASS_UID: { group: 0x0008, element: 0x0016 },
  SOP_INSTANCE_UID: { group: 0x0008, element: 0x0018 },
  QUERY_RETRIEVE_LEVEL: { group: 0x0008, element: 0x0052 },
  MODALITY: { group: 0x0008, element: 0x0060 },

  // Patient
  PATIENT_NAME: { group: 0x0010, element: 0x0010 },
  PATIENT_ID: { group: 0x0010, element: 0x0020 },

  // Study / Series
  STUDY_INSTANCE_UID: { group: 0x0020, element: 0x000d },
  SERIES_INSTANCE_UID: { group: 0x0020, element: 0x000e },

  PIXEL_DATA: { group: 0x7fe0, element: 0x0010 },
} as const;

/**
 * Format a tag as an uppercase hex key, e.g. "0020000D"
 */
export function formatTag(group: number, element: number): string {
  return (group.toString(16).padStart(4, '0') + element.toString(16).padStart(4, '0')).toUpperCase();
}

/**
 * 32-bit numeric key (group << 16 | element) used for map lookups
 */
export function tagKey(tag: TagRef): number {
  return ((tag.group << 16) | tag.element) >>> 0;
}

export const TransferSyntax = {
  IMPLICIT_VR_LITTLE_ENDIAN: '1.2.840.10008.1.2',
  EXPLICIT_VR_LITTLE_ENDIAN: '1.2.840.10008.1.2.1',
  DEFLATED_EXPLICIT_VR_LITTLE_ENDIAN: '1.2.840.10008.1.2.1.99',
  EXPLICIT_VR_BIG_ENDIAN: '1.2.840.10008.1.2.2',
  JPEG_BASELINE: '1.2.840.10008.1.2.4.50',
  JPEG_EXTENDED: '1.2.840.10008.1.2.4.51',
  JPEG_LOSSLESS: '1.2.840.10008.1.2.4.57',
  JPEG_LOSSLESS_SV1: '1.2.840.10008.1.2.4.70',
  JPEG_LS_LOSSLESS: '1.2.840.10008.1.2.4.80',
  JPEG_LS_NEAR_LOSSLESS: '1.2.840.10008.1.2.4.81',
  JPEG_2000_LOSSLESS: '1.2.840.10008.1.2.4.90',
  JPEG_2000: '1.2.840.10008.1.2.4.91',
  RLE_LOSSLESS: '1.2.840.10008.1.2.5',
} as const;

export const SopClass = {
  VERIFICATION: '1.2.840.10008.1.1',
  PATIENT_ROOT_FIND: '1.2.840.10008.5.1.4.1.2.1.1',
  PATIENT_ROOT_MOVE: '1.2.840.10008.5.1.4.1.2.1.2',
  STUDY_ROOT_FIND: '1.2.840.10008.5.1.4.1.2.2.1',
  STUDY_ROOT_MOVE: '1.2.840.10008.5.1.4.1.2.2.2',
  SECONDARY_CAPTURE_IMAGE_STORAGE: '1.2.840.10008.5.1.4.1.1.7',
} as const;

/** Every storage SOP class UID lives under this root */
export const STORAGE_SOP_CLASS_ROOT = '1.2.840.10008.5.1.4.1.1.';

export function isStorageSopClass(uid: string): boolean {
  return uid.startsWith(STORAGE_SOP_CLASS_ROOT);
}

/**
 * Byte layout of a data set under a transfer syntax
 */
export interface EncodingSyntax {
  explicitVr: boolean;
  bigEndian: boolean;
}

export const IMPLICIT_LITTLE: EncodingSyntax = { explicitVr: false, bigEndian: false };
export const EXPLICIT_LITTLE: EncodingSyntax = { explicitVr: true, bigEndian: false };

/**
 * Encoded (compressed) syntaxes still use explicit VR little endian for
 * everything except the pixel data.
 */
export function encodingOf(transferSyntaxUid: string): EncodingSyntax {
  switch (transferSyntaxUid) {
    case TransferSyntax.IMPLICIT_VR_LITTLE_ENDIAN:
      return IMPLICIT_LITTLE;
    case TransferSyntax.EXPLICIT_VR_BIG_ENDIAN:
      return { explicitVr: true, bigEndian: true };
    default:
      return EXPLICIT_LITTLE;
  }
}

/**
 * Identifies this implementation in file meta headers and association requests
 */
export const IMPLEMENTATION_CLASS_UID = '2.25.329800735698586629295641978511506172918';
export const IMPLEMENTATION_VERSION_NAME = 'DICOM_RELAY_01';

/**
 * multipart/related codec for DICOMweb bodies.
 *
 * WADO-RS answers a study retrieval with one multipart body; STOW-RS takes
 * one. C-STORE and the folder writer need the objects one by one.
 */

import { v4 as uuidv4 } from 'uuid';
import { RelayError } from '../errors.js';

const CRLF = Buffer.from('\r\n', 'ascii');
const HEADER_END = Buffer.from('\r\n\r\n', 'ascii');
const MAX_BOUNDARY_ATTEMPTS = 8;

export const DICOM_MEDIA_TYPE = 'application/dicom';

export interface ObjectPart {
  /** Raw header block, without the terminating blank line */
  headers: string;
  payload: Buffer;
}

export interface MultipartMessage {
  boundary: string;
  parts: ObjectPart[];
}

export interface JoinedMultipart {
  body: Buffer;
  boundary: string;
  /** Value for the Content-Type header of the request carrying body */
  contentType: string;
}

/**
 * Extract the boundary parameter from a Content-Type header value
 */
export function boundaryFromContentType(header: string | undefined): string | undefined {
  if (!header) {
    return undefined;
  }
  const match = header.match(/boundary=["']?([^"';\s]+)["']?/i);
  return match?.[1];
}

/**
 * Split a body into its parts. The segment before the first delimiter and the
 * one after the last are framing and are dropped, as are segments without a
 * header/body separator. Never throws: malformed input yields zero parts.
 */
export function parse(body: Buffer, boundary: string): MultipartMessage {
  const parts: ObjectPart[] = [];
  if (!boundary) {
    return { boundary, parts };
  }

  const delimiter = Buffer.from(`--${boundary}`, 'latin1');
  const positions: number[] = [];
  let index = body.indexOf(delimiter);
  while (index !== -1) {
    positions.push(index);
    index = body.indexOf(delimiter, index + delimiter.length);
  }

  for (let i = 0; i + 1 < positions.length; i++) {
    const start = (positions[i] ?? 0) + delimiter.length;
    const end = positions[i + 1] ?? body.length;
    const segment = body.subarray(start, end);

    const separator = segment.indexOf(HEADER_END);
    if (separator === -1) {
      continue;
    }

    let payload = segment.subarray(separator + HEADER_END.length);
    // The CRLF before the next delimiter belongs to the delimiter
    if (payload.length >= CRLF.length && payload.subarray(payload.length - CRLF.length).equals(CRLF)) {
      payload = payload.subarray(0, payload.length - CRLF.length);
    }

    parts.push({
      headers: segment.subarray(0, separator).toString('latin1').replace(/^\r\n/, ''),
      payload,
    });
  }

  return { boundary, parts };
}

/**
 * Payloads of every part, in order
 */
export function split(body: Buffer, boundary: string): Buffer[] {
  return parse(body, boundary).parts.map((part) => part.payload);
}

/**
 * Package objects into one multipart/related body under a fresh boundary
 * that occurs in none of the payloads.
 */
export function join(objects: Buffer[], contentType: string = DICOM_MEDIA_TYPE): JoinedMultipart {
  const boundary = chooseBoundary(objects);
  const chunks: Buffer[] = [];

  for (const object of objects) {
    chunks.push(
      Buffer.from(`--${boundary}\r\nContent-Type: ${contentType}\r\n\r\n`, 'latin1'),
      object,
      CRLF
    );
  }
  chunks.push(Buffer.from(`--${boundary}--\r\n`, 'latin1'));

  return {
    body: Buffer.concat(chunks),
    boundary,
    contentType: `multipart/related; type="${contentType}"; boundary=${boundary}`,
  };
}

function chooseBoundary(objects: Buffer[]): string {
  for (let attempt = 0; attempt < MAX_BOUNDARY_ATTEMPTS; attempt++) {
    const boundary = uuidv4().replace(/-/g, '');
    const marker = Buffer.from(`--${boundary}`, 'latin1');
    if (!objects.some((object) => object.includes(marker))) {
      return boundary;
    }
  }
  throw new RelayError(`No collision-free multipart boundary after ${MAX_BOUNDARY_ATTEMPTS} attempts`);
}

import { describe, it, expect } from '@jest/globals';
import {
  boundaryFromContentType,
  join,
  parse,
  split,
} from '../../../src/multipart/MultipartCodec.js';

describe('MultipartCodec', () => {
  describe('boundaryFromContentType', () => {
    it('should read quoted and unquoted boundaries', () => {
      expect(boundaryFromContentType('multipart/related; type="application/dicom"; boundary=abc123')).toBe('abc123');
      expect(boundaryFromContentType('multipart/related; boundary="xyz"; type="application/dicom"')).toBe('xyz');
    });

    it('should return undefined without a boundary', () => {
      expect(boundaryFromContentType('application/dicom')).toBeUndefined();
      expect(boundaryFromContentType(undefined)).toBeUndefined();
    });
  });

  describe('join', () => {
    it('should frame each object and close the body', () => {
      const joined = join([Buffer.from('ONE'), Buffer.from('TWO')]);
      const b = joined.boundary;

      expect(joined.body.toString('latin1')).toBe(
        `--${b}\r\nContent-Type: application/dicom\r\n\r\nONE\r\n` +
          `--${b}\r\nContent-Type: application/dicom\r\n\r\nTWO\r\n` +
          `--${b}--\r\n`
      );
      expect(joined.contentType).toBe(`multipart/related; type="application/dicom"; boundary=${b}`);
      expect(boundaryFromContentType(joined.contentType)).toBe(b);
    });

    it('should pick a boundary that occurs in no payload', () => {
      const payloads = [Buffer.from('--'), Buffer.from('\r\n--\r\n')];
      const joined = join(payloads);
      expect(payloads.some((p) => p.includes(`--${joined.boundary}`))).toBe(false);
      expect(joined.boundary).toMatch(/^[0-9a-f]{32}$/);
    });
  });

  describe('split', () => {
    it('should return the objects join packed, in order', () => {
      const objects = [Buffer.from([0, 1, 2, 13, 10]), Buffer.from('second\r\n\r\nwith blank line'), Buffer.alloc(0)];
      const joined = join(objects);

      const parts = split(joined.body, joined.boundary);

      expect(parts).toHaveLength(3);
      expect(parts[0]!.equals(objects[0]!)).toBe(true);
      expect(parts[1]!.toString()).toBe('second\r\n\r\nwith blank line');
      expect(parts[2]!.length).toBe(0);
    });

    it('should keep part headers', () => {
      const body = Buffer.from(
        '--b1\r\nContent-Type: application/dicom\r\nContent-Location: /x\r\n\r\nDATA\r\n--b1--\r\n',
        'latin1'
      );
      const { parts } = parse(body, 'b1');

      expect(parts).toHaveLength(1);
      expect(parts[0]!.headers).toBe('Content-Type: application/dicom\r\nContent-Location: /x');
      expect(parts[0]!.payload.toString()).toBe('DATA');
    });

    it('should ignore the preamble and epilogue', () => {
      const body = Buffer.from('preamble\r\n--b1\r\n\r\nA\r\n--b1--\r\nepilogue', 'latin1');
      expect(split(body, 'b1').map((p) => p.toString())).toEqual(['A']);
    });

    it('should yield zero objects when the boundary never occurs', () => {
      const joined = join([Buffer.from('X')]);
      expect(split(joined.body, 'not-the-boundary')).toEqual([]);
      expect(split(joined.body, '')).toEqual([]);
    });

    it('should drop segments without a header separator', () => {
      const body = Buffer.from('--b1\r\ngarbage\r\n--b1\r\n\r\nOK\r\n--b1--', 'latin1');
      expect(split(body, 'b1').map((p) => p.toString())).toEqual(['OK']);
    });
  });
});

import { describe, it, expect } from '@jest/globals';
import {
  ContextResult,
  DEFAULT_MAX_PDU_LENGTH,
  PduReader,
  PduType,
  decodeAbort,
  decodeAssociateAc,
  decodeAssociateRj,
  decodeAssociateRq,
  decodePData,
  encodeAbort,
  encodeAssociateAc,
  encodeAssociateRj,
  encodeAssociateRq,
  encodePData,
  encodeReleaseRq,
} from '../../../src/dicom/Pdu.js';
import { SopClass, TransferSyntax } from '../../../src/dicom/DicomTags.js';

describe('Pdu', () => {
  describe('A-ASSOCIATE', () => {
    it('should decode the request it encoded', () => {
      const encoded = encodeAssociateRq({
        calledAE: 'ORTHANC',
        callingAE: 'DICOM_RELAY',
        contexts: [
          {
            id: 1,
            abstractSyntax: SopClass.VERIFICATION,
            transferSyntaxes: [TransferSyntax.IMPLICIT_VR_LITTLE_ENDIAN],
          },
          {
            id: 3,
            abstractSyntax: SopClass.STUDY_ROOT_FIND,
            transferSyntaxes: [TransferSyntax.EXPLICIT_VR_LITTLE_ENDIAN, TransferSyntax.IMPLICIT_VR_LITTLE_ENDIAN],
          },
        ],
        maxPduLength: 32768,
      });

      expect(encoded[0]).toBe(PduType.A_ASSOCIATE_RQ);
      expect(encoded.readUInt32BE(2)).toBe(encoded.length - 6);
      expect(decodeAssociateRq(encoded)).toEqual({
        calledAE: 'ORTHANC',
        callingAE: 'DICOM_RELAY',
        contexts: [
          {
            id: 1,
            abstractSyntax: SopClass.VERIFICATION,
            transferSyntaxes: [TransferSyntax.IMPLICIT_VR_LITTLE_ENDIAN],
          },
          {
            id: 3,
            abstractSyntax: SopClass.STUDY_ROOT_FIND,
            transferSyntaxes: [TransferSyntax.EXPLICIT_VR_LITTLE_ENDIAN, TransferSyntax.IMPLICIT_VR_LITTLE_ENDIAN],
          },
        ],
        maxPduLength: 32768,
      });
    });

    it('should cut AE titles to 16 characters', () => {
      const encoded = encodeAssociateRq({
        calledAE: 'A_VERY_LONG_AE_TITLE',
        callingAE: 'SCU',
        contexts: [],
        maxPduLength: DEFAULT_MAX_PDU_LENGTH,
      });

      const decoded = decodeAssociateRq(encoded);
      expect(decoded.calledAE).toBe('A_VERY_LONG_AE_T');
      expect(decoded.callingAE).toBe('SCU');
    });

    it('should take abstract syntaxes from the proposal when decoding an accept', () => {
      const encoded = encodeAssociateAc({
        calledAE: 'STORESCP',
        callingAE: 'DICOM_RELAY',
        contexts: [
          {
            id: 1,
            abstractSyntax: '',
            result: ContextResult.ACCEPTANCE,
            transferSyntax: TransferSyntax.EXPLICIT_VR_LITTLE_ENDIAN,
          },
          { id: 3, abstractSyntax: '', result: ContextResult.ABSTRACT_SYNTAX_NOT_SUPPORTED },
        ],
        maxPduLength: 65536,
      });

      const decoded = decodeAssociateAc(encoded, [
        { id: 1, abstractSyntax: SopClass.VERIFICATION, transferSyntaxes: [] },
        { id: 3, abstractSyntax: SopClass.SECONDARY_CAPTURE_IMAGE_STORAGE, transferSyntaxes: [] },
      ]);

      expect(decoded.calledAE).toBe('STORESCP');
      expect(decoded.maxPduLength).toBe(65536);
      expect(decoded.contexts).toEqual([
        {
          id: 1,
          abstractSyntax: SopClass.VERIFICATION,
          result: ContextResult.ACCEPTANCE,
          transferSyntax: TransferSyntax.EXPLICIT_VR_LITTLE_ENDIAN,
        },
        {
          id: 3,
          abstractSyntax: SopClass.SECONDARY_CAPTURE_IMAGE_STORAGE,
          result: ContextResult.ABSTRACT_SYNTAX_NOT_SUPPORTED,
          transferSyntax: undefined,
        },
      ]);
    });

    it('should lay out a reject as result, source and reason', () => {
      const encoded = encodeAssociateRj({ result: 1, source: 1, reason: 7 });

      expect([...encoded]).toEqual([0x03, 0, 0, 0, 0, 4, 0, 1, 1, 7]);
      expect(decodeAssociateRj(encoded)).toEqual({ result: 1, source: 1, reason: 7 });
    });
  });

  describe('A-ABORT', () => {
    it('should carry source and reason', () => {
      const encoded = encodeAbort(2, 6);

      expect([...encoded]).toEqual([0x07, 0, 0, 0, 0, 4, 0, 0, 2, 6]);
      expect(decodeAbort(encoded)).toEqual({ source: 2, reason: 6 });
    });

    it('should default to zeros', () => {
      expect(decodeAbort(encodeAbort())).toEqual({ source: 0, reason: 0 });
    });
  });

  describe('P-DATA-TF', () => {
    it('should fragment to the maximum PDU length and flag the last fragment', () => {
      const data = Buffer.alloc(20, 0xab);

      const pdus = encodePData(5, false, data, 16);

      expect(pdus).toHaveLength(2);
      expect(pdus.map((pdu) => pdu.length)).toEqual([22, 22]);
      const pdvs = pdus.flatMap((pdu) => decodePData(pdu));
      expect(pdvs.map((pdv) => [pdv.contextId, pdv.isCommand, pdv.isLast, pdv.data.length])).toEqual([
        [5, false, false, 10],
        [5, false, true, 10],
      ]);
      expect(Buffer.concat(pdvs.map((pdv) => pdv.data))).toEqual(data);
    });

    it('should send everything in one fragment without a limit', () => {
      const pdus = encodePData(1, true, Buffer.from([1, 2, 3, 4, 5]), 0);

      expect(pdus).toHaveLength(1);
      const [pdu] = pdus;
      expect(pdu?.[11]).toBe(0x03);
      expect(decodePData(pdu ?? Buffer.alloc(0))).toEqual([
        { contextId: 1, isCommand: true, isLast: true, data: Buffer.from([1, 2, 3, 4, 5]) },
      ]);
    });

    it('should emit one empty last fragment for empty data', () => {
      const pdus = encodePData(3, false, Buffer.alloc(0), DEFAULT_MAX_PDU_LENGTH);

      expect(pdus).toHaveLength(1);
      expect(decodePData(pdus[0] ?? Buffer.alloc(0))).toEqual([
        { contextId: 3, isCommand: false, isLast: true, data: Buffer.alloc(0) },
      ]);
    });

    it('should decode several PDVs from one PDU', () => {
      const first = encodePData(1, true, Buffer.from([9, 9]), 0)[0] ?? Buffer.alloc(0);
      const second = encodePData(1, false, Buffer.from([7]), 0)[0] ?? Buffer.alloc(0);
      const body = Buffer.concat([first.subarray(6), second.subarray(6)]);
      const header = Buffer.from([PduType.P_DATA_TF, 0, 0, 0, 0, 0]);
      header.writeUInt32BE(body.length, 2);

      const pdvs = decodePData(Buffer.concat([header, body]));

      expect(pdvs).toEqual([
        { contextId: 1, isCommand: true, isLast: true, data: Buffer.from([9, 9]) },
        { contextId: 1, isCommand: false, isLast: true, data: Buffer.from([7]) },
      ]);
    });
  });

  describe('PduReader', () => {
    it('should hold partial PDUs until they complete', () => {
      const reader = new PduReader();
      const stream = Buffer.concat([encodeReleaseRq(), encodeAbort(0, 2)]);

      expect(reader.push(stream.subarray(0, 3))).toEqual([]);
      const pdus = reader.push(stream.subarray(3, 15));
      expect(pdus.map((pdu) => pdu.type)).toEqual([PduType.A_RELEASE_RQ]);
      const rest = reader.push(stream.subarray(15));
      expect(rest.map((pdu) => pdu.type)).toEqual([PduType.A_ABORT]);
      expect(decodeAbort(rest[0]?.data ?? Buffer.alloc(0))).toEqual({ source: 0, reason: 2 });
    });
  });
});

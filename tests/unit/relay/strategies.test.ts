import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { InboundObject } from '../../../src/association/AssociationService.js';
import { DicomStatus } from '../../../src/dicom/Dimse.js';
import { TransferSyntax } from '../../../src/dicom/DicomTags.js';
import { AssociationError } from '../../../src/errors.js';
import { InboundObjectReceiver } from '../../../src/receiver/InboundObjectReceiver.js';
import { FolderDelivery, StoreDelivery } from '../../../src/relay/DeliveryStrategy.js';
import { MoveRetrieval } from '../../../src/relay/RetrievalStrategy.js';
import { DimseStudySource } from '../../../src/relay/StudySource.js';
import { TransferTracker } from '../../../src/relay/TransferTracker.js';
import type { StudySummary } from '../../../src/relay/types.js';
import { FakeAssociationService } from '../../helpers/FakeAssociationService.js';
import { buildDataSet, buildPart10, instanceIds } from '../../helpers/dicomFixtures.js';

const SOURCE = { host: 'localhost', port: 4242, aeTitle: 'ORTHANC' };
const STUDY_UID = '1.2.840.99.1';
const STUDY: StudySummary = { studyIdentifier: STUDY_UID, studyInstanceUID: STUDY_UID };

function inboundFor(n: number): InboundObject {
  const ids = instanceIds(STUDY_UID, n);
  return {
    callingAE: 'ORTHANC',
    patientID: ids.patientID,
    studyInstanceUID: ids.studyInstanceUID,
    seriesInstanceUID: ids.seriesInstanceUID,
    sopInstanceUID: ids.sopInstanceUID,
    sopClassUID: ids.sopClassUID,
    transferSyntaxUID: TransferSyntax.IMPLICIT_VR_LITTLE_ENDIAN,
    dataSet: buildDataSet(ids),
  };
}

describe('relay strategies', () => {
  let dir: string;
  let service: FakeAssociationService;
  let tracker: TransferTracker;
  let receiver: InboundObjectReceiver;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'strategies-'));
    service = new FakeAssociationService();
    tracker = new TransferTracker();
    receiver = new InboundObjectReceiver(dir, tracker);
    service.registerInboundHandler((object) => receiver.handle(object));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('MoveRetrieval', () => {
    const options = { localAeTitle: 'DICOM_RELAY', quiescenceMs: 30, timeoutMs: 1000 };

    it('should return the objects the listener wrote', async () => {
      service.moveBehaviour = (_uid, push) => {
        push(inboundFor(1));
        push(inboundFor(2));
        return [
          { status: DicomStatus.PENDING, remaining: 1, completed: 1, failed: 0 },
          { status: DicomStatus.SUCCESS, remaining: 0, completed: 2, failed: 0 },
        ];
      };
      const retrieval = new MoveRetrieval(service, SOURCE, tracker, options);

      const result = await retrieval.retrieve(STUDY);

      expect(service.moves).toEqual([
        { query: { level: 'STUDY', studyInstanceUID: STUDY_UID }, destination: 'DICOM_RELAY' },
      ]);
      if (result.kind !== 'objects') {
        throw new Error('expected objects');
      }
      expect(result.objects).toHaveLength(2);
      expect(result.storedPaths).toEqual([
        path.join(dir, 'P1', STUDY_UID, `${STUDY_UID}.1`, `${STUDY_UID}.1.1.dcm`),
        path.join(dir, 'P1', STUDY_UID, `${STUDY_UID}.1`, `${STUDY_UID}.1.2.dcm`),
      ]);
      expect(tracker.isTracking(STUDY_UID)).toBe(false);
    });

    it('should fail on a non-success final status', async () => {
      service.moveBehaviour = () => [{ status: DicomStatus.REFUSED_OUT_OF_RESOURCES }];
      const retrieval = new MoveRetrieval(service, SOURCE, tracker, options);

      await expect(retrieval.retrieve(STUDY)).rejects.toThrow(`C-MOVE of ${STUDY_UID} ended with status 0xA700`);
      expect(tracker.isTracking(STUDY_UID)).toBe(false);
    });

    it('should fail when sub-operations failed', async () => {
      service.moveBehaviour = (_uid, push) => {
        push(inboundFor(1));
        return [{ status: DicomStatus.SUCCESS, completed: 1, failed: 1 }];
      };
      const retrieval = new MoveRetrieval(service, SOURCE, tracker, options);

      await expect(retrieval.retrieve(STUDY)).rejects.toThrow('reported 1 failed sub-operations');
    });

    it('should fail when fewer objects arrive than the source completed', async () => {
      service.moveBehaviour = (_uid, push) => {
        push(inboundFor(1));
        push(inboundFor(2));
        return [{ status: DicomStatus.SUCCESS, completed: 3, failed: 0 }];
      };
      const retrieval = new MoveRetrieval(service, SOURCE, tracker, options);

      await expect(retrieval.retrieve(STUDY)).rejects.toThrow(`Only 2 of 3 objects of ${STUDY_UID} arrived`);
    });

    it('should wait for arrivals after the final response', async () => {
      service.moveBehaviour = (_uid, push) => {
        setTimeout(() => push(inboundFor(1)), 10);
        return [{ status: DicomStatus.SUCCESS, completed: 1, failed: 0 }];
      };
      const retrieval = new MoveRetrieval(service, SOURCE, tracker, { ...options, quiescenceMs: 500 });

      const result = await retrieval.retrieve(STUDY);

      expect(result.kind === 'objects' ? result.objects.length : 0).toBe(1);
    });

    it('should fail when nothing arrives', async () => {
      const retrieval = new MoveRetrieval(service, SOURCE, tracker, options);
      await expect(retrieval.retrieve(STUDY)).rejects.toThrow(`C-MOVE of ${STUDY_UID} delivered no objects`);
    });
  });

  describe('StoreDelivery', () => {
    const DEST = { host: 'localhost', port: 104, aeTitle: 'STORESCP' };

    it('should count accepted and rejected C-STOREs', async () => {
      service.storeStatus = (object) =>
        object.sopInstanceUID.endsWith('.2') ? DicomStatus.PROCESSING_FAILURE : DicomStatus.WARNING_ELEMENTS_DISCARDED;
      const delivery = new StoreDelivery(service, DEST);

      const outcome = await delivery.deliver(STUDY, {
        kind: 'objects',
        objects: [1, 2, 3].map((n) => buildPart10(instanceIds(STUDY_UID, n))),
      });

      expect(outcome).toEqual({ delivered: 2, failed: 1, details: '1 C-STORE requests not accepted' });
    });

    it('should count unreadable objects as failed', async () => {
      const delivery = new StoreDelivery(service, DEST);

      const outcome = await delivery.deliver(STUDY, {
        kind: 'objects',
        objects: [buildPart10(instanceIds(STUDY_UID, 1)), Buffer.from('garbage!')],
      });

      expect(outcome).toEqual({ delivered: 1, failed: 1, details: undefined });
      expect(service.stored.map((o) => o.sopInstanceUID)).toEqual([`${STUDY_UID}.1.1`]);
    });
  });

  describe('FolderDelivery', () => {
    it('should write objects under the receiver layout', async () => {
      const delivery = new FolderDelivery(receiver);

      const outcome = await delivery.deliver(STUDY, {
        kind: 'objects',
        objects: [buildPart10(instanceIds(STUDY_UID, 1, 'P9'))],
      });

      expect(outcome).toEqual({ delivered: 1, failed: 0 });
      await expect(
        fs.access(path.join(dir, 'P9', STUDY_UID, `${STUDY_UID}.1`, `${STUDY_UID}.1.1.dcm`))
      ).resolves.toBeUndefined();
    });

    it('should only confirm files a C-MOVE already stored', async () => {
      const stored = path.join(dir, 'present.dcm');
      await fs.writeFile(stored, 'x');
      const delivery = new FolderDelivery(receiver);

      const outcome = await delivery.deliver(STUDY, {
        kind: 'objects',
        objects: [Buffer.from('a'), Buffer.from('b')],
        storedPaths: [stored, path.join(dir, 'missing.dcm')],
      });

      expect(outcome).toEqual({ delivered: 1, failed: 1 });
    });
  });

  describe('DimseStudySource', () => {
    it('should list each study once from pending responses', async () => {
      service.findResponses = [
        { status: DicomStatus.PENDING, identifier: { studyInstanceUID: '1.1' } },
        { status: DicomStatus.PENDING_WARNING, identifier: { studyInstanceUID: '1.2' } },
        { status: DicomStatus.PENDING, identifier: { studyInstanceUID: '1.1' } },
        { status: DicomStatus.PENDING, identifier: {} },
        { status: DicomStatus.SUCCESS },
      ];
      const source = new DimseStudySource(service, SOURCE);

      expect(await source.listStudies()).toEqual([
        { studyIdentifier: '1.1', studyInstanceUID: '1.1' },
        { studyIdentifier: '1.2', studyInstanceUID: '1.2' },
      ]);
      expect(source.description).toBe('C-FIND ORTHANC@localhost:4242');
    });

    it('should throw when the query does not end in success', async () => {
      service.findResponses = [{ status: DicomStatus.PENDING, identifier: { studyInstanceUID: '1.1' } }];
      const source = new DimseStudySource(service, SOURCE);

      await expect(source.listStudies()).rejects.toThrow(AssociationError);
      await expect(source.listStudies()).rejects.toThrow('C-FIND on ORTHANC ended with no final response');
    });
  });
});

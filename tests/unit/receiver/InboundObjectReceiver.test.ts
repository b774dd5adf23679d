import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { InboundObject } from '../../../src/association/AssociationService.js';
import { DicomObjectCodec } from '../../../src/dicom/DicomObjectCodec.js';
import { DicomStatus } from '../../../src/dicom/Dimse.js';
import { TransferSyntax } from '../../../src/dicom/DicomTags.js';
import {
  InboundObjectReceiver,
  sanitizeSegment,
  syntheticInstanceName,
} from '../../../src/receiver/InboundObjectReceiver.js';
import { TransferTracker } from '../../../src/relay/TransferTracker.js';
import { DEFAULT_IDS, buildDataSet, buildPart10 } from '../../helpers/dicomFixtures.js';

function inbound(overrides: Partial<InboundObject> = {}): InboundObject {
  return {
    callingAE: 'ORTHANC',
    patientID: 'P1',
    studyInstanceUID: 'S1',
    seriesInstanceUID: 'SE1',
    sopInstanceUID: 'I1',
    sopClassUID: DEFAULT_IDS.sopClassUID,
    transferSyntaxUID: TransferSyntax.IMPLICIT_VR_LITTLE_ENDIAN,
    dataSet: buildDataSet(),
    ...overrides,
  };
}

describe('InboundObjectReceiver', () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'receiver-'));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('should write under patient/study/series/sop', () => {
    const receiver = new InboundObjectReceiver(root);

    const status = receiver.handle(inbound());

    const target = path.join(root, 'P1', 'S1', 'SE1', 'I1.dcm');
    expect(status).toBe(DicomStatus.SUCCESS);
    expect(fs.existsSync(target)).toBe(true);

    const written = new DicomObjectCodec().extractDataSet(fs.readFileSync(target));
    expect(written.transferSyntaxUID).toBe(TransferSyntax.IMPLICIT_VR_LITTLE_ENDIAN);
    expect(written.mediaStorageSopInstanceUID).toBe('I1');
    expect(written.dataSet.equals(buildDataSet())).toBe(true);
  });

  it('should write Part-10 input unchanged', () => {
    const receiver = new InboundObjectReceiver(root);
    const file = buildPart10();

    const target = receiver.persist(inbound({ dataSet: file }));

    expect(fs.readFileSync(target).equals(file)).toBe(true);
  });

  it('should use Unknown for a missing patient ID', () => {
    const receiver = new InboundObjectReceiver(root);
    expect(receiver.storagePath({ studyInstanceUID: 'S1', seriesInstanceUID: 'SE1', sopInstanceUID: 'I1' })).toBe(
      path.join(root, 'Unknown', 'S1', 'SE1', 'I1.dcm')
    );
    expect(receiver.storagePath({ patientID: '   ', sopInstanceUID: 'I1' })).toBe(
      path.join(root, 'Unknown', 'Unknown', 'Unknown', 'I1.dcm')
    );
  });

  it('should give objects without a SOP Instance UID distinct names', () => {
    const receiver = new InboundObjectReceiver(root);

    const first = receiver.persist(inbound({ sopInstanceUID: undefined }));
    const second = receiver.persist(inbound({ sopInstanceUID: undefined }));

    expect(first).not.toBe(second);
    expect(path.basename(first)).toMatch(/^instance_\d+_[0-9a-f]{8}\.dcm$/);
    expect(fs.readdirSync(path.join(root, 'P1', 'S1', 'SE1'))).toHaveLength(2);
  });

  it('should keep values inside their path segment', () => {
    expect(sanitizeSegment('a/b\\c')).toBe('a_b_c');
    expect(sanitizeSegment('..')).toBe('_');
    expect(sanitizeSegment('P\u00001')).toBe('P1');

    const receiver = new InboundObjectReceiver(root);
    expect(receiver.storagePath({ patientID: '../etc', sopInstanceUID: 'I1' })).toBe(
      path.join(root, '.._etc', 'Unknown', 'Unknown', 'I1.dcm')
    );
  });

  it('should build synthetic names from the time', () => {
    expect(syntheticInstanceName(1700000000000)).toMatch(/^instance_1700000000000_[0-9a-f]{8}$/);
  });

  it('should answer 0xC000 and record the failure when the write fails', () => {
    const blocker = path.join(root, 'blocker');
    fs.writeFileSync(blocker, 'x');
    const tracker = new TransferTracker();
    tracker.begin('S1');
    const receiver = new InboundObjectReceiver(blocker, tracker);

    const status = receiver.handle(inbound());

    expect(status).toBe(DicomStatus.CANNOT_UNDERSTAND);
    expect(tracker.snapshot('S1')).toMatchObject({ received: 1, written: 0, failed: 1 });
  });

  it('should report written paths to the tracker', () => {
    const tracker = new TransferTracker();
    tracker.begin('S1');
    const receiver = new InboundObjectReceiver(root, tracker);

    receiver.handle(inbound());
    receiver.handle(inbound({ studyInstanceUID: 'OTHER' }));

    expect(tracker.snapshot('S1')).toMatchObject({
      received: 1,
      written: 1,
      paths: [path.join(root, 'P1', 'S1', 'SE1', 'I1.dcm')],
    });
    expect(tracker.unsolicitedCount).toBe(1);
  });
});

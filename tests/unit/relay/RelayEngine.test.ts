import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DedupLedger } from '../../../src/ledger/DedupLedger.js';
import { join, split } from '../../../src/multipart/MultipartCodec.js';
import type { DeliveryStrategy, WireForm } from '../../../src/relay/DeliveryStrategy.js';
import { RelayEngine } from '../../../src/relay/RelayEngine.js';
import type { RetrievalStrategy } from '../../../src/relay/RetrievalStrategy.js';
import {
  DeliveryOutcome,
  DeliveryPayload,
  RetrievedStudy,
  StudyState,
  StudySummary,
} from '../../../src/relay/types.js';

class FakeRetrieval implements RetrievalStrategy {
  readonly name = 'fake-retrieve';
  calls = 0;
  constructor(public result: () => Promise<RetrievedStudy>) {}

  retrieve(_study: StudySummary): Promise<RetrievedStudy> {
    this.calls++;
    return this.result();
  }
}

class FakeDelivery implements DeliveryStrategy {
  readonly name = 'fake-deliver';
  payloads: DeliveryPayload[] = [];
  constructor(
    readonly wireForm: WireForm,
    public outcome: (payload: DeliveryPayload) => DeliveryOutcome
  ) {}

  async deliver(_study: StudySummary, payload: DeliveryPayload): Promise<DeliveryOutcome> {
    this.payloads.push(payload);
    return this.outcome(payload);
  }
}

const STUDY: StudySummary = { studyIdentifier: 'S1', studyInstanceUID: '1.2.3' };
const OBJECTS = [Buffer.from('obj-1'), Buffer.from('obj-2'), Buffer.from('obj-3')];

const objects = (): Promise<RetrievedStudy> => Promise.resolve({ kind: 'objects', objects: OBJECTS });
const allDelivered = (payload: DeliveryPayload): DeliveryOutcome => ({
  delivered: payload.kind === 'objects' ? payload.objects.length : payload.objectCount,
  failed: 0,
});

describe('RelayEngine', () => {
  let dir: string;
  let ledger: DedupLedger;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'engine-'));
    ledger = new DedupLedger(path.join(dir, 'ledger.json'));
    await ledger.load();
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should commit a fully delivered study and not offer it again', async () => {
    const engine = new RelayEngine(new FakeRetrieval(objects), new FakeDelivery('objects', allDelivered), ledger);

    const record = await engine.relay(STUDY);

    expect(record.state).toBe(StudyState.DELIVERED);
    expect(record.deliveredCount).toBe(3);
    expect(record.attemptCount).toBe(1);
    expect(ledger.contains('1.2.3')).toBe(true);
    expect(engine.isEligible('1.2.3')).toBe(false);
    expect(engine.getWorkingSet()).toEqual([]);
  });

  it('should leave a partial delivery uncommitted and resend every object next time', async () => {
    const delivery = new FakeDelivery('objects', () => ({ delivered: 2, failed: 1 }));
    const engine = new RelayEngine(new FakeRetrieval(objects), delivery, ledger);

    const failed = await engine.relay(STUDY);

    expect(failed.state).toBe(StudyState.FAILED);
    expect(failed.lastError).toBe('2 delivered, 1 failed');
    expect(ledger.contains('1.2.3')).toBe(false);
    expect(engine.isEligible('1.2.3')).toBe(true);
    expect(engine.getRecord('1.2.3')?.state).toBe(StudyState.FAILED);

    delivery.outcome = allDelivered;
    const retried = await engine.relay(STUDY);

    expect(retried.state).toBe(StudyState.DELIVERED);
    expect(retried.attemptCount).toBe(2);
    expect(delivery.payloads).toHaveLength(2);
    const second = delivery.payloads[1];
    expect(second?.kind === 'objects' ? second.objects : []).toEqual(OBJECTS);
    expect(ledger.contains('1.2.3')).toBe(true);
  });

  it('should fail a study with zero objects', async () => {
    const empty = join([Buffer.from('x')]);
    const retrieval = new FakeRetrieval(() =>
      Promise.resolve({ kind: 'multipart', body: empty.body, contentType: 'multipart/related; boundary=other' })
    );
    const delivery = new FakeDelivery('objects', allDelivered);
    const engine = new RelayEngine(retrieval, delivery, ledger);

    const record = await engine.relay(STUDY);

    expect(record.state).toBe(StudyState.FAILED);
    expect(record.lastError).toBe('Retrieved study contains no objects');
    expect(delivery.payloads).toEqual([]);
    expect(ledger.contains('1.2.3')).toBe(false);
  });

  it('should fail when the destination confirms nothing', async () => {
    const engine = new RelayEngine(
      new FakeRetrieval(objects),
      new FakeDelivery('objects', () => ({ delivered: 0, failed: 0 })),
      ledger
    );
    expect((await engine.relay(STUDY)).state).toBe(StudyState.FAILED);
  });

  it('should record a retrieval error', async () => {
    const engine = new RelayEngine(
      new FakeRetrieval(() => Promise.reject(new Error('connect ECONNREFUSED'))),
      new FakeDelivery('objects', allDelivered),
      ledger
    );

    const record = await engine.relay(STUDY);

    expect(record.state).toBe(StudyState.FAILED);
    expect(record.lastError).toBe('connect ECONNREFUSED');
  });

  it('should refuse a study that is already in flight', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const engine = new RelayEngine(
      new FakeRetrieval(async () => {
        await gate;
        return { kind: 'objects', objects: OBJECTS };
      }),
      new FakeDelivery('objects', allDelivered),
      ledger
    );

    const first = engine.relay(STUDY);
    expect(engine.isInFlight('1.2.3')).toBe(true);
    expect(engine.isEligible('1.2.3')).toBe(false);
    await expect(engine.relay(STUDY)).rejects.toThrow('Study 1.2.3 is already being relayed');

    release();
    expect((await first).state).toBe(StudyState.DELIVERED);
    expect(engine.isInFlight('1.2.3')).toBe(false);
  });

  it('should back off exponentially up to the cap', async () => {
    const engine = new RelayEngine(
      new FakeRetrieval(() => Promise.reject(new Error('down'))),
      new FakeDelivery('objects', allDelivered),
      ledger,
      { retryBaseDelayMs: 1000, retryBackoffMaxMs: 3000 }
    );

    const first = await engine.relay(STUDY);
    const firstAttempt = first.lastAttemptTime?.getTime() ?? 0;
    expect(engine.nextAttemptTime('1.2.3')).toBe(firstAttempt + 1000);
    expect(engine.isEligible('1.2.3', firstAttempt + 999)).toBe(false);
    expect(engine.isEligible('1.2.3', firstAttempt + 1000)).toBe(true);

    const second = await engine.relay(STUDY);
    expect(engine.nextAttemptTime('1.2.3')).toBe((second.lastAttemptTime?.getTime() ?? 0) + 2000);

    const third = await engine.relay(STUDY);
    expect(engine.nextAttemptTime('1.2.3')).toBe((third.lastAttemptTime?.getTime() ?? 0) + 3000);
  });

  it('should retry on every poll without a backoff cap', async () => {
    const engine = new RelayEngine(
      new FakeRetrieval(() => Promise.reject(new Error('down'))),
      new FakeDelivery('objects', allDelivered),
      ledger
    );
    await engine.relay(STUDY);
    expect(engine.nextAttemptTime('1.2.3')).toBe(0);
    expect(engine.isEligible('1.2.3')).toBe(true);
  });

  describe('transcode', () => {
    it('should join objects for a multipart destination', async () => {
      const delivery = new FakeDelivery('multipart', allDelivered);
      const engine = new RelayEngine(new FakeRetrieval(objects), delivery, ledger);

      await engine.relay(STUDY);

      const payload = delivery.payloads[0];
      if (payload?.kind !== 'multipart') {
        throw new Error('expected a multipart payload');
      }
      expect(payload.objectCount).toBe(3);
      const boundary = payload.contentType.split('boundary=')[1] ?? '';
      expect(split(payload.body, boundary)).toEqual(OBJECTS);
    });

    it('should pass a WADO body through to STOW unchanged', () => {
      const joined = join(OBJECTS);
      const engine = new RelayEngine(
        new FakeRetrieval(objects),
        new FakeDelivery('multipart', allDelivered),
        ledger
      );

      const payload = engine.transcode({ kind: 'multipart', body: joined.body, contentType: joined.contentType });

      expect(payload).toEqual({ kind: 'multipart', body: joined.body, contentType: joined.contentType, objectCount: 3 });
    });

    it('should split a WADO body for an object destination', () => {
      const joined = join(OBJECTS);
      const engine = new RelayEngine(new FakeRetrieval(objects), new FakeDelivery('objects', allDelivered), ledger);

      const payload = engine.transcode({ kind: 'multipart', body: joined.body, contentType: joined.contentType });

      expect(payload).toEqual({ kind: 'objects', objects: OBJECTS });
    });
  });
});

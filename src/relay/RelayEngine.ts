/**
 * Relay Engine
 *
 * Drives one study through retrieve, transcode, deliver and commit. A study
 * enters the ledger only when every object it attempted was confirmed and
 * there was at least one; anything else leaves it Failed and eligible for
 * the next poll. There is no retry limit.
 */

import { DeliveryError, RelayError, errorMessage } from '../errors.js';
import { getLogger, registerComponent } from '../logging/index.js';
import type { DedupLedger } from '../ledger/DedupLedger.js';
import { boundaryFromContentType, join, split } from '../multipart/MultipartCodec.js';
import type { DeliveryStrategy } from './DeliveryStrategy.js';
import type { RetrievalStrategy } from './RetrievalStrategy.js';
import { DeliveryPayload, RetrievedStudy, StudyRecord, StudyState, StudySummary } from './types.js';

registerComponent('relay-engine', 'Per-study relay pipeline');
const logger = getLogger('relay-engine');

export interface RelayEngineOptions {
  /** Delay before the first retry when backoff is on (ms) */
  retryBaseDelayMs: number;
  /** Cap of the exponential retry backoff (ms); 0 retries on every poll */
  retryBackoffMaxMs: number;
}

export class RelayEngine {
  private readonly working = new Map<string, StudyRecord>();
  private readonly inFlight = new Set<string>();
  private readonly options: RelayEngineOptions;

  constructor(
    private readonly retrieval: RetrievalStrategy,
    private readonly delivery: DeliveryStrategy,
    private readonly ledger: DedupLedger,
    options: Partial<RelayEngineOptions> = {}
  ) {
    this.options = { retryBaseDelayMs: 5000, retryBackoffMaxMs: 0, ...options };
  }

  isInFlight(studyInstanceUID: string): boolean {
    return this.inFlight.has(studyInstanceUID);
  }

  getRecord(studyInstanceUID: string): StudyRecord | undefined {
    const record = this.working.get(studyInstanceUID);
    return record ? { ...record } : undefined;
  }

  /**
   * Studies discovered and not yet delivered
   */
  getWorkingSet(): StudyRecord[] {
    return [...this.working.values()].map((record) => ({ ...record }));
  }

  /**
   * Earliest time the study may be attempted again
   */
  nextAttemptTime(studyInstanceUID: string): number {
    const record = this.working.get(studyInstanceUID);
    if (!record || !record.lastAttemptTime || this.options.retryBackoffMaxMs <= 0) {
      return 0;
    }
    const exponent = Math.min(Math.max(record.attemptCount - 1, 0), 30);
    const delay = Math.min(this.options.retryBaseDelayMs * 2 ** exponent, this.options.retryBackoffMaxMs);
    return record.lastAttemptTime.getTime() + delay;
  }

  /**
   * Whether the poller should hand this study over now
   */
  isEligible(studyInstanceUID: string, now: number = Date.now()): boolean {
    if (this.ledger.contains(studyInstanceUID) || this.inFlight.has(studyInstanceUID)) {
      return false;
    }
    return now >= this.nextAttemptTime(studyInstanceUID);
  }

  /**
   * Relay one study. Retrieval and delivery failures end up in the returned
   * record; throws only when the study is already in flight.
   */
  async relay(study: StudySummary): Promise<StudyRecord> {
    const uid = study.studyInstanceUID;
    if (this.inFlight.has(uid)) {
      throw new RelayError(`Study ${uid} is already being relayed`);
    }

    let record = this.working.get(uid);
    if (!record) {
      record = {
        studyIdentifier: study.studyIdentifier,
        studyInstanceUID: uid,
        state: StudyState.DISCOVERED,
        attemptCount: 0,
        deliveredCount: 0,
      };
      this.working.set(uid, record);
      logger.info(`Discovered study ${uid}`);
    }

    this.inFlight.add(uid);
    record.attemptCount++;
    record.lastAttemptTime = new Date();
    record.lastError = undefined;
    record.deliveredCount = 0;

    try {
      record.state = StudyState.RETRIEVING;
      const retrieved = await this.retrieval.retrieve(study);

      record.state = StudyState.TRANSCODING;
      const payload = this.transcode(retrieved);

      record.state = StudyState.DELIVERING;
      const outcome = await this.delivery.deliver(study, payload);
      record.deliveredCount = outcome.delivered;

      if (outcome.failed > 0 || outcome.delivered === 0) {
        throw new DeliveryError(
          `${outcome.delivered} delivered, ${outcome.failed} failed${outcome.details ? ` (${outcome.details})` : ''}`,
          outcome.delivered,
          outcome.failed
        );
      }

      const persisted = await this.ledger.commit(uid);
      if (!persisted) {
        logger.warn(`Study ${uid} delivered but the ledger file was not updated`);
      }
      record.state = StudyState.DELIVERED;
      this.working.delete(uid);
      logger.info(
        `Relayed study ${uid}: ${outcome.delivered} objects via ${this.retrieval.name} -> ${this.delivery.name}`
      );
    } catch (error) {
      record.state = StudyState.FAILED;
      record.lastError = errorMessage(error);
      logger.warn(`Relay of study ${uid} failed (attempt ${record.attemptCount}), will retry`, {
        error: record.lastError,
      });
    } finally {
      this.inFlight.delete(uid);
    }

    return { ...record };
  }

  /**
   * Bring retrieved content into the destination's wire form. Zero objects
   * is a failure in either direction.
   */
  transcode(retrieved: RetrievedStudy): DeliveryPayload {
    if (this.delivery.wireForm === 'multipart') {
      if (retrieved.kind === 'multipart') {
        const boundary = boundaryFromContentType(retrieved.contentType);
        const objectCount = boundary ? split(retrieved.body, boundary).length : 0;
        assertObjects(objectCount);
        return { kind: 'multipart', body: retrieved.body, contentType: retrieved.contentType, objectCount };
      }
      assertObjects(retrieved.objects.length);
      const joined = join(retrieved.objects);
      return {
        kind: 'multipart',
        body: joined.body,
        contentType: joined.contentType,
        objectCount: retrieved.objects.length,
      };
    }

    if (retrieved.kind === 'multipart') {
      const boundary = boundaryFromContentType(retrieved.contentType);
      const objects = boundary ? split(retrieved.body, boundary) : [];
      assertObjects(objects.length);
      return { kind: 'objects', objects };
    }
    assertObjects(retrieved.objects.length);
    return { kind: 'objects', objects: retrieved.objects, storedPaths: retrieved.storedPaths };
  }
}

function assertObjects(count: number): void {
  if (count === 0) {
    throw new DeliveryError('Retrieved study contains no objects', 0, 0);
  }
}

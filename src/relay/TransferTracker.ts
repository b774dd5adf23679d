/**
 * Transfer Tracker
 *
 * Counts the objects the listener receives for a study while a C-MOVE for
 * that study is in progress, and lets the mover wait until the count is
 * complete or arrivals have gone quiet. All state changes go through these
 * methods.
 */

import { RelayError } from '../errors.js';
import { getLogger, registerComponent } from '../logging/index.js';

registerComponent('transfer-tracker', 'Per-study inbound object counters');
const logger = getLogger('transfer-tracker');

export interface TransferOutcome {
  success: boolean;
  sopInstanceUID?: string;
  /** Where the object was written */
  path?: string;
  error?: string;
}

export interface TransferSnapshot {
  received: number;
  written: number;
  failed: number;
  paths: string[];
  lastArrival?: number;
}

export interface WaitOptions {
  /** Resolve as soon as this many objects arrived */
  expected?: number;
  /** Resolve after this long without an arrival */
  quietMs: number;
  /** Resolve after this long regardless */
  timeoutMs: number;
}

export interface WaitResult {
  reason: 'expected' | 'quiet' | 'timeout';
  snapshot: TransferSnapshot;
}

interface TrackedStudy {
  snapshot: TransferSnapshot;
  listeners: Set<() => void>;
}

export class TransferTracker {
  private readonly studies = new Map<string, TrackedStudy>();
  private unsolicited = 0;

  /**
   * Start (or restart) counting for a study
   */
  begin(studyInstanceUID: string): void {
    this.studies.set(studyInstanceUID, {
      snapshot: { received: 0, written: 0, failed: 0, paths: [] },
      listeners: new Set(),
    });
  }

  isTracking(studyInstanceUID: string): boolean {
    return this.studies.has(studyInstanceUID);
  }

  /**
   * Record one arrival. Returns false when nobody tracks the study.
   */
  record(studyInstanceUID: string | undefined, outcome: TransferOutcome): boolean {
    const study = studyInstanceUID === undefined ? undefined : this.studies.get(studyInstanceUID);
    if (!study) {
      this.unsolicited++;
      logger.debug(`Unsolicited object ${outcome.sopInstanceUID ?? ''} for study ${studyInstanceUID ?? 'Unknown'}`);
      return false;
    }

    const { snapshot } = study;
    snapshot.received++;
    if (outcome.success) {
      snapshot.written++;
      if (outcome.path) {
        snapshot.paths.push(outcome.path);
      }
    } else {
      snapshot.failed++;
    }
    snapshot.lastArrival = Date.now();

    for (const listener of study.listeners) {
      listener();
    }
    return true;
  }

  snapshot(studyInstanceUID: string): TransferSnapshot | undefined {
    const study = this.studies.get(studyInstanceUID);
    return study ? copy(study.snapshot) : undefined;
  }

  /**
   * Stop counting; returns the final counts
   */
  end(studyInstanceUID: string): TransferSnapshot | undefined {
    const snapshot = this.snapshot(studyInstanceUID);
    this.studies.delete(studyInstanceUID);
    return snapshot;
  }

  get unsolicitedCount(): number {
    return this.unsolicited;
  }

  /**
   * Wait until `expected` objects arrived, no object arrived for `quietMs`,
   * or `timeoutMs` passed, whichever comes first.
   */
  waitFor(studyInstanceUID: string, options: WaitOptions): Promise<WaitResult> {
    const study = this.studies.get(studyInstanceUID);
    if (!study) {
      return Promise.reject(new RelayError(`Study ${studyInstanceUID} is not being tracked`));
    }

    const reached = () => options.expected !== undefined && study.snapshot.received >= options.expected;
    if (reached()) {
      return Promise.resolve({ reason: 'expected', snapshot: copy(study.snapshot) });
    }

    return new Promise((resolve) => {
      let quietTimer: NodeJS.Timeout | undefined;

      const finish = (reason: WaitResult['reason']) => {
        clearTimeout(quietTimer);
        clearTimeout(overallTimer);
        study.listeners.delete(onArrival);
        resolve({ reason, snapshot: copy(study.snapshot) });
      };
      const armQuietTimer = () => {
        clearTimeout(quietTimer);
        quietTimer = setTimeout(() => finish('quiet'), options.quietMs);
      };
      const onArrival = () => {
        if (reached()) {
          finish('expected');
        } else {
          armQuietTimer();
        }
      };
      const overallTimer = setTimeout(() => finish('timeout'), options.timeoutMs);

      study.listeners.add(onArrival);
      armQuietTimer();
    });
  }
}

function copy(snapshot: TransferSnapshot): TransferSnapshot {
  return { ...snapshot, paths: [...snapshot.paths] };
}

/**
 * Study Discovery Poller
 *
 * Idle -> Querying -> Diffing -> Idle, once per poll interval. A failed
 * query counts as zero studies and never ends the loop. stop() is checked
 * once per cycle and between studies; the study in progress finishes.
 */

import { errorMessage, toError } from '../errors.js';
import { getLogger, registerComponent } from '../logging/index.js';
import type { StudySource } from './StudySource.js';
import type { StudySummary } from './types.js';

registerComponent('poller', 'Study discovery loop');
const logger = getLogger('poller');

export enum PollerState {
  IDLE = 'Idle',
  QUERYING = 'Querying',
  DIFFING = 'Diffing',
}

/**
 * Decides whether a listed study is new. The relay engine implements it
 * (ledger, in-flight and backoff checks).
 */
export interface StudyFilter {
  isEligible(studyInstanceUID: string): boolean;
}

export type StudyHandler = (study: StudySummary) => Promise<unknown>;

export interface CycleResult {
  /** Studies the source listed */
  listed: number;
  /** Studies handed to the handler */
  emitted: number;
  queryFailed: boolean;
}

export interface StudyPollerOptions {
  pollIntervalMs: number;
}

export class StudyPoller {
  private state: PollerState = PollerState.IDLE;
  private stopped = false;
  private loop: Promise<void> | null = null;
  private wake: (() => void) | null = null;

  constructor(
    private readonly source: StudySource,
    private readonly filter: StudyFilter,
    private readonly handler: StudyHandler,
    private readonly options: StudyPollerOptions
  ) {}

  getState(): PollerState {
    return this.state;
  }

  isRunning(): boolean {
    return this.loop !== null;
  }

  /**
   * One discovery cycle
   */
  async runOnce(): Promise<CycleResult> {
    this.state = PollerState.QUERYING;
    let studies: StudySummary[] = [];
    let queryFailed = false;
    try {
      studies = await this.source.listStudies();
    } catch (error) {
      queryFailed = true;
      logger.warn(`Study query on ${this.source.description} failed`, { error: errorMessage(error) });
    }

    this.state = PollerState.DIFFING;
    const seen = new Set<string>();
    const fresh = studies.filter((study) => {
      if (seen.has(study.studyInstanceUID)) {
        return false;
      }
      seen.add(study.studyInstanceUID);
      return this.filter.isEligible(study.studyInstanceUID);
    });
    if (fresh.length > 0) {
      logger.info(`${fresh.length} new of ${studies.length} studies on ${this.source.description}`);
    } else {
      logger.debug(`No new studies (${studies.length} listed)`);
    }

    let emitted = 0;
    try {
      for (const study of fresh) {
        if (this.stopped) {
          break;
        }
        emitted++;
        try {
          await this.handler(study);
        } catch (error) {
          logger.error(`Handler failed for study ${study.studyInstanceUID}`, toError(error));
        }
      }
    } finally {
      this.state = PollerState.IDLE;
    }

    return { listed: studies.length, emitted, queryFailed };
  }

  /**
   * Start the loop in the background; it runs until stop()
   */
  start(): void {
    if (this.loop) {
      return;
    }
    this.stopped = false;
    logger.info(`Polling ${this.source.description} every ${this.options.pollIntervalMs} ms`);
    this.loop = this.run()
      .catch((error: unknown) => logger.error('Poller loop ended unexpectedly', toError(error)))
      .finally(() => {
        this.loop = null;
      });
  }

  /**
   * Ask the loop to end and wait for the current cycle to finish
   */
  async stop(): Promise<void> {
    this.stopped = true;
    this.wake?.();
    if (this.loop) {
      await this.loop;
    }
  }

  private async run(): Promise<void> {
    while (!this.stopped) {
      await this.runOnce();
      if (this.stopped) {
        break;
      }
      await this.sleep(this.options.pollIntervalMs);
    }
    logger.info('Poller stopped');
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }
}

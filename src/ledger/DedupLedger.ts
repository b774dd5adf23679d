/**
 * Dedup Ledger
 *
 * Durable set of Study Instance UIDs already delivered. Persisted as a JSON
 * array, loaded once at startup and rewritten whole on every commit. After a
 * failed write the in-memory set stays authoritative.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { getLogger, registerComponent } from '../logging/index.js';
import { errorMessage, toError } from '../errors.js';
import { AsyncMutex } from '../util/AsyncMutex.js';

registerComponent('dedup-ledger', 'Delivered-study ledger');
const logger = getLogger('dedup-ledger');

export const DEFAULT_LEDGER_FILENAME = '.processed_studies.json';

const LedgerFileSchema = z.array(z.string());

export class DedupLedger {
  private readonly uids = new Set<string>();
  private readonly mutex = new AsyncMutex();

  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  get size(): number {
    return this.uids.size;
  }

  /**
   * Load persisted UIDs and merge them into the in-memory set. A missing,
   * unreadable or malformed file adds nothing; startup is never blocked.
   * UIDs already in memory stay, so queries during a load keep answering.
   */
  async load(): Promise<Set<string>> {
    return this.mutex.runExclusive(async () => {
      const persisted = await this.readFile();
      for (const uid of persisted) {
        this.uids.add(uid);
      }
      if (persisted.length > 0) {
        logger.info(`Loaded ${persisted.length} delivered studies from ${this.filePath}`);
      }
      return this.values();
    });
  }

  private async readFile(): Promise<string[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isNotFound(error)) {
        logger.info(`No ledger at ${this.filePath}, starting empty`);
      } else {
        logger.warn(`Cannot read ledger ${this.filePath}, starting empty`, {
          error: errorMessage(error),
        });
      }
      return [];
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      logger.warn(`Ledger ${this.filePath} is not valid JSON, starting empty`, {
        error: errorMessage(error),
      });
      return [];
    }

    const result = LedgerFileSchema.safeParse(parsed);
    if (!result.success) {
      logger.warn(`Ledger ${this.filePath} is not an array of UIDs, starting empty`);
      return [];
    }
    return result.data;
  }

  contains(uid: string): boolean {
    return this.uids.has(uid);
  }

  values(): Set<string> {
    return new Set(this.uids);
  }

  /**
   * Add a UID and persist the whole set. Resolves false when the file could
   * not be written; the in-memory set keeps the UID either way.
   */
  async commit(uid: string): Promise<boolean> {
    this.uids.add(uid);
    return this.mutex.runExclusive(() => this.persist());
  }

  private async persist(): Promise<boolean> {
    const snapshot = JSON.stringify([...this.uids], null, 2);
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tempPath, snapshot, 'utf8');
      await fs.rename(tempPath, this.filePath);
      logger.debug(`Ledger persisted (${this.uids.size} studies)`);
      return true;
    } catch (error) {
      logger.error(`Failed to persist ledger ${this.filePath}`, toError(error));
      return false;
    }
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Checkpoint Store
 *
 * The ledger of archived slugs: loaded wholesale before a run, persisted
 * wholesale after it. A slug is only ever added after a successful scrape,
 * so failed articles are retried on the next run.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { ArticleRef, CheckpointEntry, Ledger, SuccessfulScrape } from '../types';
import { CheckpointCorruptError, PersistenceError, toError } from '../errors';
import { createLogger, type Logger, type LoggerOptions } from '../logger';

// ============================================================================
// Types
// ============================================================================

export interface CheckpointStore {
  /** Never throws: a missing or unreadable ledger loads as empty */
  load(): Promise<Ledger>;
  /** Never throws: returns false when the ledger could not be persisted */
  save(ledger: Ledger): Promise<boolean>;
}

export interface ScrapePlan {
  toScrape: ArticleRef[];
  /** Ledger the run should extend; empty when forced */
  ledger: Ledger;
  /** Articles skipped because they are already checkpointed */
  cached: number;
}

// Older ledgers spell the timestamp scraped_at
export const LedgerEntrySchema = z
  .object({
    title: z.string(),
    url: z.string(),
    date: z.string().default(''),
    scrapedAt: z.string().optional(),
    scraped_at: z.string().optional(),
  })
  .transform(({ scrapedAt, scraped_at, ...entry }): CheckpointEntry => ({
    ...entry,
    scrapedAt: scrapedAt ?? scraped_at ?? '',
  }));

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ============================================================================
// File store
// ============================================================================

/**
 * JSON file ledger. Saves go to a sibling temp file that is renamed over the
 * old one, so an interrupted save leaves the previous ledger intact.
 */
export class FileCheckpointStore implements CheckpointStore {
  private readonly filePath: string;
  private readonly log: Logger;

  constructor(filePath: string, options: { logger?: LoggerOptions } = {}) {
    this.filePath = filePath;
    this.log = createLogger('Checkpoint', options.logger);
  }

  async load(): Promise<Ledger> {
    if (!fs.existsSync(this.filePath)) {
      return {};
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
    } catch (error) {
      this.warnCorrupt(`could not read checkpoint: ${toError(error).message}`, toError(error));
      return {};
    }

    if (!isRecord(raw)) {
      this.warnCorrupt('could not parse checkpoint: expected an object of entries');
      return {};
    }

    // Entry by entry so slugs such as __proto__ stay ordinary keys
    const entries: Array<[string, CheckpointEntry]> = [];
    for (const [slug, value] of Object.entries(raw)) {
      const parsed = LedgerEntrySchema.safeParse(value);
      if (!parsed.success) {
        const first = parsed.error.issues[0];
        this.warnCorrupt(`could not parse checkpoint: ${[slug, ...first.path].join('.')}: ${first.message}`);
        return {};
      }
      entries.push([slug, parsed.data]);
    }

    return Object.fromEntries(entries);
  }

  async save(ledger: Ledger): Promise<boolean> {
    const tempPath = `${this.filePath}.tmp`;

    try {
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(tempPath, JSON.stringify(ledger, null, 2) + '\n', 'utf-8');
      fs.renameSync(tempPath, this.filePath);
      return true;
    } catch (error) {
      const failure = new PersistenceError(`could not save checkpoint: ${toError(error).message}`, {
        path: this.filePath,
        target: 'checkpoint',
        cause: toError(error),
      });
      this.log.warn(failure.message);
      if (fs.existsSync(tempPath)) {
        fs.rmSync(tempPath, { force: true });
      }
      return false;
    }
  }

  private warnCorrupt(message: string, cause?: Error): void {
    const corrupt = new CheckpointCorruptError(message, { path: this.filePath, cause });
    this.log.warn(`${corrupt.message} (starting fresh)`);
  }
}

// ============================================================================
// Memory store
// ============================================================================

export class MemoryCheckpointStore implements CheckpointStore {
  private ledger: Ledger;
  saveCount = 0;

  constructor(initial: Ledger = {}) {
    this.ledger = structuredClone(initial);
  }

  async load(): Promise<Ledger> {
    return structuredClone(this.ledger);
  }

  async save(ledger: Ledger): Promise<boolean> {
    this.ledger = structuredClone(ledger);
    this.saveCount++;
    return true;
  }

  snapshot(): Ledger {
    return structuredClone(this.ledger);
  }
}

// ============================================================================
// Merge rules
// ============================================================================

/**
 * Forced: scrape everything against an empty ledger (full rebuild).
 * Otherwise: scrape the slugs the ledger does not know, in listing order.
 * Checkpointed slugs are never re-scraped incrementally, even if the remote
 * content changed.
 */
export function planScrape(all: ArticleRef[], ledger: Ledger, force: boolean): ScrapePlan {
  if (force) {
    return { toScrape: [...all], ledger: {}, cached: 0 };
  }

  const toScrape = all.filter(ref => !Object.prototype.hasOwnProperty.call(ledger, ref.slug));
  return { toScrape, ledger, cached: all.length - toScrape.length };
}

/**
 * Return a new ledger with one entry per successful scrape, stamped `now`
 */
export function recordResults(ledger: Ledger, results: Iterable<SuccessfulScrape>, now: Date): Ledger {
  const scrapedAt = now.toISOString();
  const added = Array.from(results, (result): [string, CheckpointEntry] => [
    result.slug,
    { title: result.title, url: result.url, date: result.date ?? '', scrapedAt },
  ]);

  return Object.fromEntries([...Object.entries(ledger), ...added]);
}

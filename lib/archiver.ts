/**
 * High-level API: one archive run
 *
 * discover → plan against the ledger → scrape new articles → write the
 * archive → extend and save the ledger
 */

import type { OnProgressCallback, PageFetcher, WriteMode } from './types';
import { archivePath, checkpointPath, listingUrl, resolveConfig, type ArchiverConfig } from './config';
import { NoContentFoundError, PersistenceError } from './errors';
import { createLogger, type LoggerOptions } from './logger';
import { createPageFetcher } from './web-scrapers/page-fetcher';
import { ListingDiscoverer } from './web-scrapers/listing-discoverer';
import { ArticleExtractor } from './web-scrapers/article-extractor';
import { scrapeAll } from './batch';
import { FileCheckpointStore, planScrape, recordResults, type CheckpointStore } from './checkpoint';
import { ArchiveWriter } from './archive/archive-writer';

export interface RunArchiveOptions {
  /** Defaults to resolveConfig() (defaults + ARCHIVER_* environment) */
  config?: ArchiverConfig;
  /** Re-scrape everything and rebuild the archive (default: false) */
  force?: boolean;
  /** Defaults to a real HTTP fetcher built from config */
  fetcher?: PageFetcher;
  /** Defaults to the JSON ledger in the output directory */
  store?: CheckpointStore;
  onProgress?: OnProgressCallback;
  logger?: LoggerOptions;
  /** Clock for checkpoint timestamps */
  now?: () => Date;
}

export interface RunSummary {
  /** Undefined when nothing needed scraping */
  mode?: WriteMode;
  discovered: number;
  toScrape: number;
  scraped: number;
  failed: number;
  written: number;
  checkpointSaved: boolean;
  upToDate: boolean;
}

/**
 * Run the archive builder once.
 *
 * Rejects with FatalDiscoveryError when the listing is unreachable and with
 * NoContentFoundError when it lists no articles. Per-article failures are
 * logged, left out of the ledger and retried by the next run.
 *
 * @example
 * ```typescript
 * const summary = await runArchive({ force: process.argv.includes('--force') });
 * console.log(`${summary.written} articles written`);
 * ```
 */
export async function runArchive(options: RunArchiveOptions = {}): Promise<RunSummary> {
  const config = options.config ?? resolveConfig();
  const force = options.force ?? false;
  const now = options.now ?? (() => new Date());
  const log = createLogger('Archiver', options.logger);

  const fetcher = options.fetcher ?? createPageFetcher({ timeout: config.timeoutMs, userAgent: config.userAgent });
  const store = options.store ?? new FileCheckpointStore(checkpointPath(config), { logger: options.logger });
  const writer = new ArchiveWriter({
    archivePath: archivePath(config),
    title: config.archiveTitle,
    listingUrl: listingUrl(config),
    logger: options.logger,
  });

  const loaded = await store.load();

  const discoverer = new ListingDiscoverer({
    siteOrigin: config.siteOrigin,
    listingPath: config.listingPath,
    fetcher,
    maxPages: config.maxPages,
    logger: options.logger,
  });
  const all = await discoverer.discover();

  if (all.length === 0) {
    throw new NoContentFoundError(`No articles found at ${listingUrl(config)}`, { url: listingUrl(config) });
  }

  const plan = planScrape(all, loaded, force);

  const summary: RunSummary = {
    discovered: all.length,
    toScrape: plan.toScrape.length,
    scraped: 0,
    failed: 0,
    written: 0,
    checkpointSaved: false,
    upToDate: false,
  };

  if (plan.toScrape.length === 0) {
    log.info('✅ All articles up to date.');
    return { ...summary, upToDate: true };
  }

  if (force) {
    log.info(`Force mode: re-scraping all ${plan.toScrape.length} articles.`);
  } else {
    log.info(`Scraping ${plan.toScrape.length} new articles (${plan.cached} already cached)...`);
  }

  const extractor = new ArticleExtractor({
    fetcher,
    listingPath: config.listingPath,
    vendorName: config.vendorName,
    minContentHtmlLength: config.minContentHtmlLength,
  });

  const scraped = await scrapeAll(plan.toScrape, {
    extractor,
    concurrency: config.workers,
    onProgress: options.onProgress,
    logger: options.logger,
  });

  summary.scraped = scraped.size;
  summary.failed = plan.toScrape.length - scraped.size;

  const mode = writer.resolveWriteMode(force);
  summary.mode = mode;

  if (mode === 'rebuild' && !force && Object.keys(plan.ledger).length > 0) {
    log.warn(
      `Archive ${writer.filePath} is missing but ${Object.keys(plan.ledger).length} articles are checkpointed; ` +
      `they will not appear in the rebuilt archive. Run with --force to rebuild everything.`
    );
  }

  try {
    summary.written = writer.write(mode, all, scraped).written;
  } catch (error) {
    if (!(error instanceof PersistenceError)) throw error;
    // Leave the ledger untouched so these articles are scraped again next run
    log.error(`${error.message}; checkpoint not updated`);
    return summary;
  }

  const ledger = recordResults(plan.ledger, scraped.values(), now());
  summary.checkpointSaved = await store.save(ledger);

  log.info(`Done! ${summary.written} written, ${summary.failed} failed.`);
  return summary;
}


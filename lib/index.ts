/**
 * blog-archiver
 *
 * Builds a Markdown archive of every article on a paginated blog listing and
 * keeps it current incrementally: only articles missing from the checkpoint
 * ledger are fetched on later runs.
 *
 * @example
 * ```typescript
 * import { runArchive, resolveConfig } from 'blog-archiver';
 *
 * const config = resolveConfig({ siteOrigin: 'https://example.com', listingPath: '/blog' });
 * const summary = await runArchive({ config });
 * console.log(`${summary.scraped} new, ${summary.failed} failed`);
 * ```
 */

// ============================================================================
// HIGH-LEVEL API
// ============================================================================

export { runArchive, type RunArchiveOptions, type RunSummary } from './archiver';

export {
  ArchiverConfigSchema,
  resolveConfig,
  configFromEnv,
  listingUrl,
  archivePath,
  checkpointPath,
  type ArchiverConfig,
  type ArchiverConfigInput
} from './config';

// ============================================================================
// MODULAR COMPONENTS
// ============================================================================

export { fetchPage, createPageFetcher, type FetchPageOptions } from './web-scrapers/page-fetcher';

export {
  ListingDiscoverer,
  type ListingDiscovererConfig,
  type ListingPage
} from './web-scrapers/listing-discoverer';

export {
  ArticleExtractor,
  CONTENT_SELECTORS,
  type ArticleExtractorConfig
} from './web-scrapers/article-extractor';

export { scrapeAll, type ArticleSource, type ScrapeAllOptions } from './batch';

export {
  FileCheckpointStore,
  MemoryCheckpointStore,
  LedgerEntrySchema,
  planScrape,
  recordResults,
  type CheckpointStore,
  type ScrapePlan
} from './checkpoint';

export {
  ArchiveWriter,
  formatSection,
  type ArchiveWriterConfig,
  type WriteReport
} from './archive/archive-writer';

export {
  parseArchive,
  mostRecentPostDate,
  isArchiveStale,
  type ArchiveEntry,
  type StalenessInput
} from './archive/archive-index';

// Formatters
export { htmlToMarkdown } from './formatters/html-to-markdown';
export { CLEANUP_PASSES, cleanMarkdown, type CleanupContext, type CleanupPass } from './formatters/markdown-cleaner';
export { formatLongDate, parseArchiveDate, LONG_FORM_DATE } from './formatters/dates';

export { createLogger, silentLogger, type Logger, type LoggerOptions, type LogSink } from './logger';

// ============================================================================
// TYPES & ERRORS
// ============================================================================

export type {
  ArticleRef,
  ScrapeResult,
  SuccessfulScrape,
  FailedScrape,
  CheckpointEntry,
  Ledger,
  WriteMode,
  ScrapeProgress,
  OnProgressCallback,
  PageFetcher
} from './types';

export {
  ArchiverError,
  RequestTimeoutError,
  InvalidUrlError,
  ContentExtractionError,
  FatalDiscoveryError,
  PartialDiscoveryError,
  NoContentFoundError,
  CheckpointCorruptError,
  PersistenceError,
  ConfigError,
  isArchiverError,
  isAbortError,
  describeError
} from './errors';

/**
 * Batch Scraping Module
 *
 * Runs article extraction across a fixed-size worker pool. Individual
 * failures are logged and dropped; they never abort sibling tasks.
 */

import pLimit from 'p-limit';
import type { ArticleRef, OnProgressCallback, ScrapeResult, SuccessfulScrape } from '../types';
import { createLogger, type LoggerOptions } from '../logger';
import { describeError, toError } from '../errors';

// ============================================================================
// Types
// ============================================================================

export interface ArticleSource {
  extract(ref: ArticleRef): Promise<ScrapeResult>;
}

export interface ScrapeAllOptions {
  extractor: ArticleSource;
  /** Max concurrent extractions (default: 10) */
  concurrency?: number;
  /** Called once per finished article, in completion order */
  onProgress?: OnProgressCallback;
  logger?: LoggerOptions;
}

// ============================================================================
// Batch Processor
// ============================================================================

/**
 * Extract every ref with bounded concurrency.
 *
 * @returns successes keyed by slug; iteration order is completion order,
 * callers re-impose listing order
 *
 * @example
 * ```typescript
 * const scraped = await scrapeAll(refs, {
 *   extractor,
 *   concurrency: 10,
 *   onProgress: (p) => console.log(`[${p.completed}/${p.total}] ${p.slug}`)
 * });
 * ```
 */
export async function scrapeAll(
  refs: ArticleRef[],
  options: ScrapeAllOptions
): Promise<Map<string, SuccessfulScrape>> {
  const { extractor, concurrency = 10, onProgress } = options;
  const log = createLogger('Scraper', options.logger);

  // One task per slug even if the caller passes duplicates
  const dispatched = new Set<string>();
  const unique = refs.filter(ref => {
    if (dispatched.has(ref.slug)) return false;
    dispatched.add(ref.slug);
    return true;
  });

  const limit = pLimit(concurrency);
  const total = unique.length;
  let completed = 0;

  const results = await Promise.all(
    unique.map(ref =>
      limit(async (): Promise<ScrapeResult> => {
        let result: ScrapeResult;
        try {
          result = await extractor.extract(ref);
        } catch (error) {
          result = { ok: false, slug: ref.slug, url: ref.url, error: toError(error) };
        }
        completed++;

        if (result.ok) {
          log.info(`  [${completed}/${total}] ${ref.slug}`);
        } else {
          log.error(`  [${completed}/${total}] ${ref.slug}: ${result.error.message}`);
        }

        if (onProgress) {
          try {
            onProgress({ completed, total, slug: ref.slug, ok: result.ok });
          } catch (error) {
            log.warn(`Progress callback failed: ${describeError(error)}`);
          }
        }

        return result;
      })
    )
  );

  const scraped = new Map<string, SuccessfulScrape>();
  for (const result of results) {
    if (result.ok) {
      scraped.set(result.slug, result);
    }
  }

  log.info(`📖 Batch complete: ${scraped.size}/${total} successful`);
  return scraped;
}

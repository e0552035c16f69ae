import * as cheerio from 'cheerio';
import type { ArticleRef, PageFetcher } from '../types';
import { FatalDiscoveryError, PartialDiscoveryError, toError } from '../errors';
import { createLogger, type Logger, type LoggerOptions } from '../logger';
import { collapseWhitespace } from '../formatters/markdown-cleaner';

export interface ListingDiscovererConfig {
  /** Site origin without trailing slash, e.g. https://example.com */
  siteOrigin: string;
  /** Listing path, e.g. /blog */
  listingPath: string;
  fetcher: PageFetcher;
  /** Hard stop for pagination (default: 200) */
  maxPages?: number;
  logger?: LoggerOptions;
}

export interface ListingPage {
  /** Article links on this page, in document order, before cross-page dedupe */
  articles: ArticleRef[];
  hasNextPage: boolean;
}

const NEXT_PAGE_SELECTOR = 'button[aria-label="Go to next page"]';

/**
 * Walks the paginated listing sequentially and collects article links in
 * first-seen order. That order is the archive's canonical order.
 */
export class ListingDiscoverer {
  private readonly origin: string;
  private readonly listingPath: string;
  private readonly fetcher: PageFetcher;
  private readonly maxPages: number;
  private readonly log: Logger;

  constructor(config: ListingDiscovererConfig) {
    this.origin = config.siteOrigin.replace(/\/+$/, '');
    this.listingPath = config.listingPath;
    this.fetcher = config.fetcher;
    this.maxPages = config.maxPages ?? 200;
    this.log = createLogger('Discoverer', config.logger);
  }

  listingPageUrl(page: number): string {
    const base = this.origin + this.listingPath;
    return page > 1 ? `${base}?page=${page}` : base;
  }

  /**
   * Discover every article on the listing.
   * Throws FatalDiscoveryError when page 1 cannot be fetched; later page
   * failures end pagination early and keep what was found.
   */
  async discover(): Promise<ArticleRef[]> {
    const articles: ArticleRef[] = [];
    const seen = new Set<string>();

    this.log.info('📚 Fetching listing pages...');

    for (let page = 1; page <= this.maxPages; page++) {
      const url = this.listingPageUrl(page);
      this.log.info(`  Fetching page ${page}...`);

      let listing: ListingPage;
      try {
        const html = await this.fetcher(url);
        listing = this.parseListingPage(html);
      } catch (error) {
        if (page === 1) {
          throw new FatalDiscoveryError(`Listing page 1 unavailable: ${toError(error).message}`, {
            url,
            cause: toError(error),
          });
        }
        const partial = new PartialDiscoveryError(
          `Listing page ${page} failed, continuing with ${articles.length} articles: ${toError(error).message}`,
          { url, page, articlesFound: articles.length, cause: toError(error) }
        );
        this.log.warn(partial.message);
        break;
      }

      for (const article of listing.articles) {
        if (seen.has(article.slug)) continue;
        seen.add(article.slug);
        articles.push(article);
      }

      if (!listing.hasNextPage) break;

      if (page === this.maxPages) {
        this.log.warn(`Stopped after ${this.maxPages} listing pages`);
      }
    }

    this.log.info(`Found ${articles.length} articles.`);
    return articles;
  }

  /**
   * Extract article links and the pagination state from one listing page
   */
  parseListingPage(html: string): ListingPage {
    const $ = cheerio.load(html);
    const prefix = `${this.listingPath}/`;
    const articles: ArticleRef[] = [];
    const onPage = new Set<string>();

    $(`a[href^="${prefix}"]`).each((_, element) => {
      const href = $(element).attr('href') ?? '';
      if (href.includes('/category/')) return;

      const slug = href.slice(prefix.length);
      if (!slug || slug.includes('?') || onPage.has(slug)) return;
      onPage.add(slug);

      const title = collapseWhitespace($(element).text()) || slug;
      articles.push({ title, url: this.origin + href, slug });
    });

    const nextButton = $(NEXT_PAGE_SELECTOR).first();
    const hasNextPage = nextButton.length > 0 && nextButton.attr('disabled') === undefined;

    return { articles, hasNextPage };
  }
}

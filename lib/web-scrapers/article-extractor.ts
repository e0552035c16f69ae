import * as cheerio from 'cheerio';
import type { ArticleRef, PageFetcher, ScrapeResult, SuccessfulScrape } from '../types';
import { ContentExtractionError, isArchiverError, toError } from '../errors';
import { htmlToMarkdown } from '../formatters/html-to-markdown';
import { cleanMarkdown } from '../formatters/markdown-cleaner';
import { formatLongDate, LONG_FORM_DATE } from '../formatters/dates';
import { collapseWhitespace } from '../formatters/markdown-cleaner';

type CheerioDocument = ReturnType<typeof cheerio.load>;

export interface ArticleExtractorConfig {
  fetcher: PageFetcher;
  listingPath: string;
  vendorName: string;
  /** Candidate regions at or below this HTML length are rejected (default: 100) */
  minContentHtmlLength?: number;
}

// Tried in order; the first non-trivial match wins, <body> is the last resort
export const CONTENT_SELECTORS = [
  'article',
  '.post-content',
  '.blog-content',
  '.article-content',
  'main',
  '[role="main"]',
];

const BOILERPLATE_SELECTORS = 'nav, header, footer, script, style';

/**
 * Fetches one article and turns it into cleaned Markdown.
 * `extract` never rejects: every failure comes back as a FailedScrape.
 */
export class ArticleExtractor {
  private readonly fetcher: PageFetcher;
  private readonly listingPath: string;
  private readonly vendorName: string;
  private readonly minContentHtmlLength: number;

  constructor(config: ArticleExtractorConfig) {
    this.fetcher = config.fetcher;
    this.listingPath = config.listingPath;
    this.vendorName = config.vendorName;
    this.minContentHtmlLength = config.minContentHtmlLength ?? 100;
  }

  async extract(ref: ArticleRef): Promise<ScrapeResult> {
    let html: string;
    try {
      html = await this.fetcher(ref.url);
    } catch (error) {
      const cause = toError(error);
      return {
        ok: false,
        slug: ref.slug,
        url: ref.url,
        error: isArchiverError(cause)
          ? cause
          : new ContentExtractionError(cause.message, { url: ref.url, phase: 'fetch', cause }),
      };
    }

    try {
      return this.extractFromHtml(ref, html);
    } catch (error) {
      return { ok: false, slug: ref.slug, url: ref.url, error: toError(error) };
    }
  }

  /**
   * Resolve title, date and content region from raw article HTML.
   * Throws ContentExtractionError when no content can be converted.
   */
  extractFromHtml(ref: ArticleRef, html: string): SuccessfulScrape {
    const $ = cheerio.load(html);

    // Metadata is read before boilerplate stripping removes headers holding <time>
    const title = this.resolveTitle($, ref);
    const date = this.resolvePublishDate($);
    const contentHtml = this.resolveContentHtml($);

    if (!contentHtml.trim()) {
      throw new ContentExtractionError('No content region found', { url: ref.url, phase: 'extract' });
    }

    let rawMarkdown: string;
    try {
      rawMarkdown = htmlToMarkdown(contentHtml);
    } catch (error) {
      throw new ContentExtractionError(`Markdown conversion failed: ${toError(error).message}`, {
        url: ref.url,
        phase: 'convert',
        cause: toError(error),
      });
    }

    const markdown = cleanMarkdown(rawMarkdown, {
      title,
      listingPath: this.listingPath,
      vendorName: this.vendorName,
    });

    return { ok: true, slug: ref.slug, title, url: ref.url, date, markdown };
  }

  resolveTitle($: CheerioDocument, ref: ArticleRef): string {
    return collapseWhitespace($('h1').first().text()) || ref.title;
  }

  resolveContentHtml($: CheerioDocument): string {
    for (const selector of CONTENT_SELECTORS) {
      const element = $(selector).first();
      if (element.length === 0) continue;

      element.find(BOILERPLATE_SELECTORS).remove();
      const content = element.html() ?? '';
      if (content.length > this.minContentHtmlLength) {
        return content;
      }
    }

    const body = $('body');
    body.find(BOILERPLATE_SELECTORS).remove();
    return body.html() ?? '';
  }

  /**
   * <time datetime> reformatted, then <time> text, then the first text
   * block that is exactly a long-form date
   */
  resolvePublishDate($: CheerioDocument): string | undefined {
    const time = $('time').first();
    if (time.length > 0) {
      const machineDate = time.attr('datetime');
      const formatted = machineDate ? formatLongDate(machineDate) : undefined;
      if (formatted) return formatted;

      const text = time.text().trim();
      if (text) return text;
      if (machineDate?.trim()) return machineDate.trim();
    }

    let found: string | undefined;
    $('p, div, span').each((_, element) => {
      const text = $(element).text().trim();
      if (LONG_FORM_DATE.test(text)) {
        found = text;
        return false;
      }
      return undefined;
    });

    return found;
  }
}

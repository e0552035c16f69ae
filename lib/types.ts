/**
 * Core types for the archive builder
 */

/**
 * One article discovered on the listing. Identity is `slug`.
 */
export interface ArticleRef {
  title: string;
  url: string;
  slug: string;
}

export interface SuccessfulScrape {
  ok: true;
  slug: string;
  title: string;
  url: string;
  date?: string; // Long-form publish date, e.g. "March 5, 2024"
  markdown: string; // Cleaned Markdown body
}

export interface FailedScrape {
  ok: false;
  slug: string;
  url: string;
  error: Error;
}

/**
 * Outcome of extracting exactly one ArticleRef; never partially populated
 */
export type ScrapeResult = SuccessfulScrape | FailedScrape;

export interface CheckpointEntry {
  title: string;
  url: string;
  date: string; // "" when the article has no detectable date
  scrapedAt: string; // ISO-8601 UTC
}

/**
 * slug → entry for every article archived successfully at least once
 */
export type Ledger = Record<string, CheckpointEntry>;

export type WriteMode = 'rebuild' | 'append';

export interface ScrapeProgress {
  completed: number;
  total: number;
  slug: string;
  ok: boolean;
}

export type OnProgressCallback = (progress: ScrapeProgress) => void;

/** Single GET returning the response body */
export type PageFetcher = (url: string) => Promise<string>;

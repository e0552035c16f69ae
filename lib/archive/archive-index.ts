/**
 * Read-side helpers for the archive: re-parse sections into a lightweight
 * index and decide whether the archive needs a refresh.
 */

import type { Ledger } from '../types';
import { parseArchiveDate } from '../formatters/dates';

export interface ArchiveEntry {
  title: string;
  url: string;
  date: string;
  /** First 300 characters of the body */
  excerpt: string;
  content: string;
}

export const EXCERPT_LENGTH = 300;
export const DEFAULT_STALE_DAYS = 7;

const DAY_MS = 24 * 60 * 60 * 1000;

// ## Title\n\n*Source: URL | Date*\n\nContent\n\n---
const SECTION_PATTERN =
  /^## (.+?)\n\n\*Source: (https?:\/\/[^\s|]+?)(?:\s*\|\s*([^*]+))?\*\n\n([\s\S]*?)(?=\n\n---)/gm;

export function parseArchive(markdown: string): ArchiveEntry[] {
  const entries: ArchiveEntry[] = [];

  for (const match of markdown.matchAll(SECTION_PATTERN)) {
    const content = match[4].trim();
    entries.push({
      title: match[1].trim(),
      url: match[2].trim(),
      date: (match[3] ?? '').trim(),
      excerpt: content.slice(0, EXCERPT_LENGTH),
      content,
    });
  }

  return entries;
}

/**
 * Newest parseable publish date among checkpointed articles
 */
export function mostRecentPostDate(ledger: Ledger): Date | null {
  let mostRecent: Date | null = null;

  for (const entry of Object.values(ledger)) {
    if (!entry.date) continue;
    const parsed = parseArchiveDate(entry.date);
    if (parsed && (!mostRecent || parsed > mostRecent)) {
      mostRecent = parsed;
    }
  }

  return mostRecent;
}

export interface StalenessInput {
  archiveExists: boolean;
  ledger: Ledger;
  now?: Date;
  staleDays?: number;
}

/**
 * Stale when the archive is missing, nothing in the ledger is dated, or the
 * newest post is more than `staleDays` whole days old
 */
export function isArchiveStale(input: StalenessInput): boolean {
  const { archiveExists, ledger, now = new Date(), staleDays = DEFAULT_STALE_DAYS } = input;

  if (!archiveExists) return true;

  const mostRecent = mostRecentPostDate(ledger);
  if (!mostRecent) return true;

  const ageDays = Math.floor((now.getTime() - mostRecent.getTime()) / DAY_MS);
  return ageDays > staleDays;
}

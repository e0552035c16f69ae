/**
 * Markdown cleanup pipeline
 *
 * Ordered rewrites that strip site boilerplate from converted article
 * Markdown. Each pass is a pure function; running the whole pipeline on its
 * own output changes nothing.
 */

import { MONTH_PATTERN } from './dates';
import { escapeMarkdown } from './html-to-markdown';

export interface CleanupContext {
  /** Resolved article title; a `# {title}` heading is a duplicate */
  title: string;
  /** Listing path the breadcrumb links back to, e.g. /blog */
  listingPath: string;
  /** Company name used in the site's call-to-action blocks */
  vendorName: string;
}

export interface CleanupPass {
  name: string;
  apply: (markdown: string, context: CleanupContext) => string;
}

const DATE_LINE = new RegExp(`^(?:${MONTH_PATTERN}) \\d{1,2}, \\d{4}\\n+`, 'gm');
const SHARE_FOOTER = /\nShare this article[\s\S]*$/;
const RELATED_ARTICLES = /\nRelated articles\n[\s\S]*$/;
const GET_STARTED_TEASER = /^_Ready to get started[^\n]*(?:\n|$)/gm;
const PROXIED_IMAGE = /^!\[\]\(\/_next\/image\?url=[^\n]*\)\n/gm;
const EXCESS_BLANKS = /\n{3,}/g;

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Single spaces in place of the newlines and indentation of formatted HTML text */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function stripBreadcrumb(markdown: string, listingPath: string): string {
  const breadcrumb = new RegExp(`^\\[All Articles\\]\\(${escapeRegExp(listingPath)}\\)\\n+`, 'gm');
  return markdown.replace(breadcrumb, '');
}

export function stripDateLine(markdown: string): string {
  return markdown.replace(DATE_LINE, '');
}

/** Titles as plain text and as Turndown writes the same text in a heading */
export function stripDuplicateTitle(markdown: string, title: string): string {
  if (!title) return markdown;
  const forms = [...new Set([title, escapeMarkdown(title)])].map(escapeRegExp);
  const heading = new RegExp(`^# (?:${forms.join('|')})\\s*\\n+`, 'gm');
  return markdown.replace(heading, '');
}

export function stripShareFooter(markdown: string): string {
  return markdown.replace(SHARE_FOOTER, '');
}

export function stripRelatedArticles(markdown: string): string {
  return markdown.replace(RELATED_ARTICLES, '');
}

export function stripLearnMoreCta(markdown: string, vendorName: string): string {
  const cta = new RegExp(`\\n## Want to learn more about ${escapeRegExp(vendorName)}\\?[\\s\\S]*$`);
  return markdown.replace(cta, '');
}

export function stripVendorCta(markdown: string, vendorName: string): string {
  const cta = new RegExp(`\\n${escapeRegExp(vendorName)} provides [\\s\\S]*?\\[Get in touch\\][^\\n]*\\n`, 'g');
  return markdown.replace(cta, '');
}

export function stripGetStartedTeaser(markdown: string): string {
  return markdown.replace(GET_STARTED_TEASER, '');
}

export function stripProxiedImages(markdown: string): string {
  return markdown.replace(PROXIED_IMAGE, '');
}

export function collapseBlankLines(markdown: string): string {
  return markdown.replace(EXCESS_BLANKS, '\n\n');
}

// Order matters: structural removals first, blank-line collapse and trim last
export const CLEANUP_PASSES: readonly CleanupPass[] = [
  { name: 'breadcrumb', apply: (md, ctx) => stripBreadcrumb(md, ctx.listingPath) },
  { name: 'date-line', apply: md => stripDateLine(md) },
  { name: 'duplicate-title', apply: (md, ctx) => stripDuplicateTitle(md, ctx.title) },
  { name: 'share-footer', apply: md => stripShareFooter(md) },
  { name: 'related-articles', apply: md => stripRelatedArticles(md) },
  { name: 'learn-more-cta', apply: (md, ctx) => stripLearnMoreCta(md, ctx.vendorName) },
  { name: 'vendor-cta', apply: (md, ctx) => stripVendorCta(md, ctx.vendorName) },
  { name: 'get-started-teaser', apply: md => stripGetStartedTeaser(md) },
  { name: 'proxied-images', apply: md => stripProxiedImages(md) },
  { name: 'blank-lines', apply: md => collapseBlankLines(md) },
  { name: 'trim', apply: md => md.trim() },
];

export function cleanMarkdown(raw: string, context: CleanupContext): string {
  return CLEANUP_PASSES.reduce((markdown, pass) => pass.apply(markdown, context), raw);
}

/**
 * Unit tests for the Markdown cleanup pipeline.
 */

import { describe, it, expect } from 'vitest';
import {
  CLEANUP_PASSES,
  cleanMarkdown,
  collapseBlankLines,
  collapseWhitespace,
  stripBreadcrumb,
  stripDateLine,
  stripDuplicateTitle,
  stripGetStartedTeaser,
  stripLearnMoreCta,
  stripProxiedImages,
  stripRelatedArticles,
  stripShareFooter,
  stripVendorCta,
  type CleanupContext,
} from '../lib/formatters/markdown-cleaner';

const context: CleanupContext = { title: 'My Title', listingPath: '/blog', vendorName: 'Acme' };

describe('cleanup passes', () => {
  it('strips the breadcrumb link line', () => {
    expect(stripBreadcrumb('[All Articles](/blog)\n\nBody', '/blog')).toBe('Body');
  });

  it('keeps breadcrumbs pointing somewhere else', () => {
    expect(stripBreadcrumb('[All Articles](/news)\n\nBody', '/blog')).toBe('[All Articles](/news)\n\nBody');
  });

  it('strips standalone long-form date lines', () => {
    expect(stripDateLine('Intro\nMarch 5, 2024\n\nBody')).toBe('Intro\nBody');
  });

  it('keeps dates that are part of a sentence', () => {
    const text = 'Published on March 5, 2024\nBody';
    expect(stripDateLine(text)).toBe(text);
  });

  it('strips a heading that repeats the title exactly', () => {
    expect(stripDuplicateTitle('# My Title\n\nBody', 'My Title')).toBe('Body');
  });

  it('treats regex characters in the title literally', () => {
    expect(stripDuplicateTitle('# C++ (and more)?\n\nBody', 'C++ (and more)?')).toBe('Body');
    expect(stripDuplicateTitle('# C (and more)\n\nBody', 'C++ (and more)?')).toBe('# C (and more)\n\nBody');
  });

  it('matches the heading in the escaped form Turndown writes', () => {
    expect(stripDuplicateTitle('# Using my\\_var and \\[brackets\\]\n\nBody', 'Using my_var and [brackets]')).toBe('Body');
  });

  it('keeps lower-level headings with the same text', () => {
    expect(stripDuplicateTitle('## My Title\n\nBody', 'My Title')).toBe('## My Title\n\nBody');
  });

  it('strips the share block and everything after it', () => {
    expect(stripShareFooter('Body\n\nShare this article\n[Twitter](https://t.co)')).toBe('Body\n');
  });

  it('strips the related articles block and everything after it', () => {
    expect(stripRelatedArticles('Body\n\nRelated articles\n\n[Other](/blog/other)')).toBe('Body\n');
  });

  it('strips the learn-more call to action for the configured vendor', () => {
    expect(stripLearnMoreCta('Body\n\n## Want to learn more about Acme?\n\nContact us', 'Acme')).toBe('Body\n');
    expect(stripLearnMoreCta('Body\n\n## Want to learn more about Other?', 'Acme')).toBe(
      'Body\n\n## Want to learn more about Other?'
    );
  });

  it('strips the vendor promo paragraph through the get-in-touch link', () => {
    const text = 'Body\n\nAcme provides secure widgets.\nTalk to us. [Get in touch](/contact) today.\n\nTail';
    expect(stripVendorCta(text, 'Acme')).toBe('Body\n\nTail');
  });

  it('strips the ready-to-get-started teaser line', () => {
    expect(stripGetStartedTeaser('Body\n_Ready to get started? Try it._\nTail')).toBe('Body\nTail');
  });

  it('strips a teaser on the last line', () => {
    expect(stripGetStartedTeaser('Body\n\n_Ready to get started? Try it._')).toBe('Body\n\n');
  });

  it('keeps teaser wording that does not start the line', () => {
    const text = 'Body says _Ready to get started_ here\nTail';
    expect(stripGetStartedTeaser(text)).toBe(text);
  });

  it('strips proxied image lines', () => {
    expect(stripProxiedImages('Body\n![](/_next/image?url=%2Fa.png&w=640)\nTail')).toBe('Body\nTail');
  });

  it('keeps images with real sources', () => {
    const text = 'Body\n![](https://cdn.example.com/a.png)\nTail';
    expect(stripProxiedImages(text)).toBe(text);
  });

  it('collapses runs of blank lines to one', () => {
    expect(collapseBlankLines('A\n\n\n\nB\n\nC')).toBe('A\n\nB\n\nC');
  });
});

describe('collapseWhitespace', () => {
  it('joins text spread over indented lines', () => {
    expect(collapseWhitespace('\n  Part one\n  part two\n')).toBe('Part one part two');
  });
});

describe('cleanMarkdown', () => {
  it('keeps the lines around a removed teaser apart', () => {
    expect(cleanMarkdown('Para one.\n_Ready to get started? Try it._\nPara two.', context)).toBe('Para one.\nPara two.');
  });

  it('runs the passes in a fixed order ending with trim', () => {
    expect(CLEANUP_PASSES.map(pass => pass.name)).toEqual([
      'breadcrumb',
      'date-line',
      'duplicate-title',
      'share-footer',
      'related-articles',
      'learn-more-cta',
      'vendor-cta',
      'get-started-teaser',
      'proxied-images',
      'blank-lines',
      'trim',
    ]);
  });

  it('removes the duplicate title and share footer', () => {
    expect(cleanMarkdown('# My Title\n\nBody\n\nShare this article\nFooter junk', context)).toBe('Body');
  });

  it('cleans a page carrying every kind of boilerplate', () => {
    const raw = [
      '[All Articles](/blog)',
      '',
      '# My Title',
      '',
      'March 5, 2024',
      '',
      'First paragraph.',
      '',
      '![](/_next/image?url=%2Fhero.png&w=1080)',
      '',
      '',
      '',
      'Second paragraph.',
      '',
      '_Ready to get started with Acme?_',
      '',
      'Related articles',
      '',
      '[Another post](/blog/another)',
    ].join('\n');

    expect(cleanMarkdown(raw, context)).toBe('First paragraph.\n\nSecond paragraph.');
  });

  it('is a no-op on already cleaned Markdown', () => {
    const raw = '[All Articles](/blog)\n\n# My Title\n\nMarch 5, 2024\n\nBody one.\n\n\n\nBody two.\n\nShare this article\nx';
    const once = cleanMarkdown(raw, context);

    expect(once).toBe('Body one.\n\nBody two.');
    expect(cleanMarkdown(once, context)).toBe(once);
  });
});

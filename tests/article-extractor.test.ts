import { describe, it, expect } from 'vitest';
import { ArticleExtractor } from '../lib/web-scrapers/article-extractor';
import { ContentExtractionError, InvalidUrlError } from '../lib/errors';
import type { ArticleRef } from '../lib/types';
import { ORIGIN, articleHtml, createFakeSite } from './helpers/fake-site';

const ref: ArticleRef = { title: 'Listing Title', url: `${ORIGIN}/blog/my-post`, slug: 'my-post' };

const LONG_PARAGRAPH =
  'This paragraph is long enough that the region holding it clears the minimum content length on its own.';

function extractorFor(pages: Record<string, string | Error>) {
  const site = createFakeSite(pages);
  const extractor = new ArticleExtractor({ fetcher: site.fetcher, listingPath: '/blog', vendorName: 'Acme' });
  return { site, extractor };
}

describe('ArticleExtractor', () => {
  it('extracts title, reformatted date and cleaned body', async () => {
    const { extractor } = extractorFor({
      [ref.url]: articleHtml({ title: 'My Post', body: 'Hello world.', datetime: '2024-03-05', date: 'March 5, 2024' }),
    });

    expect(await extractor.extract(ref)).toEqual({
      ok: true,
      slug: 'my-post',
      title: 'My Post',
      url: ref.url,
      date: 'March 5, 2024',
      markdown: 'Hello world.',
    });
  });

  it('uses the time text when there is no machine date', async () => {
    const { extractor } = extractorFor({
      [ref.url]: articleHtml({ title: 'My Post', body: 'Hello world.', date: 'April 1, 2023' }),
    });

    const result = await extractor.extract(ref);

    expect(result.ok && result.date).toBe('April 1, 2023');
  });

  it('falls back to the raw datetime attribute when it cannot be reformatted', async () => {
    const { extractor } = extractorFor({
      [ref.url]: `<html><body><h1>T</h1><p><time datetime="last week"></time></p><p>Body</p></body></html>`,
    });

    const result = await extractor.extract(ref);

    expect(result.ok && result.date).toBe('last week');
  });

  it('finds a bare long-form date in a text block when there is no <time>', async () => {
    const html = `<html><body><article>
      <h1>Scanned</h1>
      <div class="meta">June 1, 2023</div>
      <p>${LONG_PARAGRAPH}</p>
    </article></body></html>`;
    const { extractor } = extractorFor({ [ref.url]: html });

    expect(await extractor.extract(ref)).toEqual({
      ok: true,
      slug: 'my-post',
      title: 'Scanned',
      url: ref.url,
      date: 'June 1, 2023',
      markdown: LONG_PARAGRAPH,
    });
  });

  it('leaves the date undefined when nothing looks like one', async () => {
    const { extractor } = extractorFor({
      [ref.url]: articleHtml({ title: 'My Post', body: 'Hello world.' }),
    });

    const result = await extractor.extract(ref);

    expect(result.ok).toBe(true);
    expect(result.ok && result.date).toBeUndefined();
  });

  it('collapses a heading written across several lines into one title', async () => {
    const html = `<html><body><article>
      <h1>
        <span>Part one</span>
        <span>part two</span>
      </h1>
      <p>${LONG_PARAGRAPH}</p>
    </article></body></html>`;
    const { extractor } = extractorFor({ [ref.url]: html });

    const result = await extractor.extract(ref);

    expect(result).toMatchObject({ ok: true, title: 'Part one part two', markdown: LONG_PARAGRAPH });
  });

  it('drops the heading of a title containing Markdown characters', async () => {
    const html = `<html><body><article>
      <h1>Using my_var and [brackets]</h1>
      <p>${LONG_PARAGRAPH}</p>
    </article></body></html>`;
    const { extractor } = extractorFor({ [ref.url]: html });

    const result = await extractor.extract(ref);

    expect(result).toMatchObject({ ok: true, title: 'Using my_var and [brackets]', markdown: LONG_PARAGRAPH });
  });

  it('tries the content selectors in order', async () => {
    const html = `<html><body>
      <nav><a href="/">Home</a></nav>
      <div class="post-content"><h1>Fallback</h1><p>${LONG_PARAGRAPH}</p></div>
    </body></html>`;
    const { extractor } = extractorFor({ [ref.url]: html });

    const result = await extractor.extract(ref);

    expect(result.ok && result.markdown).toBe(LONG_PARAGRAPH);
  });

  it('uses the page body when every candidate region is too small', async () => {
    const html = `<html><body><header>Site</header><article><p>Hi</p></article><p>Tail</p></body></html>`;
    const { extractor } = extractorFor({ [ref.url]: html });

    expect(await extractor.extract(ref)).toEqual({
      ok: true,
      slug: 'my-post',
      title: 'Listing Title',
      url: ref.url,
      date: undefined,
      markdown: 'Hi\n\nTail',
    });
  });

  it('reports an empty page as an extraction failure', async () => {
    const { extractor } = extractorFor({ [ref.url]: '<html><body></body></html>' });

    const result = await extractor.extract(ref);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ContentExtractionError);
      expect(result.error.message).toBe('No content region found');
      expect(result.error instanceof ContentExtractionError && result.error.phase).toBe('extract');
    }
  });

  it('passes archiver fetch errors through unchanged', async () => {
    const { extractor } = extractorFor({});

    const result = await extractor.extract(ref);

    expect(result).toMatchObject({ ok: false, slug: 'my-post', url: ref.url });
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(InvalidUrlError);
      expect(result.error.message).toBe('HTTP 404: Not Found');
    }
  });

  it('wraps other fetch errors as fetch-phase extraction errors', async () => {
    const { extractor } = extractorFor({ [ref.url]: new Error('socket hang up') });

    const result = await extractor.extract(ref);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ContentExtractionError);
      expect(result.error.message).toBe('socket hang up');
      expect(result.error instanceof ContentExtractionError && result.error.phase).toBe('fetch');
    }
  });
});

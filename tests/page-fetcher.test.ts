import { describe, it, expect, vi, afterEach } from 'vitest';
import { createPageFetcher, fetchPage } from '../lib/web-scrapers/page-fetcher';
import { ContentExtractionError, InvalidUrlError, RequestTimeoutError } from '../lib/errors';

const URL_UNDER_TEST = 'https://example.com/blog/post';

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('fetchPage', () => {
  it('returns the body and identifies itself', async () => {
    const fetchMock = vi.fn(async () => new Response('<html>ok</html>', { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    const body = await fetchPage(URL_UNDER_TEST, { userAgent: 'TestAgent/1.0' });

    expect(body).toBe('<html>ok</html>');
    expect(fetchMock).toHaveBeenCalledWith(
      URL_UNDER_TEST,
      expect.objectContaining({
        headers: expect.objectContaining({ 'User-Agent': 'TestAgent/1.0' }),
      })
    );
  });

  it('turns a non-success status into InvalidUrlError', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('gone', { status: 404, statusText: 'Not Found' })));

    const failure = fetchPage(URL_UNDER_TEST);

    await expect(failure).rejects.toBeInstanceOf(InvalidUrlError);
    await expect(failure).rejects.toMatchObject({ message: 'HTTP 404: Not Found', statusCode: 404, url: URL_UNDER_TEST });
  });

  it('aborts after the timeout', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(
        (_url: string, init: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            init.signal?.addEventListener('abort', () => {
              const aborted = new Error('This operation was aborted');
              aborted.name = 'AbortError';
              reject(aborted);
            });
          })
      )
    );

    const failure = fetchPage(URL_UNDER_TEST, { timeout: 20 });

    await expect(failure).rejects.toBeInstanceOf(RequestTimeoutError);
    await expect(failure).rejects.toMatchObject({ message: 'Request timed out after 20ms', timeout: 20 });
  });

  it('wraps network errors as fetch-phase extraction errors', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed');
      })
    );

    const failure = fetchPage(URL_UNDER_TEST);

    await expect(failure).rejects.toBeInstanceOf(ContentExtractionError);
    await expect(failure).rejects.toMatchObject({ message: 'Request failed: fetch failed', phase: 'fetch' });
  });
});

describe('createPageFetcher', () => {
  it('binds options into a PageFetcher', async () => {
    const fetchMock = vi.fn(async () => new Response('body'));
    vi.stubGlobal('fetch', fetchMock);

    const fetcher = createPageFetcher({ userAgent: 'Bound/2.0' });

    expect(await fetcher(URL_UNDER_TEST)).toBe('body');
    expect(fetchMock).toHaveBeenCalledWith(
      URL_UNDER_TEST,
      expect.objectContaining({ headers: expect.objectContaining({ 'User-Agent': 'Bound/2.0' }) })
    );
  });
});

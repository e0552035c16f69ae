import type { PageFetcher } from '../types';
import { ContentExtractionError, InvalidUrlError, RequestTimeoutError, isAbortError, toError } from '../errors';

export interface FetchPageOptions {
  /** Absolute timeout in milliseconds (default: 30000) */
  timeout?: number;
  userAgent?: string;
}

const DEFAULT_TIMEOUT = 30000;
const DEFAULT_USER_AGENT = 'Mozilla/5.0 (compatible; BlogArchiver/1.0)';

/**
 * Single HTTP GET with a fixed timeout and identifying User-Agent.
 * No retries: callers decide what a failure means.
 */
export async function fetchPage(url: string, options: FetchPageOptions = {}): Promise<string> {
  const timeout = options.timeout ?? DEFAULT_TIMEOUT;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);

  try {
    const response = await fetch(url, {
      headers: {
        'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
        'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      },
      signal: controller.signal,
    });

    if (!response.ok) {
      throw new InvalidUrlError(`HTTP ${response.status}: ${response.statusText}`, {
        url,
        statusCode: response.status,
      });
    }

    return await response.text();
  } catch (error) {
    if (error instanceof InvalidUrlError) {
      throw error;
    }
    if (isAbortError(error)) {
      throw new RequestTimeoutError(`Request timed out after ${timeout}ms`, { timeout, url, cause: toError(error) });
    }
    throw new ContentExtractionError(`Request failed: ${toError(error).message}`, {
      url,
      phase: 'fetch',
      cause: toError(error),
    });
  } finally {
    clearTimeout(timeoutId);
  }
}

export function createPageFetcher(options: FetchPageOptions = {}): PageFetcher {
  return (url: string) => fetchPage(url, options);
}

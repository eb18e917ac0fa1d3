/**
 * Web Page Loader
 *
 * Fetches a page and extracts its main text with jsdom.
 */

import { JSDOM } from 'jsdom';
import { IngestionError } from '@/lib/errors';
import { createLayerLogger, logExternalCall, sanitizeString } from '@/lib/logger';
import { FETCH_TIMEOUT_MS, FETCH_MAX_RETRIES } from '@/lib/rag/config';
import type { SourceDocument } from '@/types/rag';

const log = createLayerLogger('ingest').child({ service: 'WebPageLoader' });

// =============================================================================
// Types
// =============================================================================

export interface PageLoader {
  /**
   * @throws IngestionError when the page cannot be fetched or has no text
   */
  load(url: string): Promise<SourceDocument>;
}

export interface WebPageLoaderOptions {
  timeoutMs: number;
  /** Total attempts per URL */
  maxRetries: number;
  /** First backoff delay; doubles after every failed attempt */
  retryBaseDelayMs: number;
  userAgent: string;
}

const DEFAULT_LOADER_OPTIONS: WebPageLoaderOptions = {
  timeoutMs: FETCH_TIMEOUT_MS,
  maxRetries: FETCH_MAX_RETRIES,
  retryBaseDelayMs: 1000,
  userAgent:
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
};

// =============================================================================
// Extraction
// =============================================================================

const NOISE_SELECTOR = 'script, style, noscript, nav, header, footer, aside';

const BLOCK_SELECTOR =
  'p, div, section, article, main, li, ul, ol, h1, h2, h3, h4, h5, h6, table, tr, td, th, blockquote, pre, dd, dt';

/**
 * Containers tried in order before falling back to <body>.
 */
const CONTENT_SELECTORS = ['main', 'article', 'div.content', 'div.main-content', 'div#content'];

/**
 * A container must hold more text than this to count as the main content.
 */
const MIN_CONTAINER_CHARS = 500;

export interface ExtractedPage {
  title: string;
  text: string;
}

/**
 * Extract the title and main text of an HTML page.
 * Block elements become line breaks; blank lines are dropped.
 */
export function extractMainContent(html: string): ExtractedPage {
  const { document } = new JSDOM(html).window;

  const title = document.querySelector('title')?.textContent?.trim() ?? '';

  document.querySelectorAll(NOISE_SELECTOR).forEach((el) => el.remove());
  document.querySelectorAll('br').forEach((el) => el.replaceWith('\n'));
  document.querySelectorAll(BLOCK_SELECTOR).forEach((el) => {
    el.prepend('\n');
    el.append('\n');
  });

  const toLines = (raw: string): string =>
    raw
      .split('\n')
      .map((line) => line.replace(/\s+/g, ' ').trim())
      .filter(Boolean)
      .join('\n');

  for (const selector of CONTENT_SELECTORS) {
    const container = document.querySelector(selector);
    if (!container) continue;

    const text = toLines(container.textContent ?? '');
    if (text.length > MIN_CONTAINER_CHARS) {
      return { title, text };
    }
  }

  return { title, text: toLines(document.body.textContent ?? '') };
}

/**
 * Fallback title: last non-empty path segment, else the URL itself.
 */
export function titleFromUrl(url: string): string {
  const segments = url.split('/').filter(Boolean);
  const last = segments[segments.length - 1];
  return last && !last.includes(':') ? last : url;
}

// =============================================================================
// WebPageLoader
// =============================================================================

export class WebPageLoader implements PageLoader {
  private options: WebPageLoaderOptions;

  constructor(options: Partial<WebPageLoaderOptions> = {}) {
    this.options = { ...DEFAULT_LOADER_OPTIONS, ...options };
  }

  async load(url: string): Promise<SourceDocument> {
    const html = await this.fetchWithRetry(url);
    const { title, text } = extractMainContent(html);

    if (!text) {
      throw new IngestionError(url, 'no main text content found');
    }

    return {
      content: text,
      metadata: {
        url,
        title: title || titleFromUrl(url),
        category: '',
        source: new URL(url).hostname,
        fetchedAt: new Date().toISOString(),
      },
    };
  }

  private async fetchWithRetry(url: string): Promise<string> {
    const { maxRetries, retryBaseDelayMs } = this.options;
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      const start = Date.now();
      try {
        const html = await this.fetchOnce(url);
        logExternalCall(log, 'http', 'fetch_page', { duration_ms: Date.now() - start, status: 200 });
        return html;
      } catch (error) {
        lastError = error;
        const message = error instanceof Error ? sanitizeString(error.message) : String(error);
        log.warn(
          { event: 'fetch_retry', url, attempt, maxAttempts: maxRetries, error: message },
          `Fetch attempt ${attempt}/${maxRetries} failed`
        );

        if (attempt < maxRetries) {
          const delay = retryBaseDelayMs * 2 ** (attempt - 1);
          await new Promise((resolve) => setTimeout(resolve, delay));
        }
      }
    }

    const message = lastError instanceof Error ? lastError.message : String(lastError);
    throw new IngestionError(url, `failed after ${maxRetries} attempts: ${message}`, lastError);
  }

  private async fetchOnce(url: string): Promise<string> {
    const response = await fetch(url, {
      headers: { 'User-Agent': this.options.userAgent },
      redirect: 'follow',
      signal: AbortSignal.timeout(this.options.timeoutMs),
    });

    if (!response.ok) {
      throw new Error(`HTTP ${response.status}`);
    }

    return response.text();
  }
}

import { load } from 'cheerio';
import { divideUrls } from './audit-page';
import { DEFAULT_CONFIG } from './config';
import { toError } from './errors';
import { HttpRenderer, bodyTextOf } from './render';
import type { HtmlFetcher } from './types';

/** Content statistics for one page. */
export interface PageSummary {
  /** Visible body text, whitespace-collapsed. */
  text: string;
  wordCount: number;
  imageCount: number;
  /** H1 to H6 elements. */
  headingCount: number;
  paragraphCount: number;
}

/** Outcome of scraping one page. On failure the counts are 0 and `error` is set. */
export interface ScrapeResult extends PageSummary {
  url: string;
  error: string | null;
  /** Milliseconds until the document had been received. */
  fetchMs: number;
  /** Milliseconds until the summary was complete. */
  totalMs: number;
}

/**
 * Summarizes a page's content. Pure function, no I/O.
 * Words are the whitespace-separated tokens of the body text.
 * @param html - Raw HTML of the page.
 */
export function summarizePage(html: string): PageSummary {
  const $ = load(html);
  const text = bodyTextOf($);
  return {
    text,
    wordCount: text ? text.split(' ').filter(Boolean).length : 0,
    imageCount: $('img').length,
    headingCount: $('h1, h2, h3, h4, h5, h6').length,
    paragraphCount: $('p').length,
  };
}

/** Parameters for scrapePage(). */
export interface ScrapePageParams {
  fetcher?: HtmlFetcher;
  timeoutMs?: number;
}

/**
 * Fetches one page and summarizes its content.
 * Never throws: a fetch failure is returned on the result's `error` field.
 */
export async function scrapePage(pageUrl: string, params: ScrapePageParams = {}): Promise<ScrapeResult> {
  const fetcher = params.fetcher ?? new HttpRenderer();
  const startedAt = Date.now();
  try {
    const { html } = await fetcher.fetchHtml(pageUrl, params.timeoutMs ?? DEFAULT_CONFIG.pageTimeoutMs);
    const fetchMs = Date.now() - startedAt;
    const summary = summarizePage(html);
    return { url: pageUrl, ...summary, error: null, fetchMs, totalMs: Date.now() - startedAt };
  } catch (err) {
    const elapsed = Date.now() - startedAt;
    return {
      url: pageUrl,
      text: '',
      wordCount: 0,
      imageCount: 0,
      headingCount: 0,
      paragraphCount: 0,
      error: toError(err).message,
      fetchMs: elapsed,
      totalMs: elapsed,
    };
  }
}

/** Parameters for scrapePages(). */
export interface ScrapePagesParams extends ScrapePageParams {
  /** Parallel groups; each group scrapes its URLs one after another. */
  tabs?: number;
  signal?: AbortSignal;
}

/**
 * Scrapes an explicit list of URLs, divided into `tabs` groups processed in parallel.
 * Results are handed to `onResult` as each page finishes. An aborted `signal` stops
 * every group before its next page.
 * @returns All results, in completion order.
 */
export async function scrapePages(
  urls: readonly string[],
  params: ScrapePagesParams = {},
  onResult: (result: ScrapeResult) => void = () => undefined
): Promise<ScrapeResult[]> {
  const tabs = Math.max(1, Math.min(params.tabs ?? DEFAULT_CONFIG.auditTabs, urls.length || 1));
  const fetcher = params.fetcher ?? new HttpRenderer();
  const results: ScrapeResult[] = [];

  await Promise.all(
    divideUrls(urls, tabs).map(async (group) => {
      for (const pageUrl of group) {
        if (params.signal?.aborted) return;
        const result = await scrapePage(pageUrl, { fetcher, timeoutMs: params.timeoutMs });
        results.push(result);
        onResult(result);
      }
    })
  );

  return results;
}

import axios from 'axios';
import type { AxiosInstance, AxiosResponse } from 'axios';
import { load } from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { DEFAULT_CONFIG } from './config';
import { RenderError, toError } from './errors';
import type { FetchedDocument, HtmlFetcher, ImageData, PageData, PageRenderer } from './types';

// Elements that start a new line of rendered text
const BLOCK_ELEMENTS = [
  'address', 'article', 'aside', 'blockquote', 'br', 'dd', 'div', 'dl', 'dt', 'figcaption',
  'figure', 'footer', 'form', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'header', 'hr', 'li', 'main',
  'nav', 'ol', 'p', 'pre', 'section', 'table', 'td', 'th', 'tr', 'ul',
].join(',');

/**
 * Visible text of the document body with whitespace collapsed.
 * Scripts, styles and templates are left out, and adjacent block elements are
 * separated by a space so their words never run together.
 */
export function bodyTextOf($: CheerioAPI): string {
  const body = $('body').clone();
  body.find('script, style, noscript, template').remove();
  body.find(BLOCK_ELEMENTS).after(' ');
  return body.text().replace(/\s+/g, ' ').trim();
}

/**
 * Extracts the audited fields from a page's HTML.
 * Pure function, no I/O.
 * @param html - Raw HTML of the page.
 * @param url - Absolute URL the page was requested at; reported as the page's URL.
 * @param statusCode - HTTP status the page was served with.
 * @param documentUrl - URL the document was finally served from after redirects.
 *   Relative links and images resolve against it. Defaults to `url`.
 * @returns Title, description, body text, H1 texts, absolute links and images.
 */
export function extractPage(html: string, url: string, statusCode = 200, documentUrl = url): PageData {
  const $ = load(html);

  // Relative URLs resolve against <base href> when the page declares one
  let baseUrl = documentUrl;
  const baseHref = $('base[href]').first().attr('href')?.trim();
  if (baseHref) {
    try {
      baseUrl = new URL(baseHref, documentUrl).href;
    } catch {
      baseUrl = documentUrl;
    }
  }

  const title = $('title').first().text().replace(/\s+/g, ' ').trim();
  const description = ($('meta[name="description"]').first().attr('content') ?? '').trim();

  const h1s = $('h1')
    .map((_, el) => $(el).text().replace(/\s+/g, ' ').trim())
    .get();

  const bodyText = bodyTextOf($);

  // Links: absolute, fragment removed, in document order. Duplicates kept.
  const links: string[] = [];
  $('a[href]').each((_, el) => {
    const raw = $(el).attr('href')?.trim();
    // Skip non-navigational schemes and any fragment-only href (bare # or #section-id)
    if (!raw || /^(mailto:|tel:|javascript:|data:|#)/i.test(raw)) return;
    try {
      const parsed = new URL(raw, baseUrl);
      parsed.hash = '';
      links.push(parsed.href);
    } catch {
      return;
    }
  });

  const images: ImageData[] = [];
  $('img').each((_, el) => {
    const src = $(el).attr('src')?.trim();
    if (!src) return;
    let absoluteSrc: string;
    try {
      absoluteSrc = new URL(src, baseUrl).href;
    } catch {
      return;
    }
    const alt = $(el).attr('alt');
    images.push({ src: absoluteSrc, alt: alt !== undefined ? alt : null });
  });

  return { url, statusCode, title, description, bodyText, h1s, links, images };
}

/**
 * URL the response was finally served from. axios' Node adapter records it on the
 * underlying response after following redirects.
 */
function finalUrlOf(response: AxiosResponse<unknown>, requestedUrl: string): string {
  const request: unknown = response.request;
  if (typeof request !== 'object' || request === null || !('res' in request)) return requestedUrl;
  const res: unknown = request.res;
  if (typeof res !== 'object' || res === null || !('responseUrl' in res)) return requestedUrl;
  return typeof res.responseUrl === 'string' && res.responseUrl !== '' ? res.responseUrl : requestedUrl;
}

/** Options for HttpRenderer. */
export interface HttpRendererOptions {
  userAgent?: string;
  /** HTTP client; defaults to the shared axios instance. */
  client?: AxiosInstance;
}

/**
 * Renders pages by fetching their HTML and extracting it with cheerio.
 * Only the document itself is requested, never its images, fonts or media.
 */
export class HttpRenderer implements PageRenderer, HtmlFetcher {
  private readonly client: AxiosInstance;
  private readonly userAgent: string;

  constructor(options: HttpRendererOptions = {}) {
    this.client = options.client ?? axios;
    this.userAgent = options.userAgent ?? DEFAULT_CONFIG.userAgent;
  }

  /**
   * Fetches the HTML document at `url`, following redirects.
   * @throws RenderError on timeout, transport failure, HTTP status >= 400 or non-HTML content.
   */
  async fetchHtml(url: string, timeoutMs: number): Promise<FetchedDocument> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.client.get<unknown>(url, {
        timeout: timeoutMs,
        responseType: 'text',
        validateStatus: null,
        headers: {
          'User-Agent': this.userAgent,
          Accept: 'text/html,application/xhtml+xml',
        },
      });
    } catch (err) {
      if (axios.isAxiosError(err) && (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT')) {
        throw new RenderError(url, `Timed out after ${timeoutMs}ms`);
      }
      throw new RenderError(url, toError(err).message);
    }

    if (response.status >= 400) {
      throw new RenderError(url, `HTTP ${response.status}`, response.status);
    }

    const contentType: unknown = response.headers['content-type'];
    if (typeof contentType === 'string' && contentType !== '' && !/html/i.test(contentType)) {
      throw new RenderError(url, `Non-HTML content type: ${contentType}`, response.status);
    }

    return {
      html: typeof response.data === 'string' ? response.data : '',
      statusCode: response.status,
      finalUrl: finalUrlOf(response, url),
    };
  }

  /**
   * @throws RenderError as fetchHtml does.
   */
  async render(url: string, timeoutMs: number): Promise<PageData> {
    const fetched = await this.fetchHtml(url, timeoutMs);
    return extractPage(fetched.html, url, fetched.statusCode, fetched.finalUrl);
  }
}

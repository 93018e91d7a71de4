import { LIST_DEFAULT_CHECKS, resolveChecks, runChecks } from './checks';
import { DEFAULT_CONFIG } from './config';
import { toError } from './errors';
import { LinkVerifier } from './links';
import { HttpRenderer } from './render';
import type { Checks, PageData, PageRenderer, PageResult } from './types';

// Extensions that still denote an HTML document. Anything else with an extension
// (images, PDFs, archives...) is recorded but never fetched.
const PAGE_EXTENSIONS = new Set(['html', 'htm', 'xml', 'aspx', 'php', 'asp', 'jsp']);

/**
 * Returns the lowercase extension of the URL's last path segment, or '' if it has none.
 * '/a.b/page' has no extension; '/files/report.PDF' has 'pdf'.
 */
export function getFileExtension(pageUrl: string): string {
  let pathname: string;
  try {
    pathname = new URL(pageUrl).pathname;
  } catch {
    return '';
  }
  const lastSegment = pathname.slice(pathname.lastIndexOf('/') + 1);
  const dot = lastSegment.lastIndexOf('.');
  return dot > 0 ? lastSegment.slice(dot + 1).toLowerCase() : '';
}

/** True when the URL should be rendered (no extension, or a page-like one). */
export function isPageUrl(pageUrl: string): boolean {
  const extension = getFileExtension(pageUrl);
  return extension === '' || PAGE_EXTENSIONS.has(extension);
}

/** host:port comparison key; '' when the URL cannot be parsed. */
export function hostOf(pageUrl: string): string {
  try {
    return new URL(pageUrl).host;
  } catch {
    return '';
  }
}

/** Parameters for auditPage(). */
export interface AuditPageParams {
  pageUrl: string;
  keywords?: readonly string[];
  /** Missing toggles default to enabled. */
  checks?: Partial<Checks>;
  /** Link URLs or paths already verified elsewhere; the links check skips them. */
  checkedPaths?: readonly string[];
  renderer?: PageRenderer;
  verifier?: LinkVerifier;
  /** Host links must share to be followed. Defaults to the page's own host. */
  baseHost?: string;
  timeoutMs?: number;
}

function emptyResult(pageUrl: string): PageResult {
  return {
    url: pageUrl,
    title: '',
    description: '',
    h1s: [],
    warnings: {},
    error: null,
    skipped: false,
    links: [],
    keywordMatches: [],
  };
}

/**
 * Renders one page, runs the enabled checks on it and collects its same-host links.
 * Never throws: a render failure is returned on the result's `error` field.
 * @returns The page's result.
 */
export async function auditPage(params: AuditPageParams): Promise<PageResult> {
  const { pageUrl } = params;

  if (!isPageUrl(pageUrl)) {
    return { ...emptyResult(pageUrl), skipped: true };
  }

  const renderer = params.renderer ?? new HttpRenderer();
  let page: PageData;
  try {
    page = await renderer.render(pageUrl, params.timeoutMs ?? DEFAULT_CONFIG.pageTimeoutMs);
  } catch (err) {
    return { ...emptyResult(pageUrl), error: toError(err).message };
  }

  const { warnings, keywordMatches } = await runChecks(page, {
    checks: resolveChecks(params.checks),
    keywords: params.keywords,
    verifier: params.verifier,
    checkedPaths: params.checkedPaths,
  });

  const baseHost = params.baseHost ?? hostOf(pageUrl);
  const links = page.links.filter((href) => hostOf(href) === baseHost);

  return {
    url: pageUrl,
    title: page.title,
    description: page.description,
    h1s: [...page.h1s],
    warnings,
    error: null,
    skipped: false,
    links,
    keywordMatches,
  };
}

/**
 * Splits `urls` into `n` contiguous groups whose sizes differ by at most one,
 * earlier groups taking the remainder. Always returns `n` groups (some may be empty).
 */
export function divideUrls<T>(urls: readonly T[], n: number): T[][] {
  const base = Math.floor(urls.length / n);
  const remainder = urls.length % n;
  const groups: T[][] = [];
  let start = 0;
  for (let i = 0; i < n; i++) {
    const count = base + (i < remainder ? 1 : 0);
    groups.push(urls.slice(start, start + count));
    start += count;
  }
  return groups;
}

/** Parameters for auditPages(). */
export interface AuditPagesParams extends Omit<AuditPageParams, 'pageUrl' | 'baseHost'> {
  /** Parallel groups; each group audits its URLs one after another. */
  tabs?: number;
  signal?: AbortSignal;
}

/**
 * Audits an explicit list of URLs. The list is divided into `tabs` groups processed in
 * parallel; results are handed to `onResult` as each page finishes.
 * Without a checks configuration, images and links checks are off.
 * An aborted `signal` stops every group before its next page.
 * @returns All results, in completion order.
 */
export async function auditPages(
  urls: readonly string[],
  params: AuditPagesParams,
  onResult: (result: PageResult) => void = () => undefined
): Promise<PageResult[]> {
  const tabs = Math.max(1, Math.min(params.tabs ?? DEFAULT_CONFIG.auditTabs, urls.length || 1));
  const checks = params.checks ?? LIST_DEFAULT_CHECKS;
  const renderer = params.renderer ?? new HttpRenderer();
  const verifier = params.verifier ?? new LinkVerifier();
  const results: PageResult[] = [];

  await Promise.all(
    divideUrls(urls, tabs).map(async (group) => {
      for (const pageUrl of group) {
        if (params.signal?.aborted) return;
        const result = await auditPage({ ...params, pageUrl, checks, renderer, verifier });
        results.push(result);
        onResult(result);
      }
    })
  );

  return results;
}

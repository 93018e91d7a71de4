/** Crawler runtime configuration, populated from environment variables by loadConfig(). */
export interface Config {
  concurrency: number;
  maxPages: number;
  pageTimeoutMs: number;
  pollIntervalMs: number;
  linkConcurrency: number;
  linkTimeoutMs: number;
  linkMaxRedirects: number;
  auditTabs: number;
  userAgent: string;
}

export const WARNING_TYPES = [
  'h1_missing',
  'h1_multiple',
  'title_missing',
  'title_too_short',
  'title_too_long',
  'meta_description_missing',
  'meta_description_too_short',
  'meta_description_too_long',
  'links_broken',
  'https_to_http_links',
  'ssl_no',
  'image_alt_missing',
  'image_url_broken',
] as const;

export type WarningType = (typeof WARNING_TYPES)[number];

/**
 * Warnings keyed by type. Each occurrence is an evidence array whose first element
 * is the page URL, e.g.
 * { h1_missing: [['https://example.com/']], title_too_long: [['https://example.com/a', 'A very long title']] }
 */
export type WarningMap = Partial<Record<WarningType, string[][]>>;

/** What a single check contributes for one page: at most one evidence array per type. */
export type WarningEntries = Partial<Record<WarningType, string[]>>;

/** Toggles for each check. See resolveChecks() for defaulting rules. */
export interface Checks {
  headings: boolean;
  title: boolean;
  description: boolean;
  keywords: boolean;
  images: boolean;
  links: boolean;
  security: boolean;
}

export type CheckName = keyof Checks;

/** An image found on a rendered page. */
export interface ImageData {
  src: string;
  /** null means alt attribute was absent entirely; '' means alt="" was set explicitly. */
  alt: string | null;
}

/** Content extracted from one rendered page. Produced once per fetch, never mutated. */
export interface PageData {
  readonly url: string;
  readonly statusCode: number;
  readonly title: string;
  readonly description: string;
  readonly bodyText: string;
  readonly h1s: readonly string[];
  readonly links: readonly string[];
  readonly images: readonly ImageData[];
}

/** Renders a URL into PageData. Implementations throw RenderError on failure. */
export interface PageRenderer {
  render(url: string, timeoutMs: number): Promise<PageData>;
}

/** A fetched HTML document. */
export interface FetchedDocument {
  html: string;
  statusCode: number;
  /** Where the document was served from once redirects were followed. */
  finalUrl: string;
}

/** Fetches raw HTML documents. Implementations throw RenderError on failure. */
export interface HtmlFetcher {
  fetchHtml(url: string, timeoutMs: number): Promise<FetchedDocument>;
}

/** Outcome of auditing one page. */
export interface PageResult {
  url: string;
  title: string;
  description: string;
  h1s: string[];
  warnings: WarningMap;
  /** Render failure message; null when the page was fetched (or deliberately skipped). */
  error: string | null;
  /** True for non-page content (e.g. /file.pdf) that was not fetched. */
  skipped: boolean;
  /** Outbound links on the same host as the crawl. */
  links: string[];
  /** Keyword phrases fully matched on this page. */
  keywordMatches: string[];
}

export type CrawlStatus = 'completed' | 'exhausted' | 'cancelled';

export type CrawlState = 'idle' | 'running' | CrawlStatus;

/** Final result of a site crawl. */
export interface CrawlReport {
  taskId: string;
  startUrl: string;
  status: CrawlStatus;
  pages: string[];
  warnings: WarningMap;
  failedPages: { url: string; error: string }[];
  keywordMatches: Record<string, number>;
}

/** A row from the sessions table. */
export interface Session {
  id: number;
  task_id: string;
  site_url: string;
  label: string | null;
  status: 'running' | CrawlStatus;
  started_at: string;
  completed_at: string | null;
  total_pages: number | null;
}

/** A row from the pages table. */
export interface DbPage {
  id: number;
  session_id: number;
  url: string;
  title: string | null;
  skipped: number;
  error_message: string | null;
  warning_count: number;
  audited_at: string;
}

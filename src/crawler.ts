import { randomUUID } from 'node:crypto';
import { setTimeout as sleep } from 'node:timers/promises';
import { auditPage } from './audit-page';
import { resolveChecks, tallyKeywords } from './checks';
import { DEFAULT_CONFIG } from './config';
import { CrawlInputError, toError } from './errors';
import { LinkVerifier, probeLink } from './links';
import { WorkPool } from './pool';
import { HttpRenderer } from './render';
import { countWarnings, flattenWarnings } from './warnings';
import type { CrawlChannel } from './channel';
import type { TaskResult } from './pool';
import type {
  Checks,
  Config,
  CrawlReport,
  CrawlState,
  CrawlStatus,
  PageRenderer,
  PageResult,
} from './types';

/** Options for a site crawl. Only `startUrl` is required. */
export interface CrawlOptions {
  startUrl: string;
  /** Identifies the crawl on the channel. Generated when omitted. */
  taskId?: string;
  keywords?: readonly string[];
  /** Link URLs or paths the links check skips. */
  checkedPaths?: readonly string[];
  /** Missing toggles default to enabled. */
  checks?: Partial<Checks>;
  config?: Partial<Config>;
  renderer?: PageRenderer;
  verifier?: LinkVerifier;
  /** Receives one 'page' event per completed page; 'cancel' messages stop the crawl. */
  channel?: CrawlChannel;
  signal?: AbortSignal;
}

/**
 * Parses and validates a crawl's start URL.
 * @throws CrawlInputError if the URL does not parse or is not http(s).
 */
export function parseStartUrl(raw: string): URL {
  let url: URL;
  try {
    url = new URL(raw.trim());
  } catch {
    throw new CrawlInputError(`Invalid start URL: ${raw}`);
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new CrawlInputError(`Start URL must be http or https, got: ${url.protocol}`);
  }
  url.hash = '';
  return url;
}

function toPageResult(task: TaskResult<PageResult>): PageResult {
  if (task.result) return task.result;
  return {
    url: task.url,
    title: '',
    description: '',
    h1s: [],
    warnings: {},
    error: task.error?.message ?? 'Unknown error',
    skipped: false,
    links: [],
    keywordMatches: [],
  };
}

/** Inputs of buildCrawlReport(). */
export interface ReportInput {
  taskId: string;
  startUrl: string;
  status: CrawlStatus;
  pages: readonly PageResult[];
  keywords: readonly string[];
  checks: Checks;
}

/**
 * Folds per-page results into a crawl report. Every configured phrase starts the
 * tally at 0 when the keywords check is on.
 */
export function buildCrawlReport(input: ReportInput): CrawlReport {
  const tally = new Map<string, number>();
  if (input.checks.keywords) {
    for (const phrase of input.keywords) {
      if (phrase.trim() !== '') tally.set(phrase, 0);
    }
  }
  for (const page of input.pages) tallyKeywords(tally, page.keywordMatches);

  return {
    taskId: input.taskId,
    startUrl: input.startUrl,
    status: input.status,
    pages: input.pages.map((p) => p.url),
    warnings: flattenWarnings(input.pages.map((p) => p.warnings)),
    failedPages: input.pages.flatMap((p) => (p.error !== null ? [{ url: p.url, error: p.error }] : [])),
    keywordMatches: Object.fromEntries(tally),
  };
}

/**
 * Breadth-first crawl of one site.
 *
 * The start URL seeds a WorkPool; a polling loop reads the pool's results and feeds
 * every new same-host link back into it. The pool never accepts more than `maxPages`
 * URLs. The crawl ends in one of three states:
 * - `completed`: `maxPages` pages have finished;
 * - `exhausted`: a round found nothing new to schedule and the pool is idle;
 * - `cancelled`: a cancel arrived (channel, AbortSignal or cancel()). Running pages
 *   finish and are reported, queued ones are dropped.
 *
 * A Crawler runs once.
 */
export class Crawler {
  private current: CrawlState = 'idle';
  private cancelRequested = false;
  private pool: WorkPool<PageResult> | null = null;
  private stopping: Promise<void> | null = null;
  private pageResults: PageResult[] = [];

  constructor(private readonly options: CrawlOptions) {}

  get state(): CrawlState {
    return this.current;
  }

  /** Per-page results of the finished crawl, in completion order. */
  get pages(): PageResult[] {
    return [...this.pageResults];
  }

  /** Requests cancellation. Takes effect at the next poll round. */
  cancel(): void {
    if (this.cancelRequested) return;
    this.cancelRequested = true;
    if (this.pool) this.stopping = this.pool.stop();
  }

  /**
   * Runs the crawl to a terminal state.
   * @throws CrawlInputError for an invalid start URL, before any page is fetched.
   */
  async run(): Promise<CrawlReport> {
    if (this.current !== 'idle') throw new Error('Crawler can only run once');
    const start = parseStartUrl(this.options.startUrl);

    const { options } = this;
    const config: Config = { ...DEFAULT_CONFIG, ...options.config };
    const taskId = options.taskId ?? randomUUID();
    const keywords = options.keywords ?? [];
    const checks = resolveChecks(options.checks);
    const renderer = options.renderer ?? new HttpRenderer({ userAgent: config.userAgent });
    const verifier =
      options.verifier ??
      new LinkVerifier({
        concurrency: config.linkConcurrency,
        probe: (url) =>
          probeLink(url, {
            timeoutMs: config.linkTimeoutMs,
            maxRedirects: config.linkMaxRedirects,
            userAgent: config.userAgent,
          }),
      });

    const pool = new WorkPool<PageResult>(config.concurrency);
    this.pool = pool;
    this.current = 'running';

    const unsubscribe =
      options.channel?.subscribe(taskId, (message) => {
        if (message.event === 'cancel') this.cancel();
      }) ?? (() => undefined);
    const onAbort = (): void => this.cancel();
    options.signal?.addEventListener('abort', onAbort, { once: true });
    if (options.signal?.aborted) this.cancel();

    let finished = 0;
    pool.start(async (pageUrl) => {
      const result = await auditPage({
        pageUrl,
        keywords,
        checks,
        checkedPaths: options.checkedPaths,
        renderer,
        verifier,
        baseHost: start.host,
        timeoutMs: config.pageTimeoutMs,
      });
      finished++;
      await this.publishProgress(taskId, result, finished);
      return result;
    });

    let status: CrawlStatus = 'exhausted';
    try {
      pool.schedule(start.href);
      let harvested = 0;
      for (;;) {
        if (this.cancelRequested) {
          status = 'cancelled';
          break;
        }

        const results = pool.results();
        if (results.length >= config.maxPages) {
          status = 'completed';
          break;
        }

        let scheduled = 0;
        for (const task of results.slice(harvested)) {
          for (const link of task.result?.links ?? []) {
            if (pool.accepted >= config.maxPages) break;
            if (pool.schedule(link)) scheduled++;
          }
        }
        harvested = results.length;

        if (scheduled === 0 && pool.idle) {
          status = 'exhausted';
          break;
        }

        await sleep(config.pollIntervalMs);
      }
    } finally {
      options.signal?.removeEventListener('abort', onAbort);
      unsubscribe();
      await (this.stopping ?? pool.stop());
    }

    // Pages that finished while a cancel was propagating still count, up to the cap
    this.pageResults = pool.results().slice(0, config.maxPages).map(toPageResult);
    this.current = status;
    return buildCrawlReport({
      taskId,
      startUrl: start.href,
      status,
      pages: this.pageResults,
      keywords,
      checks,
    });
  }

  private async publishProgress(taskId: string, result: PageResult, total: number): Promise<void> {
    if (!this.options.channel) return;
    try {
      await this.options.channel.publish({
        taskId,
        event: 'page',
        message: { url: result.url, warningCount: countWarnings(result.warnings), error: result.error, total },
      });
    } catch (err) {
      console.warn(`Failed to publish progress for ${result.url}: ${toError(err).message}`);
    }
  }
}

/**
 * Crawls a site and returns its report. See Crawler for the full contract.
 */
export function crawlSite(options: CrawlOptions): Promise<CrawlReport> {
  return new Crawler(options).run();
}

#!/usr/bin/env node
import fs from 'node:fs';
import path from 'node:path';
import { randomUUID } from 'node:crypto';
import { auditPages } from './audit-page';
import { MemoryChannel } from './channel';
import { CHECK_NAMES, LIST_DEFAULT_CHECKS, checksFromMask, resolveChecks } from './checks';
import { loadConfig } from './config';
import { Crawler, buildCrawlReport, parseStartUrl } from './crawler';
import Db from './db';
import { toError } from './errors';
import { HttpRenderer } from './render';
import { generateReports, printSummary, scrapeRows, writeCsv } from './report';
import { scrapePages } from './scrape';
import type { ScrapeResult } from './scrape';
import { countWarnings } from './warnings';
import type { CheckName, Checks, Config, CrawlReport, HtmlFetcher, PageResult } from './types';

/** Parsed audit CLI arguments. */
export interface AuditArgs {
  site: string | null;
  keywords: string[];
  skip: CheckName[];
  /** Bit mask of enabled checks; overrides the defaults before `skip` applies. */
  checksMask: number | null;
  label: string | null;
  taskId: string | null;
  pages: string[];
  checkedPaths: string[];
  /** Summarize the --page URLs' content instead of auditing them. */
  scrape: boolean;
}

function isCheckName(value: string): value is CheckName {
  return CHECK_NAMES.some((name) => name === value);
}

/**
 * Parses audit CLI flags from an args array (pass process.argv.slice(2)).
 * Repeatable flags: --keyword, --skip, --page, --checked-path. --scrape takes no value.
 * Throws on an unknown check name or a non-numeric --checks mask.
 * @param argv - Raw CLI argument strings.
 * @returns Parsed flag values.
 */
export function parseAuditArgs(argv: string[]): AuditArgs {
  const result: AuditArgs = {
    site: null,
    keywords: [],
    skip: [],
    checksMask: null,
    label: null,
    taskId: null,
    pages: [],
    checkedPaths: [],
    scrape: false,
  };
  for (let i = 0; i < argv.length; i++) {
    const flag = argv[i];
    if (flag === '--site') {
      result.site = argv[++i] ?? null;
    } else if (flag === '--keyword') {
      const keyword = argv[++i];
      if (keyword !== undefined) result.keywords.push(keyword);
    } else if (flag === '--skip') {
      const name = argv[++i] ?? '';
      if (!isCheckName(name)) {
        throw new Error(`--skip expects one of ${CHECK_NAMES.join(', ')}, got: ${name}`);
      }
      result.skip.push(name);
    } else if (flag === '--checks') {
      const raw = argv[++i];
      const mask = parseInt(raw ?? '', 10);
      if (isNaN(mask) || mask < 0) throw new Error(`--checks requires a numeric bit mask, got: ${raw}`);
      result.checksMask = mask;
    } else if (flag === '--label') {
      result.label = argv[++i] ?? null;
    } else if (flag === '--task-id') {
      result.taskId = argv[++i] ?? null;
    } else if (flag === '--page') {
      const page = argv[++i];
      if (page !== undefined) result.pages.push(page);
    } else if (flag === '--checked-path') {
      const checked = argv[++i];
      if (checked !== undefined) result.checkedPaths.push(checked);
    } else if (flag === '--scrape') {
      result.scrape = true;
    }
  }
  return result;
}

/**
 * Resolves the enabled checks from CLI arguments.
 * A list audit starts from LIST_DEFAULT_CHECKS (images and links off), a crawl from all checks.
 */
export function checksFromArgs(args: AuditArgs, listAudit: boolean): Checks {
  let base: Checks;
  if (args.checksMask !== null) base = checksFromMask(args.checksMask);
  else base = listAudit ? { ...LIST_DEFAULT_CHECKS } : resolveChecks();
  for (const name of args.skip) base[name] = false;
  return base;
}

/** Options passed to main(). */
interface MainOptions {
  args?: AuditArgs;
  config?: Config;
  /** Parent directory of the per-site audit folders. */
  rootDir?: string;
}

function logProgress(url: string, warningCount: number, error: string | null): void {
  if (error) console.warn(`  ✗ ${url}: ${error}`);
  else console.log(`  ✓ ${url} (${warningCount} warning${warningCount !== 1 ? 's' : ''})`);
}

/**
 * Audits an explicit list of pages instead of crawling.
 * SIGINT stops every group before its next page.
 */
async function runListAudit(
  args: AuditArgs,
  config: Config,
  taskId: string,
  checks: Checks
): Promise<{ report: CrawlReport; pages: PageResult[] }> {
  const controller = new AbortController();
  const onSigint = (): void => {
    console.log('\nStopping after the pages in progress...');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  try {
    const pages = await auditPages(
      args.pages,
      {
        keywords: args.keywords,
        checks,
        checkedPaths: args.checkedPaths,
        tabs: config.auditTabs,
        timeoutMs: config.pageTimeoutMs,
        signal: controller.signal,
      },
      (result) => logProgress(result.url, countWarnings(result.warnings), result.error)
    );
    const report = buildCrawlReport({
      taskId,
      startUrl: args.pages[0] ?? '',
      status: controller.signal.aborted ? 'cancelled' : 'completed',
      pages,
      keywords: args.keywords,
      checks,
    });
    return { report, pages };
  } finally {
    process.off('SIGINT', onSigint);
  }
}

/**
 * Crawls the site. Progress arrives over the channel; SIGINT publishes a cancel on it.
 */
async function runCrawl(
  site: string,
  args: AuditArgs,
  config: Config,
  taskId: string,
  checks: Checks
): Promise<{ report: CrawlReport; pages: PageResult[] }> {
  const channel = new MemoryChannel();
  const unsubscribe = channel.subscribe(taskId, (message) => {
    if (message.event !== 'page' || !message.message) return;
    const { url, warningCount, error } = message.message;
    if (typeof url === 'string' && typeof warningCount === 'number') {
      logProgress(url, warningCount, typeof error === 'string' ? error : null);
    }
  });
  const onSigint = (): void => {
    console.log('\nCancelling crawl, waiting for pages in progress...');
    channel.publish({ taskId, event: 'cancel' }).catch((err: unknown) => {
      console.warn(`Failed to publish cancel: ${toError(err).message}`);
    });
  };
  process.once('SIGINT', onSigint);

  const crawler = new Crawler({
    startUrl: site,
    taskId,
    keywords: args.keywords,
    checkedPaths: args.checkedPaths,
    checks,
    config,
    channel,
  });
  try {
    const report = await crawler.run();
    return { report, pages: crawler.pages };
  } finally {
    process.off('SIGINT', onSigint);
    unsubscribe();
  }
}

/**
 * Main audit entry point: crawls a site (or audits --page URLs), stores every page
 * result, then writes CSV reports and prints a summary.
 * Throws on invalid arguments rather than calling process.exit().
 * @param opts - Optional pre-parsed args and config (useful for tests).
 * @returns The final report.
 */
export async function main(opts: MainOptions = {}): Promise<CrawlReport> {
  const args = opts.args ?? parseAuditArgs(process.argv.slice(2));
  const config = opts.config ?? loadConfig();
  const rootDir = opts.rootDir ?? 'audits';
  const listAudit = args.pages.length > 0;

  const site = args.site ?? args.pages[0];
  if (!site) {
    throw new Error(
      '--site or --page is required. Usage: audit --site <url> [--keyword <phrase>]... [--skip <check>]... [--page <url>]...'
    );
  }
  // Fails before anything is stored when the URL is invalid
  const hostname = parseStartUrl(site).hostname;
  const taskId = args.taskId ?? randomUUID();
  const checks = checksFromArgs(args, listAudit);

  console.log(
    listAudit
      ? `Auditing ${args.pages.length} page${args.pages.length !== 1 ? 's' : ''} (task ${taskId})`
      : `Crawling ${site} (task ${taskId}, up to ${config.maxPages} pages)`
  );

  const { report, pages } = listAudit
    ? await runListAudit(args, config, taskId, checks)
    : await runCrawl(site, args, config, taskId, checks);

  const db = new Db(hostname, rootDir);
  try {
    const sessionId = db.createSession(taskId, report.startUrl, args.label);
    for (const page of pages) db.persistPageResult(sessionId, page);
    db.finishSession(sessionId, report);

    const outDir = path.join(rootDir, hostname, 'reports', `session-${sessionId}`);
    await generateReports(db, sessionId, outDir);
    printSummary(db, sessionId, outDir);
  } finally {
    db.close();
  }
  return report;
}

/** Options passed to scrapeMain(). */
interface ScrapeMainOptions extends MainOptions {
  /** Document fetcher; defaults to an HttpRenderer using the configured user agent. */
  fetcher?: HtmlFetcher;
}

/**
 * Scrape entry point: summarizes the content of every --page URL and writes one CSV
 * to {rootDir}/{hostname}/scrapes/{taskId}.csv. Nothing is stored in the audit database.
 * SIGINT stops every group before its next page.
 * @returns The scrape results, in completion order.
 */
export async function scrapeMain(opts: ScrapeMainOptions = {}): Promise<ScrapeResult[]> {
  const args = opts.args ?? parseAuditArgs(process.argv.slice(2));
  const config = opts.config ?? loadConfig();
  const rootDir = opts.rootDir ?? 'audits';

  const first = args.pages[0];
  if (!first) {
    throw new Error('--scrape needs at least one --page. Usage: audit --scrape --page <url> [--page <url>]...');
  }
  const hostname = parseStartUrl(first).hostname;
  const taskId = args.taskId ?? randomUUID();
  console.log(`Scraping ${args.pages.length} page${args.pages.length !== 1 ? 's' : ''} (task ${taskId})`);

  const controller = new AbortController();
  const onSigint = (): void => {
    console.log('\nStopping after the pages in progress...');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  let results: ScrapeResult[];
  try {
    results = await scrapePages(
      args.pages,
      {
        fetcher: opts.fetcher ?? new HttpRenderer({ userAgent: config.userAgent }),
        tabs: config.auditTabs,
        timeoutMs: config.pageTimeoutMs,
        signal: controller.signal,
      },
      (result) => {
        if (result.error) console.warn(`  ✗ ${result.url}: ${result.error}`);
        else console.log(`  ✓ ${result.url} (${result.wordCount} words, ${result.totalMs}ms)`);
      }
    );
  } finally {
    process.off('SIGINT', onSigint);
  }

  const outDir = path.join(rootDir, hostname, 'scrapes');
  fs.mkdirSync(outDir, { recursive: true });
  const outFile = path.join(outDir, `${taskId}.csv`);
  await writeCsv(outFile, scrapeRows(results));

  const failed = results.filter((r) => r.error !== null).length;
  console.log(`\nScraped ${results.length} page${results.length !== 1 ? 's' : ''}, ${failed} failed`);
  console.log(`Report: ${outFile}`);
  return results;
}

/** Runs the audit, or the scrape when --scrape is given. */
async function cli(): Promise<void> {
  const args = parseAuditArgs(process.argv.slice(2));
  if (args.scrape) await scrapeMain({ args });
  else await main({ args });
}

if (require.main === module) {
  // eslint-disable-next-line @typescript-eslint/no-require-imports
  require('dotenv').config();
  cli().catch((err: unknown) => {
    console.error('Fatal error:', toError(err).message);
    process.exit(1);
  });
}

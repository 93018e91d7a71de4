#!/usr/bin/env node
import fs from 'node:fs';
import path from 'node:path';
import { pipeline } from 'node:stream/promises';
import { Readable } from 'node:stream';
import { format } from 'fast-csv';
import Db from './db';
import { toError } from './errors';
import { countWarnings, warningTypes } from './warnings';
import type { ScrapeResult } from './scrape';
import type { DbPage, WarningMap } from './types';

/** Parsed report CLI arguments. */
export interface ReportArgs {
  site: string | null;
  session: number | null;
  listSessions: boolean;
}

/**
 * Parses report CLI flags from an args array (pass process.argv.slice(2)).
 * Throws with a descriptive message if --session receives a non-numeric value.
 * @param argv - Raw CLI argument strings.
 * @returns Parsed flag values.
 */
export function parseArgs(argv: string[]): ReportArgs {
  const result: ReportArgs = { site: null, session: null, listSessions: false };
  for (let i = 0; i < argv.length; i++) {
    if (argv[i] === '--site') {
      result.site = argv[++i] ?? null;
    } else if (argv[i] === '--session') {
      const raw = argv[++i];
      const val = parseInt(raw ?? '', 10);
      if (isNaN(val)) throw new Error(`--session requires a numeric ID, got: ${raw}`);
      result.session = val;
    } else if (argv[i] === '--list-sessions') {
      result.listSessions = true;
    }
  }
  return result;
}

/**
 * Writes an array of row objects to a CSV file using stream.pipeline for correct
 * backpressure handling and error propagation.
 * Uses the first row's keys as headers (fast-csv default with `headers: true`).
 * An empty rows array produces an empty file with no header row.
 * @param filePath - Absolute or relative path to write to.
 * @param rows - Array of plain objects; all objects must share the same key set.
 * @returns Resolves when the file is fully written.
 */
export async function writeCsv(filePath: string, rows: Record<string, unknown>[]): Promise<void> {
  await pipeline(Readable.from(rows), format({ headers: true }), fs.createWriteStream(filePath));
}

// ---------------------------------------------------------------------------
// Row generators (pure, no I/O)
// ---------------------------------------------------------------------------

function pageOutcome(p: DbPage): string {
  if (p.skipped) return 'skipped';
  return p.error_message ? 'error' : 'audited';
}

/**
 * Builds rows for pages.csv, one row per audited URL.
 * @param pages - Page rows for a session.
 */
export function pagesRows(pages: DbPage[]): Record<string, unknown>[] {
  return pages.map((p) => ({
    url: p.url,
    outcome: pageOutcome(p),
    title: p.title ?? '',
    warning_count: p.warning_count,
    error: p.error_message ?? '',
  }));
}

/**
 * Builds rows for warnings.csv, one row per warning occurrence.
 * `detail` joins the evidence after the page URL with ' | '.
 */
export function warningsRows(warnings: WarningMap): Record<string, unknown>[] {
  const rows: Record<string, unknown>[] = [];
  for (const type of warningTypes(warnings)) {
    for (const [url = '', ...detail] of warnings[type] ?? []) {
      rows.push({ type, url, detail: detail.join(' | ') });
    }
  }
  return rows;
}

/**
 * Builds rows for warning-summary.csv: occurrences and distinct pages per warning type.
 */
export function warningSummaryRows(warnings: WarningMap): Record<string, unknown>[] {
  return warningTypes(warnings).map((type) => {
    const occurrences = warnings[type] ?? [];
    return {
      type,
      occurrences: occurrences.length,
      pages: new Set(occurrences.map((evidence) => evidence[0])).size,
    };
  });
}

/** Builds rows for keywords.csv, highest count first. */
export function keywordRows(tally: Record<string, number>): Record<string, unknown>[] {
  return Object.entries(tally)
    .sort(([a, x], [b, y]) => y - x || a.localeCompare(b))
    .map(([phrase, matches]) => ({ phrase, matches }));
}

/** Builds rows for a scrape CSV, one row per page, in the order given. */
export function scrapeRows(results: readonly ScrapeResult[]): Record<string, unknown>[] {
  return results.map((r) => ({
    url: r.url,
    words: r.wordCount,
    headings: r.headingCount,
    paragraphs: r.paragraphCount,
    images: r.imageCount,
    fetch_ms: r.fetchMs,
    total_ms: r.totalMs,
    error: r.error ?? '',
    text: r.text,
  }));
}

// ---------------------------------------------------------------------------
// Report generation
// ---------------------------------------------------------------------------

/**
 * Generates the four CSV reports for a session and writes them to `outDir`.
 * Creates `outDir` if it does not exist.
 * @param db - The Db instance for the site.
 * @param sessionId - The session to report on.
 * @param outDir - Directory to write CSV files into.
 */
export async function generateReports(db: Db, sessionId: number, outDir: string): Promise<void> {
  fs.mkdirSync(outDir, { recursive: true });

  const pages = db.getPages(sessionId);
  const warnings = db.getWarnings(sessionId);

  await Promise.all([
    writeCsv(path.join(outDir, 'pages.csv'), pagesRows(pages)),
    writeCsv(path.join(outDir, 'warnings.csv'), warningsRows(warnings)),
    writeCsv(path.join(outDir, 'warning-summary.csv'), warningSummaryRows(warnings)),
    writeCsv(path.join(outDir, 'keywords.csv'), keywordRows(db.getKeywordTally(sessionId))),
  ]);
}

/**
 * Prints a text summary of a session to stdout.
 * @param outDir - Path where reports were written (included in output).
 */
export function printSummary(db: Db, sessionId: number, outDir: string): void {
  const session = db.getSession(sessionId);
  const pages = db.getPages(sessionId);
  const warnings = db.getWarnings(sessionId);

  const failed = pages.filter((p) => p.error_message !== null).length;
  const skipped = pages.filter((p) => p.skipped).length;

  let duration = '';
  if (session?.started_at && session.completed_at) {
    const ms = new Date(session.completed_at).getTime() - new Date(session.started_at).getTime();
    const mins = Math.floor(ms / 60000);
    const secs = Math.floor((ms % 60000) / 1000);
    duration = mins > 0 ? `${mins}m ${secs}s` : `${secs}s`;
  }

  const label = session?.label ? ` (${session.label})` : '';
  console.log(`\nSession ${sessionId}${label}: ${session?.site_url ?? ''}`);
  console.log(`Status: ${session?.status ?? 'unknown'}`);
  if (duration) console.log(`Duration: ${duration}`);
  console.log('');
  console.log(`Pages audited:      ${pages.length.toLocaleString()}`);
  console.log(`Failed pages:       ${failed.toLocaleString()}`);
  console.log(`Skipped (non-page): ${skipped.toLocaleString()}`);
  console.log(`Warnings:           ${countWarnings(warnings).toLocaleString()}`);
  for (const [phrase, matches] of Object.entries(db.getKeywordTally(sessionId))) {
    console.log(`Keyword "${phrase}": ${matches} page${matches !== 1 ? 's' : ''}`);
  }
  console.log(`\nReports: ${outDir}`);
}

// ---------------------------------------------------------------------------
// Main entry point
// ---------------------------------------------------------------------------

/** Options passed to report(). */
interface ReportOptions {
  args?: ReportArgs;
  /** Parent directory of the per-site audit folders. */
  rootDir?: string;
}

/**
 * Main report entry point.
 * Throws on invalid arguments rather than calling process.exit().
 * @param opts - Optional pre-parsed args (useful for tests).
 */
export async function report(opts: ReportOptions = {}): Promise<void> {
  const args = opts.args ?? parseArgs(process.argv.slice(2));
  const rootDir = opts.rootDir ?? 'audits';

  if (!args.site) {
    throw new Error('--site is required. Usage: report --site <url> [--session <id>] [--list-sessions]');
  }

  const hostname = new URL(args.site).hostname;
  const db = new Db(hostname, rootDir);

  try {
    if (args.listSessions) {
      const sessions = db.listSessions();
      if (sessions.length === 0) {
        console.log('No sessions found.');
        return;
      }
      console.log(`\nSessions for ${hostname}:`);
      console.log('ID   Status      Pages  Label                Started');
      console.log('─'.repeat(65));
      for (const s of sessions) {
        const id = String(s.id).padEnd(4);
        const status = s.status.padEnd(11);
        const pages = String(s.total_pages ?? '-').padEnd(6);
        const label = (s.label ?? '-').padEnd(20);
        console.log(`${id} ${status} ${pages} ${label} ${s.started_at}`);
      }
      return;
    }

    let sessionId: number;
    if (args.session !== null) {
      if (!db.getSession(args.session)) throw new Error(`Session ${args.session} not found`);
      sessionId = args.session;
    } else {
      const sessions = db.listSessions();
      if (sessions.length === 0) throw new Error('No sessions found. Run an audit first.');
      sessionId = Math.max(...sessions.map((s) => s.id));
    }

    const outDir = path.join(rootDir, hostname, 'reports', `session-${sessionId}`);
    await generateReports(db, sessionId, outDir);
    printSummary(db, sessionId, outDir);
  } finally {
    db.close();
  }
}

if (require.main === module) {
  // eslint-disable-next-line @typescript-eslint/no-require-imports
  require('dotenv').config();
  report().catch((err: unknown) => {
    console.error('Fatal error:', toError(err).message);
    process.exit(1);
  });
}

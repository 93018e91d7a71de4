import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { countWarnings, isWarningType, mergeWarnings, warningTypes } from '../warnings';
import type { CrawlReport, CrawlStatus, DbPage, PageResult, Session, WarningMap } from '../types';

const schema = fs.readFileSync(path.join(__dirname, 'schema.sql'), 'utf8');

/** Evidence is stored as a JSON array of strings; anything else is treated as corrupt. */
function parseEvidence(raw: string): string[] | null {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return null;
  }
  return Array.isArray(value) && value.every((item) => typeof item === 'string') ? value : null;
}

/**
 * Manages all interactions with a site's audit database.
 * One instance per site; open once and reuse it for the whole audit.
 */
class Db {
  db: Database.Database;
  closed: boolean;

  /**
   * Opens (or creates) the audit database for a given hostname.
   * Creates the {rootDir}/{hostname}/ directory if it doesn't exist.
   * @param hostname - e.g. 'example.com'
   * @param rootDir - Parent directory for all sites; defaults to 'audits'.
   */
  constructor(hostname: string, rootDir = 'audits') {
    const dir = path.join(rootDir, hostname);
    fs.mkdirSync(dir, { recursive: true });
    this.db = new Database(path.join(dir, 'audit.db'));
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');
    this.db.exec(schema);
    this.closed = false;
  }

  /**
   * Closes the database connection. Call this when the crawl is complete.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.db.close();
  }

  /**
   * Creates a new audit session in the 'running' state.
   * @param taskId - The crawl's task id (as used on the crawl channel).
   * @param siteUrl - The start URL, e.g. 'https://example.com/'.
   * @param label - Optional human-readable label, e.g. 'baseline'.
   * @returns The ID of the newly created session.
   */
  createSession(taskId: string, siteUrl: string, label?: string | null): number {
    const result = this.db
      .prepare('INSERT INTO sessions (task_id, site_url, label) VALUES (?, ?, ?)')
      .run(taskId, siteUrl, label || null);
    return Number(result.lastInsertRowid);
  }

  /**
   * Returns all sessions for this site in ascending order.
   */
  listSessions(): Session[] {
    return this.db.prepare<[], Session>('SELECT * FROM sessions ORDER BY id').all();
  }

  /**
   * Returns a single session by ID, or undefined if not found.
   */
  getSession(sessionId: number): Session | undefined {
    return this.db.prepare<[number], Session>('SELECT * FROM sessions WHERE id = ?').get(sessionId);
  }

  /**
   * Returns all pages for a session in the order they were audited.
   */
  getPages(sessionId: number): DbPage[] {
    return this.db
      .prepare<[number], DbPage>('SELECT * FROM pages WHERE session_id = ? ORDER BY id')
      .all(sessionId);
  }

  /**
   * Atomically stores one page and its warnings.
   * Re-persisting the same URL replaces the page row and its warnings.
   * @param sessionId - The session this page belongs to.
   * @param page - The page's audit result.
   */
  persistPageResult(sessionId: number, page: PageResult): void {
    const insertWarning = this.db.prepare(
      'INSERT INTO warnings (session_id, page_url, type, evidence) VALUES (?, ?, ?, ?)'
    );
    this.db.transaction(() => {
      this.db
        .prepare(
          `
        INSERT INTO pages (session_id, url, title, skipped, error_message, warning_count)
        VALUES (@session_id, @url, @title, @skipped, @error_message, @warning_count)
        ON CONFLICT(session_id, url) DO UPDATE SET
          title = excluded.title,
          skipped = excluded.skipped,
          error_message = excluded.error_message,
          warning_count = excluded.warning_count,
          audited_at = datetime('now')
      `
        )
        .run({
          session_id: sessionId,
          url: page.url,
          title: page.title || null,
          skipped: page.skipped ? 1 : 0,
          error_message: page.error,
          warning_count: countWarnings(page.warnings),
        });
      this.db
        .prepare('DELETE FROM warnings WHERE session_id = ? AND page_url = ?')
        .run(sessionId, page.url);
      for (const type of warningTypes(page.warnings)) {
        for (const evidence of page.warnings[type] ?? []) {
          insertWarning.run(sessionId, page.url, type, JSON.stringify(evidence));
        }
      }
    })();
  }

  /**
   * Marks a session finished and records its keyword tally.
   * @param sessionId - The session to close.
   * @param report - The crawl's final report.
   */
  finishSession(sessionId: number, report: CrawlReport): void {
    const upsertKeyword = this.db.prepare(
      `INSERT INTO keywords (session_id, phrase, matches) VALUES (?, ?, ?)
       ON CONFLICT(session_id, phrase) DO UPDATE SET matches = excluded.matches`
    );
    this.db.transaction(() => {
      this.updateSessionStatus(sessionId, report.status, report.pages.length);
      for (const [phrase, matches] of Object.entries(report.keywordMatches)) {
        upsertKeyword.run(sessionId, phrase, matches);
      }
    })();
  }

  /**
   * Sets a session's terminal status, completion time and page count.
   */
  updateSessionStatus(sessionId: number, status: CrawlStatus, totalPages: number): void {
    this.db
      .prepare(
        `
      UPDATE sessions
      SET status = ?, completed_at = datetime('now'), total_pages = ?
      WHERE id = ?
    `
      )
      .run(status, totalPages, sessionId);
  }

  /**
   * Rebuilds the session's WarningMap from stored rows, in insertion order.
   * Rows with an unknown type or unreadable evidence are skipped.
   */
  getWarnings(sessionId: number): WarningMap {
    const rows = this.db
      .prepare<[number], { type: string; evidence: string }>(
        'SELECT type, evidence FROM warnings WHERE session_id = ? ORDER BY id'
      )
      .all(sessionId);
    const warnings: WarningMap = {};
    for (const row of rows) {
      const evidence = parseEvidence(row.evidence);
      if (!evidence || !isWarningType(row.type)) continue;
      mergeWarnings(warnings, { [row.type]: evidence });
    }
    return warnings;
  }

  /**
   * Returns the keyword tally recorded when the session finished.
   */
  getKeywordTally(sessionId: number): Record<string, number> {
    const rows = this.db
      .prepare<[number], { phrase: string; matches: number }>(
        'SELECT phrase, matches FROM keywords WHERE session_id = ? ORDER BY phrase'
      )
      .all(sessionId);
    return Object.fromEntries(rows.map((r) => [r.phrase, r.matches]));
  }
}

export default Db;

import type { Config } from './types';

export const DEFAULT_CONFIG: Config = {
  concurrency: 5,
  maxPages: 20,
  pageTimeoutMs: 30000,
  pollIntervalMs: 50,
  linkConcurrency: 5,
  linkTimeoutMs: 5000,
  linkMaxRedirects: 10,
  auditTabs: 2,
  userAgent: 'Mozilla/5.0 (compatible; Site-Audit-Bot/1.0)',
};

/**
 * Reads a positive integer from an environment value.
 * Unset, non-numeric and non-positive values fall back to the default.
 */
function positiveInt(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = parseInt(raw, 10);
  return Number.isNaN(value) || value < 1 ? fallback : value;
}

/**
 * Builds the runtime configuration from environment variables.
 * @param env - Defaults to process.env; pass an object in tests.
 * @returns A complete Config.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    concurrency: positiveInt(env.CRAWL_WORKERS, DEFAULT_CONFIG.concurrency),
    maxPages: positiveInt(env.MAX_PAGES, DEFAULT_CONFIG.maxPages),
    pageTimeoutMs: positiveInt(env.PAGE_TIMEOUT_MS, DEFAULT_CONFIG.pageTimeoutMs),
    pollIntervalMs: positiveInt(env.POLL_INTERVAL_MS, DEFAULT_CONFIG.pollIntervalMs),
    linkConcurrency: positiveInt(env.LINK_WORKERS, DEFAULT_CONFIG.linkConcurrency),
    linkTimeoutMs: positiveInt(env.LINK_TIMEOUT_MS, DEFAULT_CONFIG.linkTimeoutMs),
    linkMaxRedirects: positiveInt(env.LINK_MAX_REDIRECTS, DEFAULT_CONFIG.linkMaxRedirects),
    auditTabs: positiveInt(env.AUDIT_TABS, DEFAULT_CONFIG.auditTabs),
    userAgent: env.USER_AGENT || DEFAULT_CONFIG.userAgent,
  };
}

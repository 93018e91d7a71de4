import { LinkVerifier } from './links';
import { mergeWarnings } from './warnings';
import type { CheckName, Checks, ImageData, PageData, WarningEntries, WarningMap } from './types';

// Length bounds, in characters. Values on the bound itself are fine.
const TITLE_MIN_LENGTH = 30;
const TITLE_MAX_LENGTH = 65;
const DESCRIPTION_MIN_LENGTH = 30;
const DESCRIPTION_MAX_LENGTH = 165;

export const CHECK_NAMES: readonly CheckName[] = [
  'headings',
  'title',
  'description',
  'keywords',
  'images',
  'links',
  'security',
];

/** Bit flag per check, for callers that pass the enabled set as a mask. */
export const CHECK_FLAGS: Readonly<Record<CheckName, number>> = {
  headings: 1 << 0,
  title: 1 << 1,
  description: 1 << 2,
  keywords: 1 << 3,
  images: 1 << 4,
  links: 1 << 5,
  security: 1 << 6,
};

export const ALL_CHECKS_MASK = CHECK_NAMES.reduce((mask, name) => mask | CHECK_FLAGS[name], 0);

/** Defaults for explicit URL-list audits: no network-heavy checks. */
export const LIST_DEFAULT_CHECKS: Readonly<Checks> = {
  headings: true,
  title: true,
  description: true,
  keywords: true,
  images: false,
  links: false,
  security: true,
};

/**
 * Fills in a partial checks configuration. Anything not explicitly set is enabled,
 * so an absent configuration means every check runs.
 */
export function resolveChecks(partial?: Partial<Checks> | null): Checks {
  return {
    headings: partial?.headings ?? true,
    title: partial?.title ?? true,
    description: partial?.description ?? true,
    keywords: partial?.keywords ?? true,
    images: partial?.images ?? true,
    links: partial?.links ?? true,
    security: partial?.security ?? true,
  };
}

/**
 * Converts a bit mask into check toggles, one flag per check (see CHECK_FLAGS).
 * @param mask - OR of the enabled checks' flags.
 * @returns Toggles with every check whose bit is unset turned off.
 */
export function checksFromMask(mask: number): Checks {
  const on = (name: CheckName) => (mask & CHECK_FLAGS[name]) !== 0;
  return {
    headings: on('headings'),
    title: on('title'),
    description: on('description'),
    keywords: on('keywords'),
    images: on('images'),
    links: on('links'),
    security: on('security'),
  };
}

export function checksToMask(checks: Checks): number {
  return CHECK_NAMES.reduce((mask, name) => (checks[name] ? mask | CHECK_FLAGS[name] : mask), 0);
}

/** Length in code points, so an emoji counts as one character. */
function charLength(text: string): number {
  return Array.from(text).length;
}

function parseUrl(raw: string): URL | null {
  try {
    return new URL(raw);
  } catch {
    return null;
  }
}

function isHttpUrl(raw: string): boolean {
  const protocol = parseUrl(raw)?.protocol;
  return protocol === 'http:' || protocol === 'https:';
}

// ---------------------------------------------------------------------------
// Content checks (pure, no I/O)
// ---------------------------------------------------------------------------

/**
 * Flags pages with no H1, a blank H1, or more than one H1.
 * @param h1s - Text of every H1 on the page, in document order.
 * @param pageUrl - Evidence prefix.
 * @returns h1_multiple with the count, and/or h1_missing.
 */
export function checkHeadings(h1s: readonly string[], pageUrl: string): WarningEntries {
  const warnings: WarningEntries = {};
  if (h1s.length > 1) warnings.h1_multiple = [pageUrl, String(h1s.length)];
  if (h1s.length === 0 || h1s.some((text) => text.trim() === '')) {
    warnings.h1_missing = [pageUrl];
  }
  return warnings;
}

/**
 * Checks the title is present and 30 to 65 characters long.
 * @returns At most one title_* warning; too short/long evidence carries the title.
 */
export function checkTitle(title: string, pageUrl: string): WarningEntries {
  if (title === '') return { title_missing: [pageUrl] };
  const length = charLength(title);
  if (length < TITLE_MIN_LENGTH) return { title_too_short: [pageUrl, title] };
  if (length > TITLE_MAX_LENGTH) return { title_too_long: [pageUrl, title] };
  return {};
}

/**
 * Checks the meta description is present and 30 to 165 characters long.
 * @returns At most one meta_description_* warning.
 */
export function checkDescription(description: string, pageUrl: string): WarningEntries {
  if (description === '') return { meta_description_missing: [pageUrl] };
  const length = charLength(description);
  if (length < DESCRIPTION_MIN_LENGTH) return { meta_description_too_short: [pageUrl, description] };
  if (length > DESCRIPTION_MAX_LENGTH) return { meta_description_too_long: [pageUrl, description] };
  return {};
}

/**
 * Flags links that downgrade to plain http. All offenders go into a single evidence
 * entry, in page order.
 */
export function checkLinkProtocol(links: readonly string[], pageUrl: string): WarningEntries {
  const httpLinks = links.filter((href) => parseUrl(href)?.protocol === 'http:');
  return httpLinks.length > 0 ? { https_to_http_links: [pageUrl, ...httpLinks] } : {};
}

/** Flags a page served over plain http. */
export function checkPageProtocol(pageUrl: string): WarningEntries {
  return parseUrl(pageUrl)?.protocol === 'http:' ? { ssl_no: [pageUrl] } : {};
}

/**
 * Flags images with no alt attribute. An empty alt (decorative image) passes.
 * @param images - The page's images.
 * @param pageUrl - Evidence prefix.
 * @returns image_alt_missing listing the offending sources, or nothing.
 */
export function checkImageAlt(images: readonly ImageData[], pageUrl: string): WarningEntries {
  const missing = images.filter((img) => img.alt === null).map((img) => img.src);
  return missing.length > 0 ? { image_alt_missing: [pageUrl, ...missing] } : {};
}

// ---------------------------------------------------------------------------
// Keywords
// ---------------------------------------------------------------------------

// Process-wide; a word's pattern never changes once compiled.
const compiled = new Map<string, RegExp>();

/**
 * Case-insensitive whole-word pattern for a single word, compiled once per word.
 */
export function keywordPattern(word: string): RegExp {
  let re = compiled.get(word);
  if (!re) {
    const escaped = word.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    re = new RegExp(`\\b${escaped}\\b`, 'i');
    compiled.set(word, re);
  }
  return re;
}

/**
 * Returns the phrases whose every word appears as a whole word somewhere in `content`.
 * Words need not be adjacent or in order. Blank phrases never match.
 * @param content - Text to search, typically title + body text.
 * @param phrases - Keyword phrases; duplicates are reported once.
 */
export function matchKeywords(content: string, phrases: readonly string[]): string[] {
  const matched: string[] = [];
  for (const phrase of new Set(phrases)) {
    const words = phrase.split(/\s+/).filter(Boolean);
    if (words.length === 0) continue;
    if (words.every((word) => keywordPattern(word).test(content))) matched.push(phrase);
  }
  return matched;
}

/** Adds one page's matched phrases to a crawl-wide tally (mutates `tally`). */
export function tallyKeywords(tally: Map<string, number>, matched: readonly string[]): void {
  for (const phrase of matched) tally.set(phrase, (tally.get(phrase) ?? 0) + 1);
}

// ---------------------------------------------------------------------------
// Network-backed checks
// ---------------------------------------------------------------------------

function isCheckedPath(link: string, checkedPaths: ReadonlySet<string>): boolean {
  if (checkedPaths.size === 0) return false;
  const parsed = parseUrl(link);
  return checkedPaths.has(link) || (parsed !== null && checkedPaths.has(parsed.pathname));
}

/**
 * Verifies a page's outbound links and reports the dead ones in one evidence entry.
 * Links whose URL or path is in `checkedPaths` were verified elsewhere and are skipped.
 */
export async function checkBrokenLinks(
  pageUrl: string,
  links: readonly string[],
  verifier: LinkVerifier,
  checkedPaths: ReadonlySet<string> = new Set()
): Promise<WarningEntries> {
  const candidates = links.filter((link) => isHttpUrl(link) && !isCheckedPath(link, checkedPaths));
  if (candidates.length === 0) return {};
  const dead = await verifier.findDeadLinks(candidates);
  return dead.length > 0 ? { links_broken: [pageUrl, ...dead] } : {};
}

export async function checkBrokenImages(
  pageUrl: string,
  images: readonly ImageData[],
  verifier: LinkVerifier
): Promise<WarningEntries> {
  const sources = images.map((img) => img.src).filter(isHttpUrl);
  if (sources.length === 0) return {};
  const dead = await verifier.findDeadLinks(sources);
  return dead.length > 0 ? { image_url_broken: [pageUrl, ...dead] } : {};
}

// ---------------------------------------------------------------------------
// Pipeline
// ---------------------------------------------------------------------------

/** Inputs to runChecks() beyond the page itself. */
export interface CheckOptions {
  checks: Checks;
  keywords?: readonly string[];
  verifier?: LinkVerifier;
  checkedPaths?: Iterable<string>;
}

/** Everything the check pipeline produces for one page. */
export interface CheckOutcome {
  warnings: WarningMap;
  keywordMatches: string[];
}

/**
 * Runs every enabled check against one page.
 * Checks are merged in a fixed order, so identical input gives an identical map,
 * key order included.
 */
export async function runChecks(page: PageData, options: CheckOptions): Promise<CheckOutcome> {
  const { checks } = options;
  const warnings: WarningMap = {};
  const verifier = options.verifier ?? new LinkVerifier();

  if (checks.headings) mergeWarnings(warnings, checkHeadings(page.h1s, page.url));
  if (checks.title) mergeWarnings(warnings, checkTitle(page.title, page.url));
  if (checks.description) mergeWarnings(warnings, checkDescription(page.description, page.url));
  if (checks.links) {
    const checkedPaths = new Set(options.checkedPaths ?? []);
    mergeWarnings(warnings, await checkBrokenLinks(page.url, page.links, verifier, checkedPaths));
  }
  if (checks.security) {
    mergeWarnings(warnings, checkPageProtocol(page.url));
    mergeWarnings(warnings, checkLinkProtocol(page.links, page.url));
  }
  if (checks.images) {
    mergeWarnings(warnings, checkImageAlt(page.images, page.url));
    if (checks.links) {
      mergeWarnings(warnings, await checkBrokenImages(page.url, page.images, verifier));
    }
  }

  const keywords = options.keywords ?? [];
  const keywordMatches =
    checks.keywords && keywords.length > 0
      ? matchKeywords(`${page.title} ${page.bodyText}`, keywords)
      : [];

  return { warnings, keywordMatches };
}

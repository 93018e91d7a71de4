import { test } from 'node:test';
import assert from 'node:assert/strict';
import {
  ALL_CHECKS_MASK,
  LIST_DEFAULT_CHECKS,
  checkBrokenLinks,
  checkDescription,
  checkHeadings,
  checkImageAlt,
  checkLinkProtocol,
  checkPageProtocol,
  checkTitle,
  checksFromMask,
  checksToMask,
  matchKeywords,
  resolveChecks,
  runChecks,
  tallyKeywords,
} from '../src/checks';
import { LinkVerifier } from '../src/links';
import { extractPage } from '../src/render';
import { makePage } from './helpers';

const URL_A = 'https://example.com/a';

function verifierWithDead(...dead: string[]): { verifier: LinkVerifier; probed: string[] } {
  const probed: string[] = [];
  const verifier = new LinkVerifier({
    probe: async (url) => {
      probed.push(url);
      return !dead.includes(url);
    },
  });
  return { verifier, probed };
}

// ---------------------------------------------------------------------------
// Check configuration
// ---------------------------------------------------------------------------

test('resolveChecks: absent configuration enables every check', () => {
  assert.deepEqual(resolveChecks(), {
    headings: true,
    title: true,
    description: true,
    keywords: true,
    images: true,
    links: true,
    security: true,
  });
});

test('resolveChecks: partial configuration fills missing toggles with true', () => {
  const checks = resolveChecks({ links: false });
  assert.equal(checks.links, false);
  assert.equal(checks.images, true);
  assert.equal(checks.headings, true);
});

test('checksFromMask / checksToMask: bit flags map to toggles', () => {
  assert.deepEqual(checksFromMask(ALL_CHECKS_MASK), resolveChecks());
  assert.equal(ALL_CHECKS_MASK, 127);
  assert.equal(checksToMask(LIST_DEFAULT_CHECKS), 79);
  assert.deepEqual(checksFromMask(0b11), {
    headings: true,
    title: true,
    description: false,
    keywords: false,
    images: false,
    links: false,
    security: false,
  });
});

// ---------------------------------------------------------------------------
// Headings
// ---------------------------------------------------------------------------

test('checkHeadings: no H1 is missing', () => {
  assert.deepEqual(checkHeadings([], URL_A), { h1_missing: [URL_A] });
});

test('checkHeadings: one non-blank H1 passes', () => {
  assert.deepEqual(checkHeadings(['Welcome'], URL_A), {});
});

test('checkHeadings: several H1s records the count', () => {
  assert.deepEqual(checkHeadings(['One', 'Two', 'Three'], URL_A), { h1_multiple: [URL_A, '3'] });
});

test('checkHeadings: a blank H1 among several gives multiple then missing', () => {
  const warnings = checkHeadings(['One', '   '], URL_A);
  assert.deepEqual(Object.keys(warnings), ['h1_multiple', 'h1_missing']);
  assert.deepEqual(warnings.h1_multiple, [URL_A, '2']);
  assert.deepEqual(warnings.h1_missing, [URL_A]);
});

test('checkHeadings: a single blank H1 is missing', () => {
  assert.deepEqual(checkHeadings([''], URL_A), { h1_missing: [URL_A] });
});

// ---------------------------------------------------------------------------
// Title and description length bounds
// ---------------------------------------------------------------------------

test('checkTitle: empty title is missing', () => {
  assert.deepEqual(checkTitle('', URL_A), { title_missing: [URL_A] });
});

test('checkTitle: 29 chars is too short, 30 passes', () => {
  const short = 'a'.repeat(29);
  assert.deepEqual(checkTitle(short, URL_A), { title_too_short: [URL_A, short] });
  assert.deepEqual(checkTitle('a'.repeat(30), URL_A), {});
});

test('checkTitle: 65 chars passes, 66 is too long', () => {
  const long = 'a'.repeat(66);
  assert.deepEqual(checkTitle('a'.repeat(65), URL_A), {});
  assert.deepEqual(checkTitle(long, URL_A), { title_too_long: [URL_A, long] });
});

test('checkTitle: length counts characters, not UTF-16 units', () => {
  // 30 emoji are 60 UTF-16 units but 30 characters
  assert.deepEqual(checkTitle('😀'.repeat(30), URL_A), {});
});

test('checkDescription: bounds are 30 and 165', () => {
  assert.deepEqual(checkDescription('', URL_A), { meta_description_missing: [URL_A] });
  const short = 'd'.repeat(29);
  assert.deepEqual(checkDescription(short, URL_A), { meta_description_too_short: [URL_A, short] });
  assert.deepEqual(checkDescription('d'.repeat(30), URL_A), {});
  assert.deepEqual(checkDescription('d'.repeat(165), URL_A), {});
  const long = 'd'.repeat(166);
  assert.deepEqual(checkDescription(long, URL_A), { meta_description_too_long: [URL_A, long] });
});

// ---------------------------------------------------------------------------
// Protocol and images
// ---------------------------------------------------------------------------

test('checkLinkProtocol: all http links go into one entry in page order', () => {
  const links = ['http://a.example/x', 'https://b.example/', 'http://c.example/y'];
  assert.deepEqual(checkLinkProtocol(links, URL_A), {
    https_to_http_links: [URL_A, 'http://a.example/x', 'http://c.example/y'],
  });
  assert.deepEqual(checkLinkProtocol(['https://b.example/'], URL_A), {});
});

test('checkPageProtocol: plain http page has no ssl', () => {
  assert.deepEqual(checkPageProtocol('http://example.com/'), { ssl_no: ['http://example.com/'] });
  assert.deepEqual(checkPageProtocol(URL_A), {});
});

test('checkImageAlt: only absent alt attributes are flagged', () => {
  const images = [
    { src: 'https://example.com/1.png', alt: null },
    { src: 'https://example.com/2.png', alt: '' },
    { src: 'https://example.com/3.png', alt: 'A cat' },
  ];
  assert.deepEqual(checkImageAlt(images, URL_A), {
    image_alt_missing: [URL_A, 'https://example.com/1.png'],
  });
});

// ---------------------------------------------------------------------------
// Keywords
// ---------------------------------------------------------------------------

test('matchKeywords: every word must appear as a whole word, in any order', () => {
  const content = 'Fresh Coffee and roasted BEANS delivered daily';
  assert.deepEqual(matchKeywords(content, ['coffee beans', 'beans coffee', 'coffee tea']), [
    'coffee beans',
    'beans coffee',
  ]);
});

test('matchKeywords: partial words do not match', () => {
  assert.deepEqual(matchKeywords('Coffeehouse reviews', ['coffee']), []);
});

test('matchKeywords: blank phrases never match and duplicates are reported once', () => {
  assert.deepEqual(matchKeywords('tea time', ['', '   ', 'tea', 'tea']), ['tea']);
});

test('matchKeywords: regex metacharacters are matched literally', () => {
  assert.deepEqual(matchKeywords('version 1.5 released', ['1.5']), ['1.5']);
  assert.deepEqual(matchKeywords('version 105 released', ['1.5']), []);
});

test('tallyKeywords: counts pages per phrase', () => {
  const tally = new Map<string, number>([['tea', 0]]);
  tallyKeywords(tally, ['coffee']);
  tallyKeywords(tally, ['coffee', 'tea']);
  assert.deepEqual(Object.fromEntries(tally), { tea: 1, coffee: 2 });
});

// ---------------------------------------------------------------------------
// Broken links
// ---------------------------------------------------------------------------

test('checkBrokenLinks: dead links are reported once per page in input order', async () => {
  const { verifier } = verifierWithDead('https://example.com/gone', 'https://example.com/lost');
  const links = [
    'https://example.com/lost',
    'https://example.com/ok',
    'https://example.com/gone',
    'https://example.com/lost',
  ];
  assert.deepEqual(await checkBrokenLinks(URL_A, links, verifier), {
    links_broken: [URL_A, 'https://example.com/lost', 'https://example.com/gone'],
  });
});

test('checkBrokenLinks: checked paths are skipped by URL or by path', async () => {
  const { verifier, probed } = verifierWithDead('https://example.com/gone', 'https://example.com/lost');
  const links = ['https://example.com/gone', 'https://example.com/lost', 'https://example.com/ok'];
  const checked = new Set(['/gone', 'https://example.com/ok']);
  assert.deepEqual(await checkBrokenLinks(URL_A, links, verifier, checked), {
    links_broken: [URL_A, 'https://example.com/lost'],
  });
  assert.deepEqual(probed, ['https://example.com/lost']);
});

test('checkBrokenLinks: no live-check for non-http links', async () => {
  const { verifier, probed } = verifierWithDead();
  assert.deepEqual(await checkBrokenLinks(URL_A, ['ftp://example.com/file'], verifier), {});
  assert.deepEqual(probed, []);
});

// ---------------------------------------------------------------------------
// runChecks pipeline
// ---------------------------------------------------------------------------

test('runChecks: http page with an http link and a dead link', async () => {
  const { verifier } = verifierWithDead('https://example.com/dead');
  const page = makePage('http://example.com/', {
    links: ['http://example.com/plain', 'https://example.com/dead'],
  });
  const { warnings } = await runChecks(page, { checks: resolveChecks(), verifier });
  assert.deepEqual(warnings, {
    links_broken: [['http://example.com/', 'https://example.com/dead']],
    ssl_no: [['http://example.com/']],
    https_to_http_links: [['http://example.com/', 'http://example.com/plain']],
  });
});

test('runChecks: warning keys follow the fixed check order', async () => {
  const { verifier } = verifierWithDead('https://example.com/x.png');
  const page = makePage('http://example.com/', {
    title: '',
    description: '',
    h1s: [],
    images: [{ src: 'https://example.com/x.png', alt: null }],
  });
  const { warnings } = await runChecks(page, { checks: resolveChecks(), verifier });
  assert.deepEqual(Object.keys(warnings), [
    'h1_missing',
    'title_missing',
    'meta_description_missing',
    'ssl_no',
    'image_alt_missing',
    'image_url_broken',
  ]);
});

test('runChecks: disabled checks contribute nothing', async () => {
  const { verifier, probed } = verifierWithDead('https://example.com/dead');
  const page = makePage('http://example.com/', {
    title: '',
    h1s: [],
    links: ['https://example.com/dead'],
    images: [{ src: 'https://example.com/dead', alt: null }],
  });
  const { warnings } = await runChecks(page, { checks: { ...LIST_DEFAULT_CHECKS, security: false }, verifier });
  assert.deepEqual(warnings, { h1_missing: [['http://example.com/']], title_missing: [['http://example.com/']] });
  assert.deepEqual(probed, []);
});

test('runChecks: broken images need the links check too', async () => {
  const { verifier } = verifierWithDead('https://example.com/x.png');
  const page = makePage(URL_A, { images: [{ src: 'https://example.com/x.png', alt: 'x' }] });
  const withLinks = await runChecks(page, { checks: resolveChecks(), verifier });
  const withoutLinks = await runChecks(page, { checks: resolveChecks({ links: false }), verifier });
  assert.deepEqual(withLinks.warnings, { image_url_broken: [[URL_A, 'https://example.com/x.png']] });
  assert.deepEqual(withoutLinks.warnings, {});
});

test('runChecks: keywords are matched against title and body text', async () => {
  const page = makePage(URL_A, { title: 'Coffee roasting guide for beginners', bodyText: 'Pick good beans.' });
  const outcome = await runChecks(page, {
    checks: resolveChecks({ links: false }),
    keywords: ['coffee beans', 'tea'],
  });
  assert.deepEqual(outcome.keywordMatches, ['coffee beans']);

  const off = await runChecks(page, {
    checks: resolveChecks({ links: false, keywords: false }),
    keywords: ['coffee beans'],
  });
  assert.deepEqual(off.keywordMatches, []);
});

test('runChecks: keywords match words from adjacent block elements', async () => {
  const html = '<html><body><h1>Fresh</h1><p>Coffee beans</p><ul><li>tea</li><li>milk</li></ul></body></html>';
  const page = extractPage(html, URL_A);
  const outcome = await runChecks(page, {
    checks: resolveChecks({ links: false }),
    keywords: ['fresh', 'coffee', 'tea', 'milk'],
  });
  assert.deepEqual(outcome.keywordMatches, ['fresh', 'coffee', 'tea', 'milk']);
});

test('runChecks: identical input gives identical output', async () => {
  const { verifier } = verifierWithDead('https://example.com/dead');
  const page = makePage('http://example.com/', {
    title: 'short',
    links: ['https://example.com/dead', 'http://example.com/plain'],
  });
  const options = { checks: resolveChecks(), keywords: ['short'], verifier };
  const first = await runChecks(page, options);
  const second = await runChecks(page, options);
  assert.deepEqual(second, first);
  assert.deepEqual(Object.keys(second.warnings), Object.keys(first.warnings));
});

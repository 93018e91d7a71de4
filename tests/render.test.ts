import { test } from 'node:test';
import assert from 'node:assert/strict';
import { AxiosError } from 'axios';
import { RenderError } from '../src/errors';
import { HttpRenderer, extractPage } from '../src/render';
import { stubClient } from './helpers';

const PAGE_URL = 'https://example.com/blog/post';

const HTML = `<!doctype html>
<html>
<head>
  <title>  My   Blog
    Post </title>
  <meta name="description" content="  A post about things.  ">
</head>
<body>
  <h1> First   heading </h1>
  <h1>Second</h1>
  <a href="/about#team">About</a>
  <a href="other">Relative</a>
  <a href="mailto:someone@example.com">Mail</a>
  <a href="#top">Top</a>
  <a href="javascript:void(0)">Nothing</a>
  <a href="https://other.example/x">External</a>
  <img src="/img/a.png">
  <img src="b.png" alt="">
  <img alt="no source">
</body>
</html>`;

// ---------------------------------------------------------------------------
// extractPage
// ---------------------------------------------------------------------------

test('extractPage: title and H1s are whitespace-collapsed, description trimmed', () => {
  const page = extractPage(HTML, PAGE_URL);
  assert.equal(page.title, 'My Blog Post');
  assert.equal(page.description, 'A post about things.');
  assert.deepEqual(page.h1s, ['First heading', 'Second']);
  assert.equal(page.statusCode, 200);
});

test('extractPage: links are absolute, fragment-free and navigational only', () => {
  const page = extractPage(HTML, PAGE_URL);
  assert.deepEqual(page.links, [
    'https://example.com/about',
    'https://example.com/blog/other',
    'https://other.example/x',
  ]);
});

test('extractPage: images keep absent alt as null and empty alt as empty', () => {
  const page = extractPage(HTML, PAGE_URL);
  assert.deepEqual(page.images, [
    { src: 'https://example.com/img/a.png', alt: null },
    { src: 'https://example.com/blog/b.png', alt: '' },
  ]);
});

test('extractPage: body text leaves out scripts and styles', () => {
  const html = `<html><body>
<h1>Hello</h1>
<script>var hidden = 1;</script>
<style>p { color: red; }</style>
<p>World   text</p>
</body></html>`;
  assert.equal(extractPage(html, PAGE_URL).bodyText, 'Hello World text');
});

test('extractPage: adjacent block elements do not run their words together', () => {
  const html = '<html><body><h1>Fresh</h1><p>Coffee beans</p><ul><li>tea</li><li>milk</li></ul></body></html>';
  assert.equal(extractPage(html, PAGE_URL).bodyText, 'Fresh Coffee beans tea milk');
});

test('extractPage: line breaks and table cells separate words, inline tags do not', () => {
  const html = '<body><p>one<br>two</p><table><tr><td>three</td><td>four</td></tr></table><p>fi<b>ve</b></p></body>';
  assert.equal(extractPage(html, PAGE_URL).bodyText, 'one two three four five');
});

test('extractPage: links resolve against the document URL when it differs', () => {
  const html = '<body><a href="child">x</a><img src="pic.png" alt="p"></body>';
  const page = extractPage(html, 'https://example.com/a', 200, 'https://example.com/a/');
  assert.equal(page.url, 'https://example.com/a');
  assert.deepEqual(page.links, ['https://example.com/a/child']);
  assert.deepEqual(page.images, [{ src: 'https://example.com/a/pic.png', alt: 'p' }]);
});

test('extractPage: relative URLs resolve against <base href>', () => {
  const html = '<html><head><base href="https://cdn.example.com/site/"></head><body><a href="page">x</a></body></html>';
  assert.deepEqual(extractPage(html, PAGE_URL).links, ['https://cdn.example.com/site/page']);
});

test('extractPage: a page without head elements gives empty fields', () => {
  const page = extractPage('<p>just text</p>', PAGE_URL);
  assert.equal(page.title, '');
  assert.equal(page.description, '');
  assert.deepEqual(page.h1s, []);
});

// ---------------------------------------------------------------------------
// HttpRenderer
// ---------------------------------------------------------------------------

test('HttpRenderer: renders an HTML response', async () => {
  const { client } = stubClient({
    [PAGE_URL]: { status: 200, headers: { 'content-type': 'text/html; charset=utf-8' }, data: HTML },
  });
  const page = await new HttpRenderer({ client }).render(PAGE_URL, 1000);
  assert.equal(page.url, PAGE_URL);
  assert.equal(page.title, 'My Blog Post');
});

test('HttpRenderer: HTTP errors raise RenderError with the status', async () => {
  const { client } = stubClient({ [PAGE_URL]: { status: 503, headers: { 'content-type': 'text/html' } } });
  await assert.rejects(new HttpRenderer({ client }).render(PAGE_URL, 1000), (err: unknown) => {
    assert.ok(err instanceof RenderError);
    assert.equal(err.message, 'HTTP 503');
    assert.equal(err.statusCode, 503);
    assert.equal(err.url, PAGE_URL);
    return true;
  });
});

test('HttpRenderer: non-HTML content is refused', async () => {
  const { client } = stubClient({ [PAGE_URL]: { status: 200, headers: { 'content-type': 'application/pdf' } } });
  await assert.rejects(new HttpRenderer({ client }).render(PAGE_URL, 1000), {
    name: 'RenderError',
    message: 'Non-HTML content type: application/pdf',
  });
});

test('HttpRenderer: timeouts are reported with the limit', async () => {
  const { client } = stubClient({ [PAGE_URL]: new AxiosError('timeout of 250ms exceeded', 'ECONNABORTED') });
  await assert.rejects(new HttpRenderer({ client }).render(PAGE_URL, 250), {
    name: 'RenderError',
    message: 'Timed out after 250ms',
  });
});

test('HttpRenderer: transport errors keep their message', async () => {
  const { client } = stubClient({});
  await assert.rejects(new HttpRenderer({ client }).render(PAGE_URL, 1000), {
    name: 'RenderError',
    message: `connect ECONNREFUSED ${PAGE_URL}`,
  });
});

test('HttpRenderer: links on a redirected page resolve against the final URL', async () => {
  const requested = 'https://example.com/a';
  const { client } = stubClient({
    [requested]: {
      status: 200,
      headers: { 'content-type': 'text/html' },
      data: '<html><body><a href="child">Child</a></body></html>',
      finalUrl: 'https://example.com/a/',
    },
  });
  const page = await new HttpRenderer({ client }).render(requested, 1000);
  assert.equal(page.url, requested);
  assert.deepEqual(page.links, ['https://example.com/a/child']);
});

test('HttpRenderer: fetchHtml reports the document and where it was served from', async () => {
  const { client } = stubClient({
    [PAGE_URL]: { status: 200, headers: { 'content-type': 'text/html' }, data: '<p>hi</p>' },
  });
  const fetched = await new HttpRenderer({ client }).fetchHtml(PAGE_URL, 1000);
  assert.deepEqual(fetched, { html: '<p>hi</p>', statusCode: 200, finalUrl: PAGE_URL });
});

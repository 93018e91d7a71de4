import axios from 'axios';
import type { AxiosInstance, InternalAxiosRequestConfig } from 'axios';
import { setTimeout as sleep } from 'node:timers/promises';
import { RenderError } from '../src/errors';
import type { PageData, PageRenderer } from '../src/types';

/** A canned HTTP response for stubClient(). */
export interface StubResponse {
  status: number;
  headers?: Record<string, string>;
  data?: string;
  /** URL the response claims to come from, as after a followed redirect. */
  finalUrl?: string;
}

/**
 * axios instance whose adapter answers from `routes` (keyed by absolute URL) and
 * records every requested URL. Unknown URLs throw like a refused connection.
 */
export function stubClient(routes: Record<string, StubResponse | Error>): {
  client: AxiosInstance;
  requests: string[];
} {
  const requests: string[] = [];
  const client = axios.create({
    adapter: async (config: InternalAxiosRequestConfig) => {
      const url = config.url ?? '';
      requests.push(url);
      const route = routes[url];
      if (route === undefined) throw new Error(`connect ECONNREFUSED ${url}`);
      if (route instanceof Error) throw route;
      return {
        data: route.data ?? '',
        status: route.status,
        statusText: '',
        headers: route.headers ?? {},
        config,
        request: route.finalUrl !== undefined ? { res: { responseUrl: route.finalUrl } } : {},
      };
    },
  });
  return { client, requests };
}

/** Builds PageData with passing defaults for every content check. */
export function makePage(url: string, overrides: Partial<PageData> = {}): PageData {
  return {
    url,
    statusCode: 200,
    title: 'A perfectly reasonable page title here',
    description: 'A description that is long enough to pass the length check.',
    bodyText: 'Some body text.',
    h1s: ['Heading'],
    links: [],
    images: [],
    ...overrides,
  };
}

/**
 * In-memory site: renders pages from a map, throws RenderError('HTTP 404') for
 * anything else, and counts calls.
 */
export class FakeRenderer implements PageRenderer {
  readonly calls: string[] = [];

  constructor(
    private readonly pages: Map<string, PageData | Error>,
    private readonly delayMs = 0
  ) {}

  async render(url: string): Promise<PageData> {
    this.calls.push(url);
    if (this.delayMs > 0) await sleep(this.delayMs);
    const page = this.pages.get(url);
    if (page === undefined) throw new RenderError(url, 'HTTP 404', 404);
    if (page instanceof Error) throw page;
    return page;
  }
}

/** Polls `condition` until it holds, failing after `timeoutMs`. */
export async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) throw new Error('waitFor: condition not met in time');
    await sleep(2);
  }
}

import { Readable } from 'node:stream';
import axios from 'axios';
import type { AxiosInstance } from 'axios';
import pLimit from 'p-limit';
import { DEFAULT_CONFIG } from './config';
import { toError } from './errors';

type Limit = ReturnType<typeof pLimit>;

/** Resolves true when a URL is alive. Must not reject. */
export type LinkProbe = (url: string) => Promise<boolean>;

/** Options for probeLink(). */
export interface ProbeOptions {
  timeoutMs?: number;
  maxRedirects?: number;
  userAgent?: string;
  /** HTTP client; defaults to the shared axios instance. */
  client?: AxiosInstance;
}

/**
 * Checks whether a URL responds with 2xx or 3xx.
 * Issues a GET for the first byte only and follows redirects by hand so that once
 * `maxRedirects` hops have been followed the last response is taken as is.
 * The timeout covers the whole redirect chain. Transport failures count as dead.
 * @param url - Absolute http(s) URL.
 * @returns true if alive, false otherwise. Never rejects.
 */
export async function probeLink(url: string, options: ProbeOptions = {}): Promise<boolean> {
  const client = options.client ?? axios;
  const maxRedirects = options.maxRedirects ?? DEFAULT_CONFIG.linkMaxRedirects;
  const signal = AbortSignal.timeout(options.timeoutMs ?? DEFAULT_CONFIG.linkTimeoutMs);

  let currentUrl = url;
  try {
    for (let hop = 0; ; hop++) {
      const response = await client.get<unknown>(currentUrl, {
        signal,
        maxRedirects: 0,
        responseType: 'stream',
        validateStatus: null,
        headers: {
          Range: 'bytes=0-0',
          'User-Agent': options.userAgent ?? DEFAULT_CONFIG.userAgent,
        },
      });
      // Only the status matters
      if (response.data instanceof Readable) response.data.destroy();

      const { status } = response;
      const location: unknown = response.headers['location'];
      if (status >= 300 && status < 400 && typeof location === 'string' && hop < maxRedirects) {
        currentUrl = new URL(location, currentUrl).href;
        continue;
      }
      return status >= 200 && status < 400;
    }
  } catch {
    return false;
  }
}

/** Options for a LinkVerifier. */
export interface LinkVerifierOptions {
  /** Probes in flight at once per findDeadLinks() call. */
  concurrency?: number;
  probe?: LinkProbe;
}

/**
 * Tests link liveness with a small concurrent pool and remembers every answer for
 * its own lifetime (one verifier per crawl). A URL is probed at most once, even when
 * several pages ask about it at the same time: the cache entry is the in-flight
 * probe itself, stored before the probe starts.
 */
export class LinkVerifier {
  private readonly cache = new Map<string, Promise<boolean>>();
  private readonly concurrency: number;
  private readonly probe: LinkProbe;

  constructor(options: LinkVerifierOptions = {}) {
    this.concurrency = options.concurrency ?? DEFAULT_CONFIG.linkConcurrency;
    this.probe = options.probe ?? ((url) => probeLink(url));
  }

  /** Number of distinct URLs looked up so far. */
  get size(): number {
    return this.cache.size;
  }

  /**
   * Checks a batch of URLs and returns the dead ones.
   * Duplicates in `urls` are collapsed; output follows first-occurrence order.
   */
  async findDeadLinks(urls: readonly string[]): Promise<string[]> {
    const limit = pLimit(this.concurrency);
    const unique = [...new Set(urls)];
    const alive = await Promise.all(unique.map((url) => this.lookup(url, limit)));
    return unique.filter((_, i) => !alive[i]);
  }

  /** Single-URL lookup through the cache. */
  isAlive(url: string): Promise<boolean> {
    return this.lookup(url, pLimit(1));
  }

  private lookup(url: string, limit: Limit): Promise<boolean> {
    const cached = this.cache.get(url);
    if (cached) return cached;

    const pending = limit(() => this.probe(url)).catch((err: unknown) => {
      console.warn(`Link probe failed for ${url}: ${toError(err).message}`);
      return false;
    });
    this.cache.set(url, pending);
    return pending;
  }
}

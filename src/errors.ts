/** The crawl input is structurally invalid (e.g. an unparseable start URL). Nothing was started. */
export class CrawlInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CrawlInputError';
  }
}

/** A page could not be rendered. Recorded on that page's result; the crawl continues. */
export class RenderError extends Error {
  readonly url: string;
  readonly statusCode: number | null;

  constructor(url: string, message: string, statusCode: number | null = null) {
    super(message);
    this.name = 'RenderError';
    this.url = url;
    this.statusCode = statusCode;
  }
}

/** Normalizes an unknown thrown value into an Error. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

import { toError } from './errors';

/** What a worker deposits for one URL. Exactly one of result/error is non-null. */
export interface TaskResult<T> {
  url: string;
  result: T | null;
  error: Error | null;
}

/** Processes one URL. A rejection is captured on the TaskResult, never rethrown. */
export type TaskFunction<T> = (url: string) => Promise<T>;

/**
 * A fixed number of workers draining a queue of URL tasks that grows while it runs.
 * Every URL is accepted at most once for the pool's lifetime: schedule() checks and
 * records in one synchronous step, so two callers racing on the same URL cannot both win.
 */
export class WorkPool<T> {
  private readonly seen = new Set<string>();
  private readonly queue: string[] = [];
  private readonly collected: TaskResult<T>[] = [];
  private waiting: (() => void)[] = [];
  private workers: Promise<void>[] = [];
  private inFlight = 0;
  private started = false;
  private stopped = false;
  private stopping: Promise<void> | null = null;
  private dropped = 0;

  /**
   * @param size - Number of parallel workers (at least 1).
   */
  constructor(private readonly size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`WorkPool size must be a positive integer, got: ${size}`);
    }
  }

  /** URLs ever accepted by schedule(). */
  get accepted(): number {
    return this.seen.size;
  }

  /** URLs that were queued but never started because the pool stopped. */
  get discarded(): number {
    return this.dropped;
  }

  /** Nothing queued and nothing running. */
  get idle(): boolean {
    return this.queue.length === 0 && this.inFlight === 0;
  }

  /**
   * Queues a URL unless it was seen before.
   * @returns true if newly accepted; false for duplicates or once the pool is stopped.
   */
  schedule(url: string): boolean {
    if (this.stopped || this.seen.has(url)) return false;
    this.seen.add(url);
    this.queue.push(url);
    this.wake();
    return true;
  }

  /** True if the URL was ever accepted (completed, running or queued). */
  has(url: string): boolean {
    return this.seen.has(url);
  }

  /**
   * Launches the workers. Each takes the next queued URL, awaits `processFn` on it and
   * collects the outcome.
   */
  start(processFn: TaskFunction<T>): void {
    if (this.started) throw new Error('WorkPool already started');
    this.started = true;
    for (let id = 0; id < this.size; id++) {
      this.workers.push(this.work(id, processFn));
    }
  }

  /** Copy of the results collected so far, in completion order. */
  results(): TaskResult<T>[] {
    return [...this.collected];
  }

  /**
   * Stops taking tasks. Queued URLs are dropped; resolves once every in-flight task has
   * been collected. Later calls return the same promise.
   */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopped = true;
      this.dropped = this.queue.length;
      this.queue.length = 0;
      this.wake();
      this.stopping = Promise.all(this.workers).then(() => undefined);
    }
    return this.stopping;
  }

  private wake(): void {
    const waiting = this.waiting;
    this.waiting = [];
    for (const resolve of waiting) resolve();
  }

  /**
   * Resolves with the next URL to process, or null once stopped.
   * The in-flight count is taken at hand-off so that `idle` never reads true
   * between a URL leaving the queue and its result being collected.
   */
  private async next(): Promise<string | null> {
    for (;;) {
      if (this.stopped) return null;
      const url = this.queue.shift();
      if (url !== undefined) {
        this.inFlight++;
        return url;
      }
      await new Promise<void>((resolve) => this.waiting.push(resolve));
    }
  }

  private async work(id: number, processFn: TaskFunction<T>): Promise<void> {
    for (;;) {
      const url = await this.next();
      if (url === null) return;

      let entry: TaskResult<T>;
      try {
        entry = { url, result: await processFn(url), error: null };
      } catch (err) {
        const error = toError(err);
        entry = { url, result: null, error };
        console.warn(`Worker ${id}: error processing ${url}: ${error.message}`);
      }
      this.collected.push(entry);
      this.inFlight--;
    }
  }
}

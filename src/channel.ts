import { EventEmitter } from 'node:events';
import { toError } from './errors';

/** A message on the crawl channel. */
export interface ChannelMessage {
  taskId: string;
  event: 'page' | 'cancel' | (string & {});
  message?: Record<string, unknown>;
  /** Stamped by publish() when absent. */
  publishedAt?: Date;
}

export type ChannelHandler = (message: ChannelMessage) => void;

/**
 * Crawl-scoped message channel: the crawler publishes progress on it and listens on it
 * for cancel requests.
 */
export interface CrawlChannel {
  publish(message: ChannelMessage): Promise<void>;
  /**
   * Delivers messages for `taskId` published at or after the moment of subscribing.
   * @returns A function that ends the subscription.
   */
  subscribe(taskId: string, handler: ChannelHandler): () => void;
}

/**
 * In-process CrawlChannel. Good for the CLI (SIGINT publishes a cancel) and for tests.
 */
export class MemoryChannel implements CrawlChannel {
  private readonly emitter = new EventEmitter();
  private readonly now: () => Date;

  constructor(options: { now?: () => Date } = {}) {
    this.now = options.now ?? (() => new Date());
    // Every running crawl holds one listener.
    this.emitter.setMaxListeners(0);
  }

  async publish(message: ChannelMessage): Promise<void> {
    this.emitter.emit('message', { ...message, publishedAt: message.publishedAt ?? this.now() });
  }

  subscribe(taskId: string, handler: ChannelHandler): () => void {
    const since = this.now().getTime();
    const listener = (message: ChannelMessage): void => {
      if (message.taskId !== taskId) return;
      // Replay protection: ignore anything stamped before this subscription began.
      if ((message.publishedAt?.getTime() ?? since) < since) return;
      try {
        handler(message);
      } catch (err) {
        console.warn(`Channel handler for task ${taskId} failed: ${toError(err).message}`);
      }
    };
    this.emitter.on('message', listener);
    return () => {
      this.emitter.off('message', listener);
    };
  }
}

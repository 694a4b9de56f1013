/**
 * NewsScout — Feed Source Base
 *
 * Abstract base class for feed sources. Sources are external
 * collaborators: they retrieve and parse feed documents and hand
 * back RawItems. Everything after that is the pipeline's job.
 */

import type { RawItem, SourceFetchResult } from '../types';
import { scopedLogger, errorMessage, type Logger } from '../lib/logger';

export abstract class FeedSource {
  /** Stable identifier, copied into every RawItem as sourceId */
  abstract readonly id: string;

  protected readonly logger: Logger = scopedLogger('feed-source');

  /**
   * Fetch raw items from the source.
   */
  abstract fetch(signal?: AbortSignal): Promise<RawItem[]>;

  /**
   * Fetch with logging; never throws.
   */
  async safeFetch(signal?: AbortSignal): Promise<{ items: RawItem[]; result: SourceFetchResult }> {
    const startTime = Date.now();
    this.logger.info('Starting fetch', { source: this.id });

    try {
      const items = await this.fetch(signal);
      const durationMs = Date.now() - startTime;

      this.logger.info('Fetch completed', { source: this.id, itemsFound: items.length, durationMs });

      return {
        items,
        result: { sourceId: this.id, itemCount: items.length, durationMs },
      };
    } catch (error) {
      const message = errorMessage(error);
      const durationMs = Date.now() - startTime;

      this.logger.error('Fetch failed', { source: this.id, error: message, durationMs });

      return {
        items: [],
        result: { sourceId: this.id, itemCount: 0, durationMs, error: message },
      };
    }
  }
}

/**
 * Source backed by a fixed list of items. Useful for replays and dry runs.
 */
export class StaticFeedSource extends FeedSource {
  constructor(
    readonly id: string,
    private readonly items: readonly RawItem[]
  ) {
    super();
  }

  async fetch(): Promise<RawItem[]> {
    return [...this.items];
  }
}

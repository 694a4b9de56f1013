/**
 * NewsScout — Feed Aggregator
 *
 * Fetches every configured source concurrently, each raced against
 * a timeout, and concatenates the results in source order.
 * A failing source is recorded; the run only fails when none answer.
 */

import type { AggregatedFeed, RawItem, SourceFetchResult } from '../types';
import type { FeedSource } from './base';
import { withTimeout } from '../lib/timeout';
import { scopedLogger } from '../lib/logger';

const log = scopedLogger('aggregator');

export interface AggregatorConfig {
  /** Timeout per source in ms */
  sourceTimeoutMs?: number;
  /** Maximum items kept per source */
  maxItemsPerSource?: number;
}

const DEFAULT_CONFIG: Required<AggregatorConfig> = {
  sourceTimeoutMs: 30_000,
  maxItemsPerSource: 30,
};

async function fetchFromSource(
  source: FeedSource,
  config: Required<AggregatorConfig>
): Promise<{ items: RawItem[]; result: SourceFetchResult }> {
  const startTime = Date.now();
  const outcome = await withTimeout(signal => source.safeFetch(signal), config.sourceTimeoutMs);

  if (outcome.status === 'timeout') {
    const error = `Timeout after ${outcome.timeoutMs}ms`;
    log.warn('Source fetch timed out', { source: source.id, timeoutMs: outcome.timeoutMs });
    return {
      items: [],
      result: { sourceId: source.id, itemCount: 0, durationMs: Date.now() - startTime, error },
    };
  }

  const { items, result } = outcome.value;
  const limited = items.slice(0, config.maxItemsPerSource);

  return {
    items: limited,
    result: { ...result, itemCount: limited.length },
  };
}

/**
 * Fetch raw items from all sources.
 */
export async function aggregateFeeds(
  sources: readonly FeedSource[],
  config: AggregatorConfig = {}
): Promise<AggregatedFeed> {
  const mergedConfig: Required<AggregatorConfig> = { ...DEFAULT_CONFIG, ...config };

  if (sources.length === 0) {
    log.warn('No sources to fetch from');
    return {
      items: [],
      sourceResults: [],
      errors: ['No sources configured'],
      allFailed: true,
    };
  }

  log.info('Starting feed aggregation', { sources: sources.length });

  const fetched = await Promise.all(sources.map(source => fetchFromSource(source, mergedConfig)));

  const items = fetched.flatMap(f => f.items);
  const sourceResults = fetched.map(f => f.result);
  const errors = sourceResults
    .filter(r => r.error !== undefined)
    .map(r => `${r.sourceId}: ${r.error}`);
  const allFailed = errors.length === sources.length;

  log.info('Feed aggregation completed', {
    sources: sources.length,
    failedSources: errors.length,
    items: items.length,
  });

  return { items, sourceResults, errors, allFailed };
}

/**
 * NewsScout — Feeds Module
 *
 * Ingestion side of the pipeline: sources, normalization, grouping.
 */

export { FeedSource, StaticFeedSource } from './base';
export { RssFeedSource, toRawItem, extractHrefs, type RssFeedSourceOptions } from './sources/rss';

export {
  normalizeItem,
  normalizeItems,
  canonicalLink,
  identityKey,
  cleanSummary,
  cleanTitle,
} from './normalizer';

export {
  groupItems,
  itemSimilarity,
  jaccard,
  tokenize,
  stripPublisher,
  DEFAULT_SIMILARITY_THRESHOLD,
  type GroupingOptions,
} from './grouper';

export { aggregateFeeds, type AggregatorConfig } from './aggregator';

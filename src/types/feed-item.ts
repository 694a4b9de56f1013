/**
 * NewsScout — Feed Item Types
 *
 * Raw items as feed sources yield them, and the canonical form
 * every later stage works on.
 */

// ============================================================
// RAW ITEMS
// ============================================================

/**
 * Candidate item produced by a feed source. Never mutated after creation.
 */
export type RawItem = Readonly<{
  title: string;
  /** Article URL, the identity candidate */
  link: string;
  summary: string;
  /** ISO-8601 */
  publishedAt: string;
  sourceId: string;
  /** Coverage of the same story linked from the item description */
  relatedLinks?: readonly string[];
}>;

// ============================================================
// NORMALIZED ITEMS
// ============================================================

export interface NormalizedItem {
  title: string;
  link: string;
  summary: string;
  publishedAt: string;
  sourceId: string;
  relatedLinks: string[];
  /** SHA-1 of the canonical link, 16 hex chars */
  identityKey: string;
  /** First-seen index in the run's input */
  position: number;
}

export type SkipReason = 'empty_title' | 'invalid_published_at';

export interface SkippedItem {
  link: string;
  sourceId: string;
  reason: SkipReason;
}

export interface NormalizationResult {
  items: NormalizedItem[];
  skipped: SkippedItem[];
  /** Later occurrences of an identity key that were dropped */
  duplicates: number;
}

// ============================================================
// FEED FETCHING
// ============================================================

export interface SourceFetchResult {
  sourceId: string;
  itemCount: number;
  durationMs: number;
  error?: string;
}

export interface AggregatedFeed {
  items: RawItem[];
  sourceResults: SourceFetchResult[];
  errors: string[];
  /** True when no source answered (including when none were configured) */
  allFailed: boolean;
}

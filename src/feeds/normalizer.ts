/**
 * NewsScout — Item Normalizer
 *
 * Converts raw items into canonical records and collapses exact
 * repeats of the same link (first occurrence wins).
 */

import { createHash } from 'crypto';
import type { RawItem, NormalizedItem, NormalizationResult, SkippedItem } from '../types';
import { scopedLogger } from '../lib/logger';

const log = scopedLogger('normalizer');

// ============================================================
// TEXT CLEANUP
// ============================================================

const ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&apos;': "'",
  '&nbsp;': ' ',
};

const ENTITY_PATTERN = /&(?:amp|lt|gt|quot|#39|apos|nbsp);/g;

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

// Opening or closing tags only; a bare "<" in prose is left alone
const TAG_PATTERN = /<\/?[a-zA-Z][^>]*>/g;

function stripHtmlOnce(html: string): string {
  const text = html
    .replace(/<style[^>]*>[\s\S]*?<\/style>/gi, ' ')
    .replace(/<script[^>]*>[\s\S]*?<\/script>/gi, ' ')
    .replace(TAG_PATTERN, ' ')
    .replace(ENTITY_PATTERN, entity => ENTITIES[entity] ?? entity);
  return collapseWhitespace(text);
}

/**
 * Strip markup and entities from a summary.
 * Feeds often escape their HTML, so markup revealed by decoding is
 * stripped on the next pass. Repeats until nothing changes, which
 * makes the result a fixed point.
 */
export function cleanSummary(summary: string): string {
  let current = collapseWhitespace(summary);
  for (;;) {
    const next = stripHtmlOnce(current);
    if (next === current) return current;
    current = next;
  }
}

export function cleanTitle(title: string): string {
  return collapseWhitespace(title);
}

// ============================================================
// IDENTITY
// ============================================================

/**
 * Canonical form of a link for identity purposes: lowercase host,
 * no fragment, no trailing slash. The query string is kept because
 * aggregator links often carry the article id there.
 */
export function canonicalLink(link: string): string {
  const trimmed = link.trim();

  try {
    const url = new URL(trimmed);
    const path = url.pathname.replace(/\/+$/, '');
    return `${url.protocol}//${url.host.toLowerCase()}${path}${url.search}`;
  } catch {
    return trimmed.toLowerCase();
  }
}

export function identityKey(link: string): string {
  return createHash('sha1').update(canonicalLink(link)).digest('hex').slice(0, 16);
}

function canonicalTimestamp(value: string): string | null {
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
}

// ============================================================
// NORMALIZATION
// ============================================================

/**
 * Normalize a single item. Returns the skip reason when the item is unusable.
 */
export function normalizeItem(
  raw: RawItem,
  position: number
): NormalizedItem | SkippedItem {
  const title = cleanTitle(raw.title);
  const link = raw.link.trim();

  if (title.length === 0) {
    return { link, sourceId: raw.sourceId, reason: 'empty_title' };
  }

  const publishedAt = canonicalTimestamp(raw.publishedAt);
  if (publishedAt === null) {
    return { link, sourceId: raw.sourceId, reason: 'invalid_published_at' };
  }

  const relatedLinks = [...new Set((raw.relatedLinks ?? []).map(l => l.trim()))].filter(
    l => l.length > 0 && l !== link
  );

  return {
    title,
    link,
    summary: cleanSummary(raw.summary),
    publishedAt,
    sourceId: raw.sourceId,
    relatedLinks,
    identityKey: identityKey(link),
    position,
  };
}

function isSkipped(result: NormalizedItem | SkippedItem): result is SkippedItem {
  return 'reason' in result;
}

/**
 * Normalize a batch of raw items.
 * `position` numbers the kept items in order, so normalizing the
 * output again yields the same sequence.
 */
export function normalizeItems(rawItems: readonly RawItem[]): NormalizationResult {
  const items: NormalizedItem[] = [];
  const skipped: SkippedItem[] = [];
  const seen = new Set<string>();
  let duplicates = 0;

  for (const raw of rawItems) {
    const result = normalizeItem(raw, items.length);

    if (isSkipped(result)) {
      log.warn('Item skipped', { ...result });
      skipped.push(result);
      continue;
    }

    if (seen.has(result.identityKey)) {
      duplicates++;
      log.debug('Duplicate link dropped', { link: result.link, sourceId: result.sourceId });
      continue;
    }

    seen.add(result.identityKey);
    items.push(result);
  }

  log.info('Normalization completed', {
    input: rawItems.length,
    kept: items.length,
    skipped: skipped.length,
    duplicates,
  });

  return { items, skipped, duplicates };
}

/**
 * NewsScout — RSS Feed Source
 *
 * Fetches an RSS/Atom document and maps its entries to RawItems.
 * Aggregated feeds (Google News and similar) list coverage by other
 * outlets as links inside the description; those become relatedLinks.
 */

import Parser from 'rss-parser';
import { FeedSource } from '../base';
import type { RawItem } from '../../types';

const FETCH_TIMEOUT_MS = 10_000;

const REQUEST_HEADERS = {
  'User-Agent': 'newsscout/0.1 (feed reader)',
  Accept: 'application/rss+xml, application/atom+xml, application/xml, text/xml, */*',
};

type RssItem = Parser.Item & { description?: string };

const parser = new Parser<Record<string, unknown>, { description?: string }>({
  customFields: {
    item: ['description'],
  },
});

const HREF_PATTERN = /<a\s[^>]*href=["']([^"']+)["']/gi;

/**
 * Pull every anchor href out of an HTML fragment.
 */
export function extractHrefs(html: string | undefined): string[] {
  if (!html) return [];
  return Array.from(html.matchAll(HREF_PATTERN), match => match[1]);
}

/**
 * Map one parsed feed entry to a RawItem. Entries without a link are dropped.
 * An entry without a date keeps an empty publishedAt, which the
 * normalizer rejects.
 */
export function toRawItem(entry: RssItem, sourceId: string): RawItem | null {
  const link = entry.link?.trim();
  if (!link) return null;

  const html = entry.description ?? entry.content;
  const relatedLinks = extractHrefs(html).filter(href => href !== link);

  return {
    title: entry.title ?? '',
    link,
    summary: entry.contentSnippet ?? entry.summary ?? html ?? '',
    publishedAt: entry.isoDate ?? entry.pubDate ?? '',
    sourceId,
    relatedLinks,
  };
}

export interface RssFeedSourceOptions {
  /** Defaults to the feed URL's host */
  id?: string;
  maxItems?: number;
}

export class RssFeedSource extends FeedSource {
  readonly id: string;
  private readonly maxItems: number;

  constructor(
    readonly url: string,
    options: RssFeedSourceOptions = {}
  ) {
    super();
    this.id = options.id ?? sourceIdFromUrl(url);
    this.maxItems = options.maxItems ?? 30;
  }

  /**
   * Download and parse the feed. Without a caller signal the request
   * is bounded by its own timeout.
   */
  async fetch(signal?: AbortSignal): Promise<RawItem[]> {
    const response = await fetch(this.url, {
      headers: REQUEST_HEADERS,
      signal: signal ?? AbortSignal.timeout(FETCH_TIMEOUT_MS),
    });

    if (!response.ok) {
      throw new Error(`HTTP ${response.status} from ${this.url}`);
    }

    const feed = await parser.parseString(await response.text());

    return feed.items
      .slice(0, this.maxItems)
      .map(entry => toRawItem(entry, this.id))
      .filter((item): item is RawItem => item !== null);
  }
}

function sourceIdFromUrl(url: string): string {
  try {
    return new URL(url).hostname.replace(/^www\./, '');
  } catch {
    return url;
  }
}

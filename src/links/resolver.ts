/**
 * NewsScout — Article Link Resolution
 *
 * Aggregator feeds hand out redirect links instead of publisher URLs.
 * A LinkResolver turns one into the article URL; when it cannot, the
 * raw link is kept so a report never loses a story link.
 */

import type { Report } from '../types';
import { withTimeout } from '../lib/timeout';
import { scopedLogger, errorMessage } from '../lib/logger';
import { deepFreeze } from '../report/builder';

const log = scopedLogger('links');

export const DEFAULT_LINK_TIMEOUT_MS = 10_000;

export interface LinkResolver {
  /**
   * Return the article URL behind `link`, or `link` itself when it is
   * already one. May reject; callers fall back to the raw link.
   */
  resolve(link: string, signal: AbortSignal): Promise<string>;
}

/**
 * Resolve one link, falling back to the raw link on timeout, error or an
 * empty answer. Never throws.
 */
export async function resolveArticleUrl(
  link: string,
  resolver: LinkResolver,
  timeoutMs: number = DEFAULT_LINK_TIMEOUT_MS
): Promise<string> {
  try {
    const outcome = await withTimeout(signal => resolver.resolve(link, signal), timeoutMs);

    if (outcome.status === 'timeout') {
      log.warn('Link resolution timed out, keeping raw link', { link, timeoutMs });
      return link;
    }

    const resolved = outcome.value.trim();
    if (resolved.length === 0) {
      log.warn('Link resolver returned nothing, keeping raw link', { link });
      return link;
    }

    return resolved;
  } catch (error) {
    log.warn('Link resolution failed, keeping raw link', { link, error: errorMessage(error) });
    return link;
  }
}

/**
 * Every link a report shows: story primaries, related items and the
 * related coverage links they carry. Unique, in first-seen order.
 */
export function reportLinks(report: Report): string[] {
  const links = new Set<string>();

  for (const story of report.stories) {
    for (const item of [story.primary, ...story.related]) {
      links.add(item.link);
      for (const related of item.relatedLinks) {
        links.add(related);
      }
    }
  }

  return [...links];
}

/**
 * Copy of the report with every link resolved. Each distinct link is
 * resolved once; the result is frozen like any built report.
 */
export async function resolveReportLinks(
  report: Report,
  resolver: LinkResolver,
  options: { timeoutMs?: number } = {}
): Promise<Report> {
  const links = reportLinks(report);
  if (links.length === 0) return report;

  const resolved = await Promise.all(
    links.map(link => resolveArticleUrl(link, resolver, options.timeoutMs))
  );
  const lookup = new Map(links.map((link, i) => [link, resolved[i]]));
  const swap = (link: string) => lookup.get(link) ?? link;

  const changed = resolved.filter((url, i) => url !== links[i]).length;
  log.info('Report links resolved', { reportId: report.id, links: links.length, changed });

  const copy = structuredClone(report);
  for (const story of copy.stories) {
    for (const item of [story.primary, ...story.related]) {
      item.link = swap(item.link);
      item.relatedLinks = item.relatedLinks.map(swap);
    }
  }

  return deepFreeze(copy);
}

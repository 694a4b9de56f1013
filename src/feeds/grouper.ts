/**
 * NewsScout — Similarity Grouper
 *
 * Clusters normalized items that report the same underlying story.
 *
 * Policy:
 *   similarity = 0.75 * jaccard(title tokens) + 0.25 * jaccard(summary tokens)
 *   (title alone when either summary has no tokens)
 *
 * Two items are linked when similarity exceeds the threshold; clusters are the
 * connected components of that relation (union-find). Components do not
 * depend on input order. Only the primary tie-break and the output order
 * use the items' first-seen positions.
 */

import type { Cluster, NormalizedItem } from '../types';
import { scopedLogger } from '../lib/logger';
import stopWordList from './stopwords.json';

const log = scopedLogger('grouper');

const STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);
const MIN_TOKEN_LENGTH = 3;
const TITLE_WEIGHT = 0.75;
const SUMMARY_WEIGHT = 1 - TITLE_WEIGHT;

export const DEFAULT_SIMILARITY_THRESHOLD = 0.5;

// Trailing publisher attribution: "Headline - Reuters", "Headline | BBC News"
const PUBLISHER_SUFFIX = /\s+[-|–—]\s+[^-|–—]{1,60}$/;

export interface GroupingOptions {
  similarityThreshold?: number;
  /** Timestamp stamped on every cluster as formedAt */
  now?: Date;
}

// ============================================================
// SIMILARITY
// ============================================================

export function tokenize(text: string): Set<string> {
  return new Set(
    text
      .toLowerCase()
      .replace(/[^\p{L}\p{N}]+/gu, ' ')
      .split(' ')
      .filter(token => token.length >= MIN_TOKEN_LENGTH && !STOP_WORDS.has(token))
  );
}

export function stripPublisher(title: string): string {
  const stripped = title.replace(PUBLISHER_SUFFIX, '');
  return stripped.length > 0 ? stripped : title;
}

/**
 * Jaccard index; 0 when either side is empty.
 */
export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 || b.size === 0) return 0;

  let intersection = 0;
  for (const token of a) {
    if (b.has(token)) intersection++;
  }

  return intersection / (a.size + b.size - intersection);
}

interface Fingerprint {
  title: Set<string>;
  summary: Set<string>;
}

function fingerprint(item: NormalizedItem): Fingerprint {
  return {
    title: tokenize(stripPublisher(item.title)),
    summary: tokenize(item.summary),
  };
}

function fingerprintSimilarity(a: Fingerprint, b: Fingerprint): number {
  const title = jaccard(a.title, b.title);

  if (a.summary.size === 0 || b.summary.size === 0) {
    return title;
  }

  return TITLE_WEIGHT * title + SUMMARY_WEIGHT * jaccard(a.summary, b.summary);
}

/**
 * Symmetric, deterministic similarity of two items in [0, 1].
 */
export function itemSimilarity(a: NormalizedItem, b: NormalizedItem): number {
  return fingerprintSimilarity(fingerprint(a), fingerprint(b));
}

// ============================================================
// UNION-FIND
// ============================================================

class DisjointSet {
  private readonly parent: number[];

  constructor(size: number) {
    this.parent = Array.from({ length: size }, (_, i) => i);
  }

  find(x: number): number {
    let root = x;
    while (this.parent[root] !== root) root = this.parent[root];

    // Path compression
    let node = x;
    while (this.parent[node] !== root) {
      const next = this.parent[node];
      this.parent[node] = root;
      node = next;
    }

    return root;
  }

  union(a: number, b: number): void {
    const rootA = this.find(a);
    const rootB = this.find(b);
    if (rootA === rootB) return;

    if (rootA < rootB) {
      this.parent[rootB] = rootA;
    } else {
      this.parent[rootA] = rootB;
    }
  }
}

// ============================================================
// GROUPING
// ============================================================

function comparePrimary(a: NormalizedItem, b: NormalizedItem): number {
  const byTime = Date.parse(a.publishedAt) - Date.parse(b.publishedAt);
  return byTime !== 0 ? byTime : a.position - b.position;
}

function buildCluster(members: NormalizedItem[], formedAt: string): Cluster {
  const primary = members.reduce((best, item) => (comparePrimary(item, best) < 0 ? item : best));
  const related = members
    .filter(item => item !== primary)
    .sort((a, b) => a.position - b.position);

  return { id: primary.identityKey, primary, related, formedAt };
}

/**
 * Group items into clusters. Every input item lands in exactly one
 * cluster, as its primary or in its related list.
 */
export function groupItems(
  items: readonly NormalizedItem[],
  options: GroupingOptions = {}
): Cluster[] {
  const threshold = options.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD;
  const formedAt = (options.now ?? new Date()).toISOString();

  const prints = items.map(fingerprint);
  const sets = new DisjointSet(items.length);

  // Inverted index: only items sharing at least one token can be similar
  const postings = new Map<string, number[]>();
  prints.forEach((print, index) => {
    for (const token of new Set([...print.title, ...print.summary])) {
      const list = postings.get(token);
      if (list) {
        list.push(index);
      } else {
        postings.set(token, [index]);
      }
    }
  });

  let comparisons = 0;

  for (let i = 0; i < items.length; i++) {
    const candidates = new Set<number>();
    for (const token of new Set([...prints[i].title, ...prints[i].summary])) {
      for (const j of postings.get(token) ?? []) {
        if (j > i) candidates.add(j);
      }
    }

    for (const j of candidates) {
      comparisons++;
      if (fingerprintSimilarity(prints[i], prints[j]) > threshold) {
        sets.union(i, j);
      }
    }
  }

  const components = new Map<number, NormalizedItem[]>();
  items.forEach((item, index) => {
    const root = sets.find(index);
    const members = components.get(root);
    if (members) {
      members.push(item);
    } else {
      components.set(root, [item]);
    }
  });

  const clusters = Array.from(components.values(), members => buildCluster(members, formedAt));

  const firstPosition = (cluster: Cluster) =>
    Math.min(cluster.primary.position, ...cluster.related.map(item => item.position));
  clusters.sort((a, b) => firstPosition(a) - firstPosition(b));

  log.info('Grouping completed', {
    items: items.length,
    clusters: clusters.length,
    comparisons,
    threshold,
  });

  return clusters;
}

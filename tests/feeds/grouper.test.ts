/**
 * Tests for the Similarity Grouper
 */

import { describe, it, expect } from 'vitest';
import {
  groupItems,
  itemSimilarity,
  jaccard,
  stripPublisher,
  tokenize,
} from '../../src/feeds/grouper';
import type { NormalizedItem } from '../../src/types';

const NOW = new Date('2026-10-19T12:00:00Z');

const createItem = (position: number, overrides: Partial<NormalizedItem> = {}): NormalizedItem => ({
  title: `Story number ${position}`,
  link: `https://example.com/story-${position}`,
  summary: '',
  publishedAt: '2026-10-19T08:00:00.000Z',
  sourceId: 'wire',
  relatedLinks: [],
  identityKey: `key-${position}`,
  position,
  ...overrides,
});

describe('tokenize', () => {
  it('lowercases, splits on punctuation and drops short and stop words', () => {
    expect([...tokenize('The U.S. economy grew 2.5% in Q3!')]).toEqual(['economy', 'grew']);
  });

  it('keeps non-latin letters', () => {
    expect([...tokenize('Überflutung in München')]).toEqual(['überflutung', 'münchen']);
  });
});

describe('stripPublisher', () => {
  it('removes a trailing publisher attribution', () => {
    expect(stripPublisher('Central bank raises rates - Reuters')).toBe('Central bank raises rates');
    expect(stripPublisher('Central bank raises rates | BBC News')).toBe('Central bank raises rates');
  });

  it('leaves titles without attribution alone', () => {
    expect(stripPublisher('Central bank raises rates')).toBe('Central bank raises rates');
  });
});

describe('jaccard', () => {
  it('is zero when either side is empty', () => {
    expect(jaccard(new Set(), new Set(['bank']))).toBe(0);
    expect(jaccard(new Set(), new Set())).toBe(0);
  });

  it('divides the intersection by the union', () => {
    expect(jaccard(new Set(['solar', 'farm', 'approved']), new Set(['solar', 'farm']))).toBeCloseTo(2 / 3);
  });
});

describe('itemSimilarity', () => {
  const a = createItem(0, {
    title: 'Central bank raises interest rates - Reuters',
    summary: 'The central bank raised rates by a quarter point.',
  });
  const b = createItem(1, {
    title: 'Central bank raises interest rates | BBC News',
    summary: 'Policy makers lifted borrowing costs.',
  });

  it('is symmetric and bounded', () => {
    const ab = itemSimilarity(a, b);
    expect(ab).toBe(itemSimilarity(b, a));
    expect(ab).toBeGreaterThanOrEqual(0);
    expect(ab).toBeLessThanOrEqual(1);
  });

  it('weights the title 0.75 and the summary 0.25', () => {
    // titles identical after publisher removal; summaries share nothing
    expect(itemSimilarity(a, b)).toBeCloseTo(0.75);
  });

  it('uses the title alone when a summary is empty', () => {
    expect(itemSimilarity(a, { ...b, summary: '' })).toBe(1);
  });

  it('is one for an item and itself', () => {
    expect(itemSimilarity(a, a)).toBe(1);
  });
});

describe('groupItems', () => {
  it('collapses near-identical headlines into one cluster', () => {
    const items = [
      createItem(0, {
        title: 'Central bank raises interest rates again - Reuters',
        publishedAt: '2026-10-19T09:00:00.000Z',
      }),
      createItem(1, { title: 'Volcano erupts near island village' }),
      createItem(2, {
        title: 'Central bank raises interest rates again | BBC News',
        publishedAt: '2026-10-19T07:00:00.000Z',
      }),
    ];

    const clusters = groupItems(items, { now: NOW });

    expect(clusters).toHaveLength(2);
    expect(clusters[0].id).toBe('key-2');
    expect(clusters[0].primary.position).toBe(2);
    expect(clusters[0].related.map(i => i.position)).toEqual([0]);
    expect(clusters[1].primary.position).toBe(1);
    expect(clusters[1].related).toEqual([]);
  });

  it('links items only when similarity exceeds the threshold', () => {
    const items = [
      createItem(0, { title: 'Solar farm approved' }),
      createItem(1, { title: 'Solar farm rejected' }),
    ];

    expect(itemSimilarity(items[0], items[1])).toBe(0.5);
    expect(groupItems(items, { similarityThreshold: 0.5, now: NOW })).toHaveLength(2);
    expect(groupItems(items, { similarityThreshold: 0.49, now: NOW })).toHaveLength(1);
  });

  it('joins chains of similar items transitively', () => {
    const items = [
      createItem(0, { title: 'Copper mining strike ends' }),
      createItem(1, { title: 'Copper mining strike ends peacefully today' }),
      createItem(2, { title: 'Strike ends peacefully today' }),
    ];

    expect(itemSimilarity(items[0], items[2])).toBeLessThan(0.5);

    const clusters = groupItems(items, { now: NOW });
    expect(clusters).toHaveLength(1);
    expect(clusters[0].related.map(i => i.position)).toEqual([1, 2]);
  });

  it('breaks primary ties on equal timestamps by position', () => {
    const items = [
      createItem(0, { title: 'Museum returns stolen painting' }),
      createItem(1, { title: 'Museum returns stolen painting' }),
    ];

    const [cluster] = groupItems(items, { now: NOW });
    expect(cluster.primary.position).toBe(0);
    expect(cluster.related.map(i => i.position)).toEqual([1]);
  });

  it('places every item in exactly one cluster', () => {
    const items = [
      createItem(0, { title: 'Copper mining strike ends' }),
      createItem(1, { title: 'Volcano erupts near island village' }),
      createItem(2, { title: 'Copper mining strike ends early' }),
      createItem(3, { title: 'Parliament passes budget bill' }),
      createItem(4, { title: 'Volcano erupts near island' }),
    ];

    const clusters = groupItems(items, { now: NOW });
    const placed = clusters.flatMap(c => [c.primary, ...c.related].map(i => i.position));

    expect(placed.sort((x, y) => x - y)).toEqual([0, 1, 2, 3, 4]);
    for (const cluster of clusters) {
      expect(cluster.related).not.toContain(cluster.primary);
    }
  });

  it('does not depend on input order', () => {
    const items = [
      createItem(0, { title: 'Copper mining strike ends', publishedAt: '2026-10-19T10:00:00.000Z' }),
      createItem(1, { title: 'Volcano erupts near island village' }),
      createItem(2, { title: 'Copper mining strike ends early' }),
      createItem(3, { title: 'Volcano erupts near island', publishedAt: '2026-10-19T06:00:00.000Z' }),
    ];

    expect(groupItems([...items].reverse(), { now: NOW })).toEqual(groupItems(items, { now: NOW }));
  });

  it('stamps formedAt and returns nothing for no items', () => {
    const [cluster] = groupItems([createItem(0)], { now: NOW });
    expect(cluster.formedAt).toBe('2026-10-19T12:00:00.000Z');
    expect(groupItems([], { now: NOW })).toEqual([]);
  });
});

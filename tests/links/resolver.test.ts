/**
 * Tests for article link resolution
 */

import { describe, it, expect, vi } from 'vitest';
import {
  reportLinks,
  resolveArticleUrl,
  resolveReportLinks,
  type LinkResolver,
} from '../../src/links/resolver';
import { createReport, createStory } from '../report/fixtures';

const gnews = (id: string) => `https://news.google.com/rss/articles/${id}`;

/** Resolver answering from a table; other links come back unchanged */
const tableResolver = (table: Record<string, string>): LinkResolver => ({
  resolve: vi.fn(async (link: string) => table[link] ?? link),
});

const storyWithCoverage = () => {
  const base = createStory('a', 8);
  return createStory('a', 8, {
    primary: {
      ...base.primary,
      link: gnews('AAA'),
      relatedLinks: [gnews('BBB'), 'https://plain.example.org/x'],
    },
    related: [{ ...base.primary, title: 'Other take', link: gnews('BBB'), identityKey: 'b2', position: 1 }],
  });
};

describe('resolveArticleUrl', () => {
  it('returns the resolved article URL', async () => {
    const resolver = tableResolver({ [gnews('AAA')]: 'https://publisher.example.com/a' });

    expect(await resolveArticleUrl(gnews('AAA'), resolver)).toBe('https://publisher.example.com/a');
  });

  it('keeps the raw link when the resolver fails', async () => {
    const resolver: LinkResolver = { resolve: () => Promise.reject(new Error('HTTP 429')) };

    expect(await resolveArticleUrl(gnews('AAA'), resolver)).toBe(gnews('AAA'));
  });

  it('keeps the raw link when the resolver answers with nothing', async () => {
    const resolver: LinkResolver = { resolve: async () => '   ' };

    expect(await resolveArticleUrl(gnews('AAA'), resolver)).toBe(gnews('AAA'));
  });

  it('keeps the raw link and aborts the call on timeout', async () => {
    const signals: AbortSignal[] = [];
    const resolver: LinkResolver = {
      resolve: (_link, signal) => {
        signals.push(signal);
        return new Promise<string>(() => {});
      },
    };

    expect(await resolveArticleUrl(gnews('AAA'), resolver, 20)).toBe(gnews('AAA'));
    expect(signals).toHaveLength(1);
    expect(signals[0].aborted).toBe(true);
  });
});

describe('reportLinks', () => {
  it('lists each shown link once in first-seen order', () => {
    const report = createReport([storyWithCoverage()]);

    expect(reportLinks(report)).toEqual([gnews('AAA'), gnews('BBB'), 'https://plain.example.org/x']);
  });
});

describe('resolveReportLinks', () => {
  it('rewrites every link and resolves each distinct link once', async () => {
    const resolver = tableResolver({
      [gnews('AAA')]: 'https://publisher.example.com/a',
      [gnews('BBB')]: 'https://publisher.example.com/b',
    });
    const report = createReport([storyWithCoverage()]);

    const resolved = await resolveReportLinks(report, resolver);
    const [story] = resolved.stories;

    expect(resolver.resolve).toHaveBeenCalledTimes(3);
    expect(story.primary.link).toBe('https://publisher.example.com/a');
    expect(story.primary.relatedLinks).toEqual(['https://publisher.example.com/b', 'https://plain.example.org/x']);
    expect(story.related.map(i => i.link)).toEqual(['https://publisher.example.com/b']);
  });

  it('leaves the input report untouched and freezes the copy', async () => {
    const report = createReport([storyWithCoverage()]);
    const resolver = tableResolver({ [gnews('AAA')]: 'https://publisher.example.com/a' });

    const resolved = await resolveReportLinks(report, resolver);

    expect(report.stories[0].primary.link).toBe(gnews('AAA'));
    expect(resolved.id).toBe(report.id);
    expect(Object.isFrozen(resolved)).toBe(true);
    expect(Object.isFrozen(resolved.stories[0].primary)).toBe(true);
  });

  it('keeps links whose resolution fails', async () => {
    const resolver: LinkResolver = {
      resolve: async link => {
        if (link === gnews('BBB')) throw new Error('decode failed');
        return link === gnews('AAA') ? 'https://publisher.example.com/a' : link;
      },
    };

    const resolved = await resolveReportLinks(createReport([storyWithCoverage()]), resolver);

    expect(resolved.stories[0].primary.link).toBe('https://publisher.example.com/a');
    expect(resolved.stories[0].related[0].link).toBe(gnews('BBB'));
  });

  it('returns a report without stories as is', async () => {
    const resolver = tableResolver({});
    const report = createReport([createStory('low', 2)]);

    expect(await resolveReportLinks(report, resolver)).toBe(report);
    expect(resolver.resolve).not.toHaveBeenCalled();
  });
});

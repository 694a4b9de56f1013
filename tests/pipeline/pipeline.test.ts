/**
 * Tests for the Pipeline Run
 */

import { describe, it, expect, vi } from 'vitest';
import { runPipeline, type StageTransition } from '../../src/pipeline';
import { FeedSource, StaticFeedSource } from '../../src/feeds/base';
import type { ReasoningCapability, ScoringRequest } from '../../src/scoring/reasoner';
import type { LinkResolver } from '../../src/links/resolver';
import type { RawItem } from '../../src/types';

const NOW = new Date('2026-10-19T12:00:00Z');

const createRawItem = (n: number, title: string, overrides: Partial<RawItem> = {}): RawItem => ({
  title,
  link: `https://example.com/${n}`,
  summary: '',
  publishedAt: `2026-10-19T0${n}:00:00Z`,
  sourceId: 'wire',
  ...overrides,
});

const UNRELATED_TITLES = [
  'Volcano erupts near island village',
  'Parliament passes budget bill',
  'Copper mining strike ends',
  'Museum returns stolen painting',
  'Solar farm approved downtown',
];

class BrokenSource extends FeedSource {
  readonly id = 'broken';

  async fetch(): Promise<RawItem[]> {
    throw new Error('connection refused');
  }
}

/** Capability answering by title; unknown titles get score 5 */
const fakeCapability = (
  answers: Record<string, number | Error | null> = {}
): ReasoningCapability => ({
  score: vi.fn(async (request: ScoringRequest) => {
    const answer = request.title in answers ? answers[request.title] : 5;
    if (answer instanceof Error) throw answer;
    if (answer === null) return { verdict: 'unsure' };
    return { score: answer, summary: `About ${request.title}`, reasoning: 'Test reasoning.' };
  }),
});

const unrelatedSource = () =>
  new StaticFeedSource(
    'wire',
    UNRELATED_TITLES.map((title, i) => createRawItem(i, title))
  );

const transitions = (stages: StageTransition[]) => stages.map(s => `${s.from}->${s.to}`);

describe('runPipeline', () => {
  it('reports the important stories of a healthy run', async () => {
    const capability = fakeCapability({
      'Volcano erupts near island village': 9,
      'Parliament passes budget bill': 3,
      'Copper mining strike ends': 6,
      'Museum returns stolen painting': new Error('rate limited'),
      'Solar farm approved downtown': 7,
    });

    const result = await runPipeline({ sources: [unrelatedSource()], capability, now: () => NOW });

    expect(result.status).toBe('done');
    if (result.status !== 'done') return;

    const { report } = result;
    expect(report.id).toBe(result.runId);
    expect(report.totalAnalyzed).toBe(5);
    expect(report.importantCount).toBe(3);
    expect(report.stories.map(s => s.judgment.score)).toEqual([9, 7, 6]);
    expect(report.diagnostics.scoringFailures).toEqual([
      { clusterId: expect.any(String), kind: 'capability_error', reason: 'rate limited' },
    ]);
    expect(report.diagnostics).toMatchObject({
      rawItems: 5,
      skippedItems: 0,
      duplicateItems: 0,
      clustersFormed: 5,
      clustersExcludedByCap: 0,
      outOfRangeScores: 0,
      sourceErrors: [],
    });
    expect(transitions(result.stages)).toEqual([
      'idle->fetching',
      'fetching->normalizing',
      'normalizing->grouping',
      'grouping->scoring',
      'scoring->building',
      'building->done',
    ]);
  });

  it('scores near-duplicate coverage once', async () => {
    const capability = fakeCapability();
    const source = new StaticFeedSource('wire', [
      createRawItem(1, 'Central bank raises interest rates again - Reuters'),
      createRawItem(2, 'Central bank raises interest rates again | BBC News'),
    ]);

    const result = await runPipeline({ sources: [source], capability, now: () => NOW });

    expect(capability.score).toHaveBeenCalledTimes(1);
    expect(result.status).toBe('done');
    if (result.status !== 'done') return;
    expect(result.report.stories).toHaveLength(1);
    expect(result.report.stories[0].primary.link).toBe('https://example.com/1');
    expect(result.report.stories[0].related.map(i => i.link)).toEqual(['https://example.com/2']);
  });

  it('applies the cluster cap from the run config', async () => {
    const capability = fakeCapability();

    const result = await runPipeline({
      sources: [unrelatedSource()],
      capability,
      config: { maxClusters: 2 },
      now: () => NOW,
    });

    expect(capability.score).toHaveBeenCalledTimes(2);
    expect(result.status).toBe('done');
    if (result.status !== 'done') return;
    expect(result.report.totalAnalyzed).toBe(2);
    expect(result.report.diagnostics.clustersExcludedByCap).toBe(3);
  });

  it('fails at fetching when every source fails', async () => {
    const capability = fakeCapability();

    const result = await runPipeline({ sources: [new BrokenSource()], capability, now: () => NOW });

    expect(result).toMatchObject({
      status: 'failed',
      stage: 'fetching',
      error: 'No feed could be fetched: broken: connection refused',
    });
    expect(transitions(result.stages)).toEqual(['idle->fetching', 'fetching->failed']);
    expect(capability.score).not.toHaveBeenCalled();
  });

  it('fails at fetching when no source is configured', async () => {
    const result = await runPipeline({ sources: [], capability: fakeCapability(), now: () => NOW });

    expect(result).toMatchObject({ status: 'failed', stage: 'fetching' });
  });

  it('records a partial source failure and carries on', async () => {
    const result = await runPipeline({
      sources: [new BrokenSource(), unrelatedSource()],
      capability: fakeCapability(),
      now: () => NOW,
    });

    expect(result.status).toBe('done');
    if (result.status !== 'done') return;
    expect(result.report.diagnostics.sourceErrors).toEqual(['broken: connection refused']);
  });

  it('fails at scoring when the capability is unreachable for every cluster', async () => {
    const capability: ReasoningCapability = {
      score: () => Promise.reject(new Error('service unavailable')),
    };

    const result = await runPipeline({
      sources: [unrelatedSource()],
      capability,
      config: { maxClusters: 3 },
      now: () => NOW,
    });

    expect(result).toMatchObject({
      status: 'failed',
      stage: 'scoring',
      error: 'Reasoning capability unreachable for all 3 cluster(s): service unavailable',
    });
    if (result.status !== 'failed') return;
    expect(result.diagnostics.scoringFailures).toHaveLength(3);
    expect(result.diagnostics.clustersExcludedByCap).toBe(2);
  });

  it('still reports when every verdict is malformed', async () => {
    const capability = fakeCapability(Object.fromEntries(UNRELATED_TITLES.map(title => [title, null])));

    const result = await runPipeline({ sources: [unrelatedSource()], capability, now: () => NOW });

    expect(result.status).toBe('done');
    if (result.status !== 'done') return;
    expect(result.report.importantCount).toBe(0);
    expect(result.report.totalAnalyzed).toBe(5);
    expect(result.report.diagnostics.scoringFailures.every(f => f.kind === 'malformed')).toBe(true);
  });

  it('builds an empty report when there is nothing to analyze', async () => {
    const capability = fakeCapability();
    const source = new StaticFeedSource('wire', [
      createRawItem(1, '   '),
      createRawItem(2, 'Dated nowhere', { publishedAt: 'not a date' }),
    ]);

    const result = await runPipeline({ sources: [source], capability, now: () => NOW });

    expect(result.status).toBe('done');
    if (result.status !== 'done') return;
    expect(result.report.totalAnalyzed).toBe(0);
    expect(result.report.importantCount).toBe(0);
    expect(result.report.stories).toEqual([]);
    expect(result.report.diagnostics.skippedItems).toBe(2);
    expect(transitions(result.stages)).toEqual([
      'idle->fetching',
      'fetching->normalizing',
      'normalizing->building',
      'building->done',
    ]);
    expect(capability.score).not.toHaveBeenCalled();
  });

  it('notifies the stage listener and survives it throwing', async () => {
    const seen: string[] = [];
    const onStageChange = vi.fn((transition: StageTransition) => {
      seen.push(transition.to);
      if (transition.to === 'grouping') throw new Error('listener broke');
    });

    const result = await runPipeline({
      sources: [unrelatedSource()],
      capability: fakeCapability(),
      onStageChange,
      now: () => NOW,
    });

    expect(result.status).toBe('done');
    expect(seen).toEqual(['fetching', 'normalizing', 'grouping', 'scoring', 'building', 'done']);
    expect(result.stages[0].at).toBe('2026-10-19T12:00:00.000Z');
  });

  it('orders the report the same whichever scoring call finishes first', async () => {
    const scores: Record<string, number> = {
      'Volcano erupts near island village': 7,
      'Parliament passes budget bill': 7,
      'Copper mining strike ends': 9,
      'Museum returns stolen painting': 6,
      'Solar farm approved downtown': 7,
    };
    const completed: string[] = [];
    const delayedCapability = (delayFor: (title: string) => number): ReasoningCapability => ({
      score: async (request: ScoringRequest) => {
        await new Promise(resolve => setTimeout(resolve, delayFor(request.title)));
        completed.push(request.title);
        return { score: scores[request.title], summary: `About ${request.title}`, reasoning: 'Test reasoning.' };
      },
    });

    const immediate = await runPipeline({
      sources: [unrelatedSource()],
      capability: delayedCapability(() => 0),
      now: () => NOW,
    });
    completed.length = 0;
    const reversed = await runPipeline({
      sources: [unrelatedSource()],
      capability: delayedCapability(title => (UNRELATED_TITLES.length - UNRELATED_TITLES.indexOf(title)) * 10),
      now: () => NOW,
    });

    expect(completed).toEqual([...UNRELATED_TITLES].reverse());
    expect(immediate.status).toBe('done');
    expect(reversed.status).toBe('done');
    if (immediate.status !== 'done' || reversed.status !== 'done') return;

    expect(reversed.report.stories.map(s => s.primary.title)).toEqual([
      'Copper mining strike ends',
      'Solar farm approved downtown',
      'Parliament passes budget bill',
      'Volcano erupts near island village',
      'Museum returns stolen painting',
    ]);
    expect(reversed.report.stories).toEqual(immediate.report.stories);
  });

  it('resolves report links during building', async () => {
    const linkResolver: LinkResolver = {
      resolve: vi.fn(async (link: string) => link.replace('https://example.com/', 'https://publisher.example.com/')),
    };

    const result = await runPipeline({
      sources: [unrelatedSource()],
      capability: fakeCapability(),
      linkResolver,
      now: () => NOW,
    });

    expect(result.status).toBe('done');
    if (result.status !== 'done') return;
    expect(result.report.stories.map(s => s.primary.link).sort()).toEqual([
      'https://publisher.example.com/0',
      'https://publisher.example.com/1',
      'https://publisher.example.com/2',
      'https://publisher.example.com/3',
      'https://publisher.example.com/4',
    ]);
    expect(linkResolver.resolve).toHaveBeenCalledTimes(5);
    expect(transitions(result.stages).slice(-2)).toEqual(['scoring->building', 'building->done']);
  });

  it('keeps raw links when resolution fails', async () => {
    const linkResolver: LinkResolver = { resolve: () => Promise.reject(new Error('HTTP 503')) };

    const result = await runPipeline({
      sources: [unrelatedSource()],
      capability: fakeCapability(),
      linkResolver,
      config: { maxClusters: 1 },
      now: () => NOW,
    });

    expect(result.status).toBe('done');
    if (result.status !== 'done') return;
    expect(result.report.stories.map(s => s.primary.link)).toEqual(['https://example.com/0']);
  });
});

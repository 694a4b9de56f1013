import { buildReport } from '../../src/report/builder';
import { emptyDiagnostics, type Report, type RunDiagnostics, type ScoredCluster } from '../../src/types';

export const createStory = (id: string, score: number, overrides: Partial<ScoredCluster> = {}): ScoredCluster => ({
  id,
  primary: {
    title: `Story ${id}`,
    link: `https://example.com/${id}`,
    summary: '',
    publishedAt: '2026-10-19T08:00:00.000Z',
    sourceId: 'wire',
    relatedLinks: [],
    identityKey: id,
    position: 0,
  },
  related: [],
  formedAt: '2026-10-19T12:00:00.000Z',
  judgment: { score, summary: `Summary ${id}`, reasoning: `Reasoning ${id}` },
  ...overrides,
});

export const createReport = (
  stories: ScoredCluster[],
  diagnostics: Partial<RunDiagnostics> = {},
  totalAnalyzed = stories.length
): Report =>
  buildReport({
    scored: stories,
    totalAnalyzed,
    diagnostics: { ...emptyDiagnostics(), ...diagnostics },
    threshold: 5,
    generatedAt: new Date('2026-10-19T12:00:00Z'),
    id: 'RUN-2026-1019-TEST01',
  });

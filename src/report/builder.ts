/**
 * NewsScout — Report Builder
 *
 * Keeps stories at or above the score threshold and orders them by
 * score, then recency. An empty report is a normal outcome.
 */

import type { Report, RunDiagnostics, ScoredCluster } from '../types';
import { generateRunId } from '../lib/trace';
import { scopedLogger } from '../lib/logger';

const log = scopedLogger('report-builder');

export const DEFAULT_SCORE_THRESHOLD = 5;

export interface BuildReportInput {
  scored: readonly ScoredCluster[];
  /** Clusters that reached the scorer, failures included */
  totalAnalyzed: number;
  diagnostics: RunDiagnostics;
  threshold?: number;
  generatedAt?: Date;
  id?: string;
}

/**
 * Total order for report stories: score desc, primary publishedAt desc,
 * cluster id asc.
 */
export function compareStories(a: ScoredCluster, b: ScoredCluster): number {
  if (a.judgment.score !== b.judgment.score) {
    return b.judgment.score - a.judgment.score;
  }

  const byRecency = Date.parse(b.primary.publishedAt) - Date.parse(a.primary.publishedAt);
  if (byRecency !== 0) return byRecency;

  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Split scored clusters at the threshold.
 */
export function partitionByThreshold(
  scored: readonly ScoredCluster[],
  threshold: number
): { important: ScoredCluster[]; rest: ScoredCluster[] } {
  const important: ScoredCluster[] = [];
  const rest: ScoredCluster[] = [];

  for (const story of scored) {
    (story.judgment.score >= threshold ? important : rest).push(story);
  }

  return { important, rest };
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Assemble the run's report. The result is frozen.
 */
export function buildReport(input: BuildReportInput): Report {
  const threshold = input.threshold ?? DEFAULT_SCORE_THRESHOLD;
  const generatedAt = input.generatedAt ?? new Date();

  const { important, rest } = partitionByThreshold(input.scored, threshold);
  const stories = [...important].sort(compareStories);

  const report: Report = {
    id: input.id ?? generateRunId('RPT', generatedAt),
    generatedAt: generatedAt.toISOString(),
    threshold,
    totalAnalyzed: input.totalAnalyzed,
    importantCount: stories.length,
    stories: structuredClone(stories),
    diagnostics: structuredClone(input.diagnostics),
  };

  log.info('Report built', {
    reportId: report.id,
    totalAnalyzed: report.totalAnalyzed,
    important: report.importantCount,
    belowThreshold: rest.length,
    scoringFailures: report.diagnostics.scoringFailures.length,
  });

  return deepFreeze(report);
}

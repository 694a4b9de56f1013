/**
 * NewsScout — Importance Scorer
 *
 * One reasoning call per cluster, built from the primary item.
 * Only the first `maxClusters` clusters are scored; the rest are
 * excluded from the run. Calls run concurrently, each under its own
 * timeout, and a failing call only costs its own cluster.
 */

import { z } from 'zod';
import type { Cluster, Judgment, ScoredCluster, ScoringFailure } from '../types';
import type { ReasoningCapability } from './reasoner';
import { withTimeout, type Timed } from '../lib/timeout';
import { scopedLogger, errorMessage } from '../lib/logger';

const log = scopedLogger('scorer');

export const DEFAULT_MAX_CLUSTERS = 5;
export const DEFAULT_SCORING_TIMEOUT_MS = 30_000;

const MIN_SCORE = 0;
const MAX_SCORE = 10;

export interface ScorerOptions {
  maxClusters?: number;
  timeoutMs?: number;
}

export interface ScoringResult {
  /** Successfully judged clusters, in input order */
  scored: ScoredCluster[];
  failures: ScoringFailure[];
  /** Clusters that reached the reasoning capability */
  considered: number;
  /** Clusters dropped by the cap */
  excluded: number;
  outOfRangeScores: number;
}

// ============================================================
// RESPONSE VALIDATION
// ============================================================

const NUMERIC_STRING = /^-?\d+(\.\d+)?$/;

function coerceScore(value: unknown): unknown {
  if (typeof value === 'string' && NUMERIC_STRING.test(value.trim())) {
    return Number(value.trim());
  }
  return value;
}

const RawJudgmentSchema = z.preprocess(
  value => {
    if (typeof value !== 'object' || value === null) return value;
    // Some prompts elicit the longer field name
    const score = 'score' in value ? value.score : 'importance_score' in value ? value.importance_score : undefined;
    return { ...value, score: coerceScore(score) };
  },
  z.object({
    score: z.number().finite(),
    summary: z.string().trim().min(1),
    reasoning: z.string().trim().min(1),
  })
);

export type JudgmentInterpretation =
  | { ok: true; judgment: Judgment; outOfRange: boolean }
  | { ok: false; reason: string };

/**
 * Validate a raw verdict. Numeric strings are read as numbers; scores are
 * rounded to integers and clamped to 0–10.
 */
export function interpretJudgment(raw: unknown): JudgmentInterpretation {
  const parsed = RawJudgmentSchema.safeParse(raw);

  if (!parsed.success) {
    const reason = parsed.error.issues
      .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    return { ok: false, reason };
  }

  const { score, summary, reasoning } = parsed.data;
  const outOfRange = score < MIN_SCORE || score > MAX_SCORE;
  const clamped = Math.min(MAX_SCORE, Math.max(MIN_SCORE, Math.round(score)));

  return {
    ok: true,
    judgment: { score: clamped, summary, reasoning },
    outOfRange,
  };
}

// ============================================================
// SCORING
// ============================================================

type ClusterOutcome =
  | { status: 'scored'; judgment: Judgment; outOfRange: boolean }
  | { status: 'failed'; failure: ScoringFailure };

async function scoreCluster(
  cluster: Cluster,
  capability: ReasoningCapability,
  timeoutMs: number
): Promise<ClusterOutcome> {
  const request = { title: cluster.primary.title, summary: cluster.primary.summary };
  const fail = (kind: ScoringFailure['kind'], reason: string): ClusterOutcome => {
    log.warn('Cluster scoring failed', { clusterId: cluster.id, kind, reason });
    return { status: 'failed', failure: { clusterId: cluster.id, kind, reason } };
  };

  let outcome: Timed<unknown>;
  try {
    outcome = await withTimeout(signal => capability.score(request, signal), timeoutMs);
  } catch (error) {
    return fail('capability_error', errorMessage(error));
  }

  if (outcome.status === 'timeout') {
    return fail('timeout', `No judgment within ${outcome.timeoutMs}ms`);
  }

  const interpreted = interpretJudgment(outcome.value);
  if (!interpreted.ok) {
    return fail('malformed', interpreted.reason);
  }

  if (interpreted.outOfRange) {
    log.warn('Score out of range, clamped', {
      clusterId: cluster.id,
      clampedTo: interpreted.judgment.score,
    });
  }

  return { status: 'scored', judgment: interpreted.judgment, outOfRange: interpreted.outOfRange };
}

/**
 * Score clusters against the reasoning capability.
 */
export async function scoreClusters(
  clusters: readonly Cluster[],
  capability: ReasoningCapability,
  options: ScorerOptions = {}
): Promise<ScoringResult> {
  const maxClusters = options.maxClusters ?? DEFAULT_MAX_CLUSTERS;
  const timeoutMs = options.timeoutMs ?? DEFAULT_SCORING_TIMEOUT_MS;

  if (!Number.isInteger(maxClusters) || maxClusters < 0) {
    throw new Error(`maxClusters must be a non-negative integer, got ${maxClusters}`);
  }

  const considered = clusters.slice(0, maxClusters);
  const excluded = clusters.length - considered.length;

  if (excluded > 0) {
    log.info('Cluster cap applied', { maxClusters, excluded });
  }

  const settled = await Promise.all(
    considered.map(async cluster => [cluster.id, await scoreCluster(cluster, capability, timeoutMs)] as const)
  );
  const outcomes = new Map<string, ClusterOutcome>(settled);

  const scored: ScoredCluster[] = [];
  const failures: ScoringFailure[] = [];
  let outOfRangeScores = 0;

  for (const cluster of considered) {
    const outcome = outcomes.get(cluster.id);
    if (!outcome) continue;

    if (outcome.status === 'failed') {
      failures.push(outcome.failure);
      continue;
    }

    if (outcome.outOfRange) outOfRangeScores++;
    scored.push({ ...cluster, judgment: outcome.judgment });
  }

  log.info('Scoring completed', {
    considered: considered.length,
    scored: scored.length,
    failed: failures.length,
    outOfRangeScores,
  });

  return {
    scored,
    failures,
    considered: considered.length,
    excluded,
    outOfRangeScores,
  };
}

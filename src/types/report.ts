/**
 * NewsScout — Cluster, Judgment and Report Types
 *
 * Reports are written to disk and read back by the evaluator,
 * so their shape is defined once as zod schemas.
 */

import { z } from 'zod';

// ============================================================
// ITEMS & CLUSTERS
// ============================================================

export const NormalizedItemSchema = z.object({
  title: z.string().min(1),
  link: z.string(),
  summary: z.string(),
  publishedAt: z.string().datetime(),
  sourceId: z.string(),
  relatedLinks: z.array(z.string()),
  identityKey: z.string(),
  position: z.number().int().min(0),
});

export const ClusterSchema = z.object({
  /** Identity key of the primary item */
  id: z.string(),
  primary: NormalizedItemSchema,
  related: z.array(NormalizedItemSchema),
  formedAt: z.string().datetime(),
});
export type Cluster = z.infer<typeof ClusterSchema>;

// ============================================================
// JUDGMENTS
// ============================================================

export const JudgmentSchema = z.object({
  score: z.number().int().min(0).max(10),
  summary: z.string().min(1),
  reasoning: z.string().min(1),
});
export type Judgment = z.infer<typeof JudgmentSchema>;

export const ScoredClusterSchema = ClusterSchema.extend({
  judgment: JudgmentSchema,
});
export type ScoredCluster = z.infer<typeof ScoredClusterSchema>;

export const ScoringFailureKindSchema = z.enum(['timeout', 'malformed', 'capability_error']);
export type ScoringFailureKind = z.infer<typeof ScoringFailureKindSchema>;

export const ScoringFailureSchema = z.object({
  clusterId: z.string(),
  kind: ScoringFailureKindSchema,
  reason: z.string(),
});
export type ScoringFailure = z.infer<typeof ScoringFailureSchema>;

// ============================================================
// REPORT
// ============================================================

export const RunDiagnosticsSchema = z.object({
  rawItems: z.number().int().min(0),
  skippedItems: z.number().int().min(0),
  duplicateItems: z.number().int().min(0),
  clustersFormed: z.number().int().min(0),
  clustersExcludedByCap: z.number().int().min(0),
  scoringFailures: z.array(ScoringFailureSchema),
  outOfRangeScores: z.number().int().min(0),
  sourceErrors: z.array(z.string()),
});
export type RunDiagnostics = z.infer<typeof RunDiagnosticsSchema>;

export const ReportSchema = z.object({
  id: z.string(),
  generatedAt: z.string().datetime(),
  threshold: z.number().int().min(0).max(10),
  /** Clusters that reached the scorer, failed ones included */
  totalAnalyzed: z.number().int().min(0),
  importantCount: z.number().int().min(0),
  stories: z.array(ScoredClusterSchema),
  diagnostics: RunDiagnosticsSchema,
});
export type Report = z.infer<typeof ReportSchema>;

export function emptyDiagnostics(): RunDiagnostics {
  return {
    rawItems: 0,
    skippedItems: 0,
    duplicateItems: 0,
    clustersFormed: 0,
    clustersExcludedByCap: 0,
    scoringFailures: [],
    outOfRangeScores: 0,
    sourceErrors: [],
  };
}

/**
 * NewsScout — Type Exports
 */

// Feed items
export type {
  RawItem,
  NormalizedItem,
  SkipReason,
  SkippedItem,
  NormalizationResult,
  SourceFetchResult,
  AggregatedFeed,
} from './feed-item';

// Clusters, judgments, reports
export type {
  Cluster,
  Judgment,
  ScoredCluster,
  ScoringFailure,
  ScoringFailureKind,
  RunDiagnostics,
  Report,
} from './report';
export {
  NormalizedItemSchema,
  ClusterSchema,
  JudgmentSchema,
  ScoredClusterSchema,
  ScoringFailureSchema,
  RunDiagnosticsSchema,
  ReportSchema,
  emptyDiagnostics,
} from './report';

// Evaluation
export type {
  CriterionScore,
  JudgeResponse,
  StoryEvaluation,
  EvaluationReport,
  PerformanceBand,
} from './evaluation';
export {
  EVALUATION_CRITERIA,
  CriterionScoreSchema,
  JudgeResponseSchema,
  StoryEvaluationSchema,
  EvaluationReportSchema,
} from './evaluation';

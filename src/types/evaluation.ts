/**
 * NewsScout — Evaluation Types
 *
 * LLM-as-judge review of the stories a report selected.
 */

import { z } from 'zod';

export const EVALUATION_CRITERIA = [
  'Importance Score Accuracy',
  'Summary Quality',
  'Reasoning Clarity',
  'Consistency',
  'Relevance',
] as const;

export const CriterionScoreSchema = z.object({
  criterion: z.string().min(1),
  score: z.number().int().min(1).max(5),
  reasoning: z.string(),
});
export type CriterionScore = z.infer<typeof CriterionScoreSchema>;

/** Shape the judge model is asked to return */
export const JudgeResponseSchema = z.object({
  scores: z.array(CriterionScoreSchema).min(1),
  strengths: z.array(z.string()).default([]),
  weaknesses: z.array(z.string()).default([]),
  suggestions: z.string().default(''),
});
export type JudgeResponse = z.infer<typeof JudgeResponseSchema>;

export const StoryEvaluationSchema = JudgeResponseSchema.extend({
  clusterId: z.string(),
  title: z.string(),
  /** Mean of the criterion scores */
  overallScore: z.number().min(1).max(5),
});
export type StoryEvaluation = z.infer<typeof StoryEvaluationSchema>;

export const EvaluationReportSchema = z.object({
  reportId: z.string(),
  evaluatedAt: z.string().datetime(),
  totalStories: z.number().int().min(0),
  averageScore: z.number().min(0).max(5),
  evaluations: z.array(StoryEvaluationSchema),
  failedStories: z.array(z.string()),
  overallFeedback: z.string(),
});
export type EvaluationReport = z.infer<typeof EvaluationReportSchema>;

export type PerformanceBand =
  | 'excellent'
  | 'very good'
  | 'good'
  | 'satisfactory'
  | 'needs improvement';

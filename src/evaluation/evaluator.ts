/**
 * NewsScout — Report Evaluator
 *
 * LLM-as-judge review of the stories a report selected. Each story's
 * judgment is graded 1–5 on five criteria; the report gets the mean.
 */

import type {
  EvaluationReport,
  PerformanceBand,
  Report,
  ScoredCluster,
  StoryEvaluation,
} from '../types';
import { EVALUATION_CRITERIA, JudgeResponseSchema } from '../types';
import { extractJson, type LlmClient } from '../llm/client';
import { scopedLogger, errorMessage } from '../lib/logger';

const log = scopedLogger('evaluator');

const MAX_LISTED_POINTS = 5;

// ============================================================
// PROMPTS
// ============================================================

export const EVALUATION_SYSTEM_PROMPT = `You are an expert evaluator assessing news analysis produced by an AI assistant editor.

Grade the analysis on each criterion from 1 (poor) to 5 (excellent):
${EVALUATION_CRITERIA.map((criterion, i) => `${i + 1}. ${criterion}`).join('\n')}

Importance Score Accuracy: is the 0-10 score right for the story's impact, novelty and public interest?
Summary Quality: is the one-sentence summary clear and does it capture the significance?
Reasoning Clarity: is the reasoning specific and well justified?
Consistency: do score, summary and reasoning agree?
Relevance: was the story correctly judged important enough to report?

Respond ONLY with JSON:
{
  "scores": [{"criterion": "Importance Score Accuracy", "score": 4, "reasoning": "..."}],
  "strengths": ["..."],
  "weaknesses": ["..."],
  "suggestions": "..."
}`;

export function buildEvaluationPrompt(story: ScoredCluster): string {
  return `Evaluate this analysis.

ORIGINAL STORY:
Title: ${story.primary.title}
Source: ${story.primary.sourceId}
Published: ${story.primary.publishedAt}
Related coverage: ${story.related.length + story.primary.relatedLinks.length} link(s)

AI ANALYSIS:
Importance Score: ${story.judgment.score}/10
Summary: ${story.judgment.summary}
Reasoning: ${story.judgment.reasoning}`;
}

// ============================================================
// SCORING HELPERS
// ============================================================

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function performanceBand(averageScore: number): PerformanceBand {
  if (averageScore >= 4.5) return 'excellent';
  if (averageScore >= 4.0) return 'very good';
  if (averageScore >= 3.5) return 'good';
  if (averageScore >= 3.0) return 'satisfactory';
  return 'needs improvement';
}

function titleCase(text: string): string {
  return text.replace(/\b\w/g, c => c.toUpperCase());
}

function firstUnique(values: string[]): string[] {
  return [...new Set(values)].slice(0, MAX_LISTED_POINTS);
}

export function buildOverallFeedback(evaluations: StoryEvaluation[], averageScore: number): string {
  const lines = [
    `Overall Performance: ${titleCase(performanceBand(averageScore))} (Average Score: ${averageScore.toFixed(2)}/5.0)`,
  ];

  const strengths = firstUnique(evaluations.flatMap(e => e.strengths));
  if (strengths.length > 0) {
    lines.push('', 'Common Strengths:', ...strengths.map(s => `  - ${s}`));
  }

  const weaknesses = firstUnique(evaluations.flatMap(e => e.weaknesses));
  if (weaknesses.length > 0) {
    lines.push('', 'Areas for Improvement:', ...weaknesses.map(w => `  - ${w}`));
  }

  return lines.join('\n');
}

// ============================================================
// EVALUATION
// ============================================================

/**
 * Grade one story. Throws when the judge's reply does not validate.
 */
export async function evaluateStory(
  client: LlmClient,
  story: ScoredCluster
): Promise<StoryEvaluation> {
  const text = await client.complete({
    system: EVALUATION_SYSTEM_PROMPT,
    prompt: buildEvaluationPrompt(story),
    temperature: 0.3,
    maxTokens: 1024,
  });

  const parsed = JudgeResponseSchema.safeParse(extractJson(text));
  if (!parsed.success) {
    throw new Error(`Invalid evaluation response: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
  }

  const { scores } = parsed.data;
  const overallScore = round2(scores.reduce((sum, s) => sum + s.score, 0) / scores.length);

  return {
    ...parsed.data,
    clusterId: story.id,
    title: story.primary.title,
    overallScore,
  };
}

/**
 * Grade every story in a report, one at a time. Stories whose
 * evaluation fails are listed in `failedStories`.
 */
export async function evaluateReport(
  client: LlmClient,
  report: Report,
  now: Date = new Date()
): Promise<EvaluationReport> {
  const evaluations: StoryEvaluation[] = [];
  const failedStories: string[] = [];

  log.info('Starting report evaluation', { reportId: report.id, stories: report.stories.length });

  for (const story of report.stories) {
    try {
      evaluations.push(await evaluateStory(client, story));
    } catch (error) {
      log.warn('Story evaluation failed, skipping', { clusterId: story.id, error: errorMessage(error) });
      failedStories.push(story.id);
    }
  }

  const averageScore =
    evaluations.length > 0
      ? round2(evaluations.reduce((sum, e) => sum + e.overallScore, 0) / evaluations.length)
      : 0;

  log.info('Report evaluation completed', {
    reportId: report.id,
    evaluated: evaluations.length,
    failed: failedStories.length,
    averageScore,
  });

  return {
    reportId: report.id,
    evaluatedAt: now.toISOString(),
    totalStories: report.stories.length,
    averageScore,
    evaluations,
    failedStories,
    overallFeedback: buildOverallFeedback(evaluations, averageScore),
  };
}

// ============================================================
// TRENDS
// ============================================================

export interface Trend {
  direction: 'improving' | 'declining' | 'stable';
  recent: number;
  older: number;
}

/**
 * Compare the two newest average scores with the two oldest.
 * `scores` is ordered newest first; fewer than two scores give null.
 */
export function summarizeTrend(scores: readonly number[]): Trend | null {
  if (scores.length < 2) return null;

  const recent = round2((scores[0] + scores[1]) / 2);
  const older = round2((scores[scores.length - 2] + scores[scores.length - 1]) / 2);
  const direction = recent > older ? 'improving' : recent < older ? 'declining' : 'stable';

  return { direction, recent, older };
}

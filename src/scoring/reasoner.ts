/**
 * NewsScout — Reasoning Capability
 *
 * The scorer depends only on `ReasoningCapability`. Its answer is an
 * untrusted structured value; validation happens in the scorer.
 */

import type { LlmClient } from '../llm/client';
import { extractJson } from '../llm/client';

export interface ScoringRequest {
  title: string;
  summary: string;
}

export interface ReasoningCapability {
  /**
   * Judge one story. Resolves with the raw structured verdict
   * (expected `{ score, summary, reasoning }`) or rejects.
   */
  score(request: ScoringRequest, signal?: AbortSignal): Promise<unknown>;
}

export const SCORING_SYSTEM_PROMPT = `You are an assistant editor at a major news organization. Your task is to judge how important and newsworthy a single incoming story is.

INSTRUCTIONS:
1. Consider impact, novelty and public interest. Minor updates, trivia and redundant coverage score low.
2. Give an IMPORTANCE SCORE from 0 to 10 (10 is most important). Breaking news of wide consequence scores 8 or higher.
3. Write a concise ONE-SENTENCE SUMMARY of the story's significance.
4. Give brief reasoning for the score.

Respond ONLY with a JSON object, no markdown:
{"score": 7, "summary": "One sentence on why the story matters.", "reasoning": "Why this score was assigned."}`;

export function buildScoringPrompt(request: ScoringRequest): string {
  const summary = request.summary.length > 0 ? request.summary : '(no summary provided)';
  return `Judge this story.

Title: ${request.title}
Summary: ${summary}`;
}

export interface LlmReasonerOptions {
  temperature?: number;
}

/**
 * Reasoning capability backed by a language model.
 * Replies that contain no JSON resolve to null.
 */
export function createLlmReasoner(
  client: LlmClient,
  options: LlmReasonerOptions = {}
): ReasoningCapability {
  return {
    async score(request, signal) {
      const text = await client.complete({
        system: SCORING_SYSTEM_PROMPT,
        prompt: buildScoringPrompt(request),
        temperature: options.temperature ?? 0.2,
        maxTokens: 512,
        signal,
      });
      return extractJson(text);
    },
  };
}

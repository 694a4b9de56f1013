/**
 * NewsScout — Scoring Module
 */

export {
  scoreClusters,
  interpretJudgment,
  DEFAULT_MAX_CLUSTERS,
  DEFAULT_SCORING_TIMEOUT_MS,
  type ScorerOptions,
  type ScoringResult,
  type JudgmentInterpretation,
} from './scorer';

export {
  createLlmReasoner,
  buildScoringPrompt,
  SCORING_SYSTEM_PROMPT,
  type ReasoningCapability,
  type ScoringRequest,
  type LlmReasonerOptions,
} from './reasoner';

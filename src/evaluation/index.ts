/**
 * NewsScout — Evaluation Module
 */

export {
  evaluateStory,
  evaluateReport,
  buildEvaluationPrompt,
  buildOverallFeedback,
  performanceBand,
  summarizeTrend,
  EVALUATION_SYSTEM_PROMPT,
  type Trend,
} from './evaluator';

export {
  listReports,
  loadReport,
  saveEvaluation,
  evaluationFilename,
  parseReportChoice,
  PICKER_LIMIT,
  type ReportFile,
} from './archive';

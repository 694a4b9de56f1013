/**
 * NewsScout — Evaluate Report Script
 *
 * Grades saved reports with an LLM judge and stores the evaluation.
 *
 * Usage:
 *   npm run evaluate -- --latest          # Most recent report
 *   npm run evaluate -- --file <path>     # A specific report
 *   npm run evaluate -- --all [count]     # The N most recent reports (default 5)
 *   npm run evaluate -- --pick            # Choose from the 10 most recent reports
 *   npm run evaluate -- --help
 */

import 'dotenv/config';
import { basename } from 'path';
import { createInterface } from 'readline/promises';
import { loadConfig, type AppConfig } from '../src/lib/config';
import { logger, errorMessage } from '../src/lib/logger';
import { createAnthropicClient, type LlmClient } from '../src/llm/client';
import { evaluateReport, performanceBand, summarizeTrend } from '../src/evaluation/evaluator';
import {
  PICKER_LIMIT,
  listReports,
  loadReport,
  parseReportChoice,
  saveEvaluation,
  type ReportFile,
} from '../src/evaluation/archive';
import type { EvaluationReport } from '../src/types';

type Mode =
  | { kind: 'latest' }
  | { kind: 'file'; path: string }
  | { kind: 'all'; count: number }
  | { kind: 'pick' }
  | { kind: 'help' };

function parseArgs(argv: string[]): Mode {
  const flag = argv.at(0);
  const value = argv.at(1);

  switch (flag) {
    case '--file':
      return value ? { kind: 'file', path: value } : { kind: 'help' };
    case '--all': {
      const count = value ? Number.parseInt(value, 10) : 5;
      return { kind: 'all', count: Number.isNaN(count) || count < 1 ? 5 : count };
    }
    case '--pick':
      return { kind: 'pick' };
    case '--latest':
    case undefined:
      return { kind: 'latest' };
    default:
      return { kind: 'help' };
  }
}

function printHelp(): void {
  console.log(`Usage:
  npm run evaluate -- --latest          Evaluate the most recent report
  npm run evaluate -- --file <path>     Evaluate a specific report
  npm run evaluate -- --all [count]     Evaluate the N most recent reports (default: 5)
  npm run evaluate -- --pick            Choose a report from the ${PICKER_LIMIT} most recent
  npm run evaluate -- --help            Show this help`);
}

function printEvaluation(evaluation: EvaluationReport): void {
  console.log('\n' + '='.repeat(80));
  console.log('EVALUATION REPORT');
  console.log('='.repeat(80));
  console.log(`Report: ${evaluation.reportId}`);
  console.log(`Stories evaluated: ${evaluation.evaluations.length}/${evaluation.totalStories}`);
  console.log(`Average score: ${evaluation.averageScore.toFixed(2)}/5.0`);
  console.log('\n' + evaluation.overallFeedback);

  for (const [i, story] of evaluation.evaluations.entries()) {
    console.log(`\n${i + 1}. ${story.title}`);
    console.log(`   Overall: ${story.overallScore.toFixed(1)}/5.0`);
    for (const score of story.scores) {
      console.log(`   - ${score.criterion}: ${score.score}/5  ${score.reasoning}`);
    }
    if (story.suggestions) {
      console.log(`   Suggestions: ${story.suggestions}`);
    }
  }
}

async function pickReport(reports: ReportFile[]): Promise<ReportFile | null> {
  const choices = reports.slice(0, PICKER_LIMIT);

  console.log('\nAvailable reports:');
  for (const [i, file] of choices.entries()) {
    console.log(`  ${i + 1}. ${file.filename}  (${file.modifiedAt.toLocaleString()})`);
  }

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    for (;;) {
      const answer = await rl.question(`\nEnter number (1-${choices.length}), or 'q' to quit: `);
      const choice = parseReportChoice(answer, choices.length);
      if (choice === 'quit') return null;
      if (choice !== null) return choices[choice];
      console.log('Invalid choice, try again.');
    }
  } finally {
    rl.close();
  }
}

async function evaluateFile(
  client: LlmClient,
  config: AppConfig,
  path: string
): Promise<EvaluationReport | null> {
  let evaluation: EvaluationReport;

  try {
    const report = await loadReport(path);
    if (report.stories.length === 0) {
      console.log(`${basename(path)}: no important stories to evaluate.`);
      return null;
    }
    evaluation = await evaluateReport(client, report);
  } catch (error) {
    logger.error('Evaluation failed', { path, error: errorMessage(error) });
    return null;
  }

  printEvaluation(evaluation);
  const savedTo = await saveEvaluation(evaluation, config.evaluationsDir, basename(path));
  console.log(`\nEvaluation saved to ${savedTo}`);
  console.log(`Agent performance: ${performanceBand(evaluation.averageScore).toUpperCase()}`);

  return evaluation;
}

async function main(): Promise<void> {
  const mode = parseArgs(process.argv.slice(2));
  if (mode.kind === 'help') {
    printHelp();
    return;
  }

  const config = loadConfig();
  const client = createAnthropicClient({
    apiKey: config.anthropic.apiKey,
    model: config.anthropic.model,
  });

  if (mode.kind === 'file') {
    await evaluateFile(client, config, mode.path);
    return;
  }

  const reports = await listReports(config.reportsDir);
  if (reports.length === 0) {
    console.log(`No scout reports found in ${config.reportsDir}/. Run the pipeline first.`);
    return;
  }

  if (mode.kind === 'latest') {
    await evaluateFile(client, config, reports[0].path);
    return;
  }

  if (mode.kind === 'pick') {
    const picked = await pickReport(reports);
    if (picked) {
      await evaluateFile(client, config, picked.path);
    }
    return;
  }

  const scores: Array<{ filename: string; score: number }> = [];
  for (const file of reports.slice(0, mode.count)) {
    const evaluation = await evaluateFile(client, config, file.path);
    if (evaluation) {
      scores.push({ filename: file.filename, score: evaluation.averageScore });
    }
  }

  if (scores.length === 0) return;

  const average = scores.reduce((sum, s) => sum + s.score, 0) / scores.length;
  const best = scores.reduce((a, b) => (b.score > a.score ? b : a));
  const worst = scores.reduce((a, b) => (b.score < a.score ? b : a));

  console.log('\n' + '='.repeat(80));
  console.log('AGGREGATE STATISTICS');
  console.log('='.repeat(80));
  console.log(`Reports evaluated: ${scores.length}`);
  console.log(`Average score: ${average.toFixed(2)}/5.0`);
  console.log(`Best: ${best.score.toFixed(2)}/5.0 (${best.filename})`);
  console.log(`Worst: ${worst.score.toFixed(2)}/5.0 (${worst.filename})`);

  const trend = summarizeTrend(scores.map(s => s.score));
  if (trend) {
    console.log(`Trend: ${trend.direction} (recent ${trend.recent.toFixed(2)}, older ${trend.older.toFixed(2)})`);
  }
}

main().catch(error => {
  logger.error('Evaluate script failed', { error: errorMessage(error) });
  process.exit(1);
});

/**
 * NewsScout — Report Rendering
 */

import type { Report, ScoredCluster } from '../types';

function scoreIcon(score: number): string {
  return score >= 8 ? '🔴' : score >= 6 ? '🟠' : '🟡';
}

function anomalyLines(report: Report): string[] {
  const { diagnostics } = report;
  const lines: string[] = [];

  if (diagnostics.scoringFailures.length > 0) {
    lines.push(`${diagnostics.scoringFailures.length} cluster(s) could not be scored:`);
    for (const failure of diagnostics.scoringFailures) {
      lines.push(`- ${failure.clusterId} (${failure.kind}): ${failure.reason}`);
    }
  }
  if (diagnostics.outOfRangeScores > 0) {
    lines.push(`${diagnostics.outOfRangeScores} score(s) were out of range and clamped.`);
  }
  if (diagnostics.clustersExcludedByCap > 0) {
    lines.push(`${diagnostics.clustersExcludedByCap} cluster(s) were over the per-run cap and not scored.`);
  }
  if (diagnostics.sourceErrors.length > 0) {
    lines.push(`Feed errors: ${diagnostics.sourceErrors.join('; ')}`);
  }

  return lines;
}

/**
 * Plain-text rendering for the console.
 */
export function renderReportText(report: Report): string {
  const lines: string[] = [];

  lines.push(`Analyzed ${report.totalAnalyzed} stories`);
  lines.push(`Found ${report.importantCount} important stories (score >= ${report.threshold}):`);

  for (const story of report.stories) {
    lines.push('');
    lines.push(`Score: ${story.judgment.score}/10`);
    lines.push(`Title: ${story.primary.title}`);
    lines.push(`Summary: ${story.judgment.summary}`);
    lines.push(`Reasoning: ${story.judgment.reasoning}`);
    lines.push(`Link: ${story.primary.link}`);
    if (story.related.length > 0) {
      lines.push(`Related: ${story.related.length} other report(s)`);
    }
    lines.push('-'.repeat(80));
  }

  const anomalies = anomalyLines(report);
  if (anomalies.length > 0) {
    lines.push('');
    lines.push(...anomalies);
  }

  return lines.join('\n');
}

function renderStoryMarkdown(story: ScoredCluster): string[] {
  const lines: string[] = [];

  lines.push(`## ${scoreIcon(story.judgment.score)} ${story.primary.title}`);
  lines.push('');
  lines.push(`**Score ${story.judgment.score}/10** | ${story.primary.sourceId} | ${story.primary.publishedAt}`);
  lines.push('');
  lines.push(`> ${story.judgment.summary}`);
  lines.push('');
  lines.push(story.judgment.reasoning);
  lines.push('');
  lines.push(`[Read the story](${story.primary.link})`);

  const related = [...story.related.map(item => item.link), ...story.primary.relatedLinks];
  if (related.length > 0) {
    lines.push('');
    lines.push('Related coverage:');
    for (const link of related) {
      lines.push(`- ${link}`);
    }
  }

  lines.push('');
  return lines;
}

/**
 * Markdown rendering for exports.
 */
export function renderReportMarkdown(report: Report): string {
  const lines: string[] = [];

  lines.push(`# News Scout Report`);
  lines.push('');
  lines.push(`*Generated ${report.generatedAt} (${report.id})*`);
  lines.push('');
  lines.push(`| Metric | Value |`);
  lines.push(`|--------|-------|`);
  lines.push(`| Stories analyzed | ${report.totalAnalyzed} |`);
  lines.push(`| Important (score >= ${report.threshold}) | ${report.importantCount} |`);
  lines.push(`| Scoring failures | ${report.diagnostics.scoringFailures.length} |`);
  lines.push('');

  if (report.stories.length === 0) {
    lines.push('No story reached the importance threshold.');
    lines.push('');
  }

  for (const story of report.stories) {
    lines.push(...renderStoryMarkdown(story));
  }

  const anomalies = anomalyLines(report);
  if (anomalies.length > 0) {
    lines.push(`---`);
    lines.push('');
    lines.push(...anomalies);
    lines.push('');
  }

  return lines.join('\n');
}

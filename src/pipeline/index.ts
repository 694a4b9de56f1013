/**
 * NewsScout — Pipeline Run
 *
 * One self-contained run, from fetch to report:
 *
 *   idle → fetching → normalizing → grouping → scoring → building → done
 *
 * with `failed` reachable from any stage. Only systemic problems fail a
 * run: no feed answered, or the reasoning capability could not be reached
 * for any cluster. Per-cluster failures end up in the report diagnostics.
 *
 * When a LinkResolver is given, building also swaps aggregator redirect
 * links for article URLs.
 */

import type { Cluster, Report, RunDiagnostics } from '../types';
import { emptyDiagnostics } from '../types';
import type { FeedSource } from '../feeds/base';
import type { ReasoningCapability } from '../scoring/reasoner';
import { aggregateFeeds } from '../feeds/aggregator';
import { normalizeItems } from '../feeds/normalizer';
import { groupItems } from '../feeds/grouper';
import { scoreClusters, type ScoringResult } from '../scoring/scorer';
import { buildReport } from '../report/builder';
import { resolveReportLinks, type LinkResolver } from '../links/resolver';
import { DEFAULT_RUN_CONFIG, type RunConfig } from '../lib/config';
import { generateRunId } from '../lib/trace';
import { logger, errorMessage, timeOperation, type Logger } from '../lib/logger';

// ============================================================
// TYPES
// ============================================================

export type PipelineStage =
  | 'idle'
  | 'fetching'
  | 'normalizing'
  | 'grouping'
  | 'scoring'
  | 'building'
  | 'done'
  | 'failed';

export interface StageTransition {
  from: PipelineStage;
  to: PipelineStage;
  at: string;
}

export interface PipelineInput {
  sources: readonly FeedSource[];
  capability: ReasoningCapability;
  /** Rewrites aggregator links in the report; links are kept as fetched without one */
  linkResolver?: LinkResolver;
  config?: Partial<RunConfig>;
  onStageChange?: (transition: StageTransition) => void;
  /** Clock for formedAt / generatedAt */
  now?: () => Date;
}

export type PipelineResult =
  | {
      status: 'done';
      runId: string;
      report: Report;
      stages: StageTransition[];
    }
  | {
      status: 'failed';
      runId: string;
      /** Stage that was active when the run failed */
      stage: PipelineStage;
      error: string;
      diagnostics: RunDiagnostics;
      stages: StageTransition[];
    };

class SystemicFailure extends Error {}

// ============================================================
// RUN
// ============================================================

class PipelineRun {
  readonly runId: string;
  readonly stages: StageTransition[] = [];
  readonly diagnostics: RunDiagnostics = emptyDiagnostics();
  private stage: PipelineStage = 'idle';
  private readonly log: Logger;
  private readonly config: RunConfig;
  private readonly now: () => Date;

  constructor(private readonly input: PipelineInput) {
    this.now = input.now ?? (() => new Date());
    this.runId = generateRunId('RUN', this.now());
    this.config = { ...DEFAULT_RUN_CONFIG, ...input.config };
    this.log = logger.child({ scope: 'pipeline', runId: this.runId });
  }

  get current(): PipelineStage {
    return this.stage;
  }

  enter(next: PipelineStage): void {
    const transition: StageTransition = { from: this.stage, to: next, at: this.now().toISOString() };
    this.stages.push(transition);
    this.stage = next;
    this.log.debug('Stage transition', { from: transition.from, to: transition.to });

    try {
      this.input.onStageChange?.(transition);
    } catch (error) {
      this.log.warn('Stage listener failed', { stage: next, error: errorMessage(error) });
    }
  }

  async execute(): Promise<Report> {
    const { sources, capability } = this.input;
    const config = this.config;

    this.enter('fetching');
    const feed = await aggregateFeeds(sources, {
      sourceTimeoutMs: config.sourceTimeoutMs,
      maxItemsPerSource: config.maxItemsPerSource,
    });
    this.diagnostics.rawItems = feed.items.length;
    this.diagnostics.sourceErrors = feed.errors;

    if (feed.allFailed) {
      throw new SystemicFailure(`No feed could be fetched: ${feed.errors.join('; ')}`);
    }

    this.enter('normalizing');
    const normalized = normalizeItems(feed.items);
    this.diagnostics.skippedItems = normalized.skipped.length;
    this.diagnostics.duplicateItems = normalized.duplicates;

    let clusters: Cluster[] = [];
    let scoring: ScoringResult = { scored: [], failures: [], considered: 0, excluded: 0, outOfRangeScores: 0 };

    if (normalized.items.length === 0) {
      this.log.info('No items after normalization, building empty report');
    } else {
      this.enter('grouping');
      clusters = groupItems(normalized.items, {
        similarityThreshold: config.similarityThreshold,
        now: this.now(),
      });
      this.diagnostics.clustersFormed = clusters.length;

      this.enter('scoring');
      scoring = await scoreClusters(clusters, capability, {
        maxClusters: config.maxClusters,
        timeoutMs: config.scoringTimeoutMs,
      });
      this.diagnostics.clustersExcludedByCap = scoring.excluded;
      this.diagnostics.scoringFailures = scoring.failures;
      this.diagnostics.outOfRangeScores = scoring.outOfRangeScores;

      if (isCapabilityUnreachable(scoring)) {
        throw new SystemicFailure(
          `Reasoning capability unreachable for all ${scoring.considered} cluster(s): ${scoring.failures[0].reason}`
        );
      }
    }

    this.enter('building');
    const built = buildReport({
      scored: scoring.scored,
      totalAnalyzed: scoring.considered,
      threshold: config.scoreThreshold,
      diagnostics: this.diagnostics,
      generatedAt: this.now(),
      id: this.runId,
    });

    const report = this.input.linkResolver
      ? await resolveReportLinks(built, this.input.linkResolver, { timeoutMs: config.linkTimeoutMs })
      : built;

    this.enter('done');
    return report;
  }
}

/**
 * Every considered cluster failed to reach the capability (timeouts or
 * errors). A malformed reply means the capability answered.
 */
export function isCapabilityUnreachable(scoring: ScoringResult): boolean {
  return (
    scoring.considered > 0 &&
    scoring.scored.length === 0 &&
    scoring.failures.length === scoring.considered &&
    scoring.failures.every(f => f.kind === 'timeout' || f.kind === 'capability_error')
  );
}

/**
 * Execute one pipeline run. Never throws; systemic failures come back
 * as `status: 'failed'` with the stage they happened in.
 */
export async function runPipeline(input: PipelineInput): Promise<PipelineResult> {
  const run = new PipelineRun(input);
  const log = logger.child({ scope: 'pipeline', runId: run.runId });

  log.info('Pipeline run started', { sources: input.sources.length });

  try {
    const { result: report, durationMs } = await timeOperation('Pipeline run', () => run.execute(), log);

    log.info('Pipeline run completed', {
      durationMs,
      totalAnalyzed: report.totalAnalyzed,
      important: report.importantCount,
      scoringFailures: report.diagnostics.scoringFailures.length,
    });

    return { status: 'done', runId: run.runId, report, stages: run.stages };
  } catch (error) {
    const stage = run.current;
    const message = errorMessage(error);

    if (error instanceof SystemicFailure) {
      log.error('Pipeline run failed', { stage, error: message });
    } else {
      log.error('Unexpected error during pipeline run', { stage, error: message });
    }

    run.enter('failed');

    return {
      status: 'failed',
      runId: run.runId,
      stage,
      error: message,
      diagnostics: run.diagnostics,
      stages: run.stages,
    };
  }
}
